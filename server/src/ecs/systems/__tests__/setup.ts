// ============================================
// Shared Test Setup
// Runs before each test file via vitest setupFiles
// ============================================

import { vi } from 'vitest';

// Mock the logger to prevent file system operations and transport workers
vi.mock('../../../logger', () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
  perfLogger: { info: vi.fn() },
  logSimulationStarted: vi.fn(),
  logNewGame: vi.fn(),
  logPlayerCaught: vi.fn(),
  logMonsterSpawnSkipped: vi.fn(),
  logAggregateStats: vi.fn(),
  logWorldSnapshot: vi.fn(),
}));
