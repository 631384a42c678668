import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export interface TempDbPath {
  path: string;
  cleanup: () => void;
}

export function createTempDbPath(prefix = 'market-terminal-test-'): TempDbPath {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  return {
    path: join(dir, 'market_terminal.db'),
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}
