import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

export const DATA_DIR_NAME = 'market-terminal';
export const DEFAULT_DB_FILENAME = 'market_terminal.db';

/**
 * Get the default watchlist database path
 *
 * Uses $XDG_DATA_HOME/market-terminal (or ~/.local/share/market-terminal) and
 * creates the directory when missing.
 */
export function getDefaultDbPath(env: NodeJS.ProcessEnv = process.env): string {
  const dataHome = env.XDG_DATA_HOME || path.join(os.homedir(), '.local', 'share');
  const dataDir = path.join(dataHome, DATA_DIR_NAME);

  if (!fs.existsSync(dataDir)) {
    try {
      fs.mkdirSync(dataDir, { recursive: true });
    } catch (error) {
      throw new Error(
        `Failed to create data directory at ${dataDir}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  return path.join(dataDir, DEFAULT_DB_FILENAME);
}
