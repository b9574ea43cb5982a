import { homedir } from 'node:os';
import path from 'node:path';

/**
 * Root directory for runtime state (logs). Nothing else is written to disk:
 * user settings live in memory only.
 */
export function getBotHome(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.SCANLATE_HOME?.trim();
  if (override) return override;
  return path.join(homedir(), '.scanlate');
}

export function getLogDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.LOG_DIR?.trim();
  if (override) return override;
  return path.join(getBotHome(env), 'logs');
}
