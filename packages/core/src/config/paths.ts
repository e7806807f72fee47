/**
 * @textrelay/core - Path resolution
 *
 * Resolves TEXTRELAY_HOME and the location of textrelay.json.
 */

import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

export const CONFIG_FILE_NAME = 'textrelay.json';

type Env = Record<string, string | undefined>;

/**
 * Resolve the textrelay home directory.
 * Priority: TEXTRELAY_HOME env var > ~/.textrelay
 */
export function resolveRelayHome(env: Env = process.env): string {
  const fromEnv = env['TEXTRELAY_HOME'];
  if (fromEnv) {
    return resolve(fromEnv);
  }
  return join(homedir(), '.textrelay');
}

/**
 * Resolve the configuration file path.
 * Priority: TEXTRELAY_CONFIG env var > TEXTRELAY_HOME/textrelay.json
 */
export function resolveConfigPath(env: Env = process.env): string {
  const fromEnv = env['TEXTRELAY_CONFIG'];
  if (fromEnv) {
    return resolve(fromEnv);
  }
  return join(resolveRelayHome(env), CONFIG_FILE_NAME);
}
