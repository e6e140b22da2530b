/**
 * @llm-relay/core - Path resolution
 *
 * Resolves RELAY_HOME and the location of relay.json.
 */

import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

export const CONFIG_FILE_NAME = 'relay.json';

/**
 * Resolve the relay home directory.
 * Priority: RELAY_HOME env var > ~/.llm-relay
 */
export function resolveRelayHome(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env['RELAY_HOME'];
  if (fromEnv) {
    return resolve(fromEnv);
  }
  return join(homedir(), '.llm-relay');
}

/**
 * Resolve the config file path.
 * Priority: RELAY_CONFIG env var > RELAY_HOME/relay.json
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env['RELAY_CONFIG'];
  if (fromEnv) {
    return resolve(fromEnv);
  }
  return join(resolveRelayHome(env), CONFIG_FILE_NAME);
}
