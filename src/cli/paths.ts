import * as path from 'path';
import * as os from 'os';

export const PORTKEY_HOME = path.join(os.homedir(), '.portkey');
export const DEFAULT_CONFIG_PATH = path.join(PORTKEY_HOME, 'config.json');

/** `$PORTKEY_CONFIG` wins over ~/.portkey/config.json. */
export function resolveConfigPath(): string {
  return process.env.PORTKEY_CONFIG || DEFAULT_CONFIG_PATH;
}
