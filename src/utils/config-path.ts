/**
 * Where the config file lives
 *
 * Lookup order: the --config argument, then $DYNATTR_CONFIG, then the
 * platform's per-user config directory.
 */

import { homedir, platform } from 'os';
import { join } from 'path';

export const CONFIG_ENV_VAR = 'DYNATTR_CONFIG';

const APP_DIR = 'dynattr';
const CONFIG_FILE = 'config.json';

type Env = Record<string, string | undefined>;

function userConfigBase(env: Env): string {
  const home = homedir();
  switch (platform()) {
    case 'win32':
      return env.APPDATA || join(home, 'AppData', 'Roaming');
    case 'darwin':
      return join(home, 'Library', 'Application Support');
    default:
      return env.XDG_CONFIG_HOME || join(home, '.config');
  }
}

export function getDefaultConfigDir(env: Env = process.env): string {
  return join(userConfigBase(env), APP_DIR);
}

export function getDefaultConfigPath(env: Env = process.env): string {
  return join(getDefaultConfigDir(env), CONFIG_FILE);
}

export interface ConfigPathOptions {
  /** Value of --config */
  configPath?: string;
}

export function resolveConfigPath(options: ConfigPathOptions = {}, env: Env = process.env): string {
  return options.configPath || env[CONFIG_ENV_VAR] || getDefaultConfigPath(env);
}
