import { describe, it, expect } from 'vitest';
import { platform } from 'os';
import { join } from 'path';
import { CONFIG_ENV_VAR, resolveConfigPath, getDefaultConfigDir, getDefaultConfigPath } from './config-path.js';

describe('resolveConfigPath', () => {
  it('prefers the --config argument', () => {
    const env = { [CONFIG_ENV_VAR]: '/env/dynattr.json' };
    expect(resolveConfigPath({ configPath: '/custom/config.json' }, env)).toBe('/custom/config.json');
  });

  it('falls back to DYNATTR_CONFIG', () => {
    expect(resolveConfigPath({}, { [CONFIG_ENV_VAR]: '/env/dynattr.json' })).toBe('/env/dynattr.json');
  });

  it('uses the platform default last', () => {
    const env = { XDG_CONFIG_HOME: '/xdg', APPDATA: '/appdata' };
    expect(resolveConfigPath({}, env)).toBe(getDefaultConfigPath(env));
  });
});

describe('getDefaultConfigDir', () => {
  it('ends in the application directory', () => {
    expect(getDefaultConfigDir().endsWith('dynattr')).toBe(true);
  });

  it.runIf(platform() === 'linux')('honors XDG_CONFIG_HOME on linux', () => {
    expect(getDefaultConfigDir({ XDG_CONFIG_HOME: '/xdg' })).toBe(join('/xdg', 'dynattr'));
  });
});

describe('getDefaultConfigPath', () => {
  it('is config.json in the default directory', () => {
    const env = { XDG_CONFIG_HOME: '/xdg' };
    expect(getDefaultConfigPath(env)).toBe(join(getDefaultConfigDir(env), 'config.json'));
  });
});
