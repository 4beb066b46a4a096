import { describe, it, expect } from 'vitest';
import path from 'path';
import { ConfigurationError } from '@jellyfzf/shared';
import { loadConfig } from './index.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({ XDG_CONFIG_HOME: '/tmp/xdg' });
    expect(config).toEqual({
      configDir: path.join('/tmp/xdg', 'jellyfzf'),
      registryPath: path.join('/tmp/xdg', 'jellyfzf', 'servers.json'),
      picker: 'fzf',
      fzfBin: 'fzf',
      player: 'ffplay',
      requestTimeoutMs: 15000,
      forceTranscode: false,
      transcodeBitrate: 192000,
      logLevel: 'warn',
    });
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      JELLYFZF_CONFIG_DIR: '/srv/jellyfzf',
      JELLYFZF_PICKER: 'embedded',
      JELLYFZF_PLAYER: 'mpv',
      JELLYFZF_REQUEST_TIMEOUT_MS: '5000',
      JELLYFZF_FORCE_TRANSCODE: '1',
      LOG_LEVEL: 'debug',
    });
    expect(config.configDir).toBe('/srv/jellyfzf');
    expect(config.registryPath).toBe(path.join('/srv/jellyfzf', 'servers.json'));
    expect(config.picker).toBe('embedded');
    expect(config.player).toBe('mpv');
    expect(config.requestTimeoutMs).toBe(5000);
    expect(config.forceTranscode).toBe(true);
    expect(config.logLevel).toBe('debug');
  });

  it('should let overrides win over the environment', () => {
    const config = loadConfig({ JELLYFZF_PLAYER: 'mpv', XDG_CONFIG_HOME: '/tmp/xdg' }, { player: 'ffplay', picker: 'embedded' });
    expect(config.player).toBe('ffplay');
    expect(config.picker).toBe('embedded');
  });

  it('should reject invalid values with a ConfigurationError', () => {
    expect(() => loadConfig({ JELLYFZF_PICKER: 'rofi' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ JELLYFZF_REQUEST_TIMEOUT_MS: '-1' })).toThrow(/JELLYFZF_REQUEST_TIMEOUT_MS/);
  });
});
