import os from 'os';
import path from 'path';

import { describe, expect, it } from 'vitest';

import { parseConfig } from '../index.js';
import { ConfigError } from '../../utils/errors.js';

describe('parseConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(parseConfig({})).toEqual({
      runner: { requested: undefined },
      display: { x11: undefined, wayland: undefined },
      debug: { enabled: false, file: path.join(os.tmpdir(), 'pinentry-menu.log') },
      logging: { level: 'warn', pretty: false },
    });
  });

  it('reads the preferred runner and displays', () => {
    const config = parseConfig({ PINENTRY_USER_DATA: 'wofi', WAYLAND_DISPLAY: 'wayland-1', DISPLAY: '' });

    expect(config.runner.requested).toBe('wofi');
    expect(config.display).toEqual({ x11: '', wayland: 'wayland-1' });
  });

  it('treats an empty runner preference as none', () => {
    expect(parseConfig({ PINENTRY_USER_DATA: '' }).runner.requested).toBeUndefined();
  });

  it('enables the debug log', () => {
    const config = parseConfig({ PINENTRY_DEBUG: '1', PINENTRY_DEBUG_FILE: '/var/tmp/pinentry-debug.log' });

    expect(config.debug).toEqual({ enabled: true, file: '/var/tmp/pinentry-debug.log' });
  });

  it('reads logging options', () => {
    expect(parseConfig({ LOG_LEVEL: 'debug', LOG_PRETTY: 'true' }).logging).toEqual({ level: 'debug', pretty: true });
  });

  it('rejects an unknown log level', () => {
    let caught: unknown;
    try {
      parseConfig({ LOG_LEVEL: 'verbose' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError && caught.issues[0]).toMatch(/^logging\.level: /);
  });
});
