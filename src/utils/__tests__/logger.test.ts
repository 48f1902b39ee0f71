import os from 'os';
import path from 'path';
import { promises as fs } from 'fs';

import { describe, expect, it } from 'vitest';

import { createLogger } from '../logger.js';

describe('createLogger', () => {
  it('writes debug lines to a fresh debug file and releases it on close', async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'pinentry-logger-test-'));
    const file = path.join(root, 'nested', 'debug.log');
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, 'stale line\n');

    const handle = createLogger({
      debug: { enabled: true, file },
      logging: { level: 'warn', pretty: false },
    });
    handle.logger.child({ component: 'session' }).debug({ command: 'GETINFO', args: 'pid' }, 'Received command');
    handle.close();
    handle.close();

    const lines = (await fs.readFile(file, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      level: 20,
      component: 'session',
      command: 'GETINFO',
      args: 'pid',
      msg: 'Received command',
    });

    await fs.rm(root, { recursive: true, force: true });
  });

  it('creates missing directories for the debug file', async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'pinentry-logger-mkdir-'));
    const file = path.join(root, 'a', 'b', 'debug.log');

    const handle = createLogger({
      debug: { enabled: true, file },
      logging: { level: 'warn', pretty: false },
    });
    handle.logger.info('started');
    handle.close();

    expect(await fs.readFile(file, 'utf8')).toContain('"msg":"started"');

    await fs.rm(root, { recursive: true, force: true });
  });

  it('honours the configured level on stderr', () => {
    const handle = createLogger({
      debug: { enabled: false, file: path.join(os.tmpdir(), 'unused.log') },
      logging: { level: 'error', pretty: false },
    });

    expect(handle.logger.level).toBe('error');
    expect(handle.logger.isLevelEnabled('warn')).toBe(false);
    handle.close();
  });
});
