import { spawn, type ChildProcessByStdio } from 'child_process';
import type { Readable } from 'stream';
import { buildArgv } from './command.js';
import { logger } from '../utils/logger.js';
import { LauncherSpawnError } from '../utils/errors.js';
import type { RunnerTemplate } from '../runners/types.js';
import type { LaunchResult, Launcher, PromptText } from './types.js';

const log = logger.child({ component: 'launcher' });

/**
 * Maps a finished launcher run onto a result. Cancellation (non-zero exit or
 * a signal) never yields a secret, whatever was printed before exiting.
 */
export function interpretExit(code: number | null, output: string): LaunchResult {
  if (code !== 0) {
    return { secret: null, accepted: false };
  }

  const secret = output.replace(/\r?\n$/, '');
  return { secret: secret.length > 0 ? secret : null, accepted: true };
}

export class ProcessLauncher implements Launcher {
  async prompt(template: RunnerTemplate, text: PromptText): Promise<LaunchResult> {
    const [executable, ...args] = buildArgv(template, text);

    log.debug({ executable, argCount: args.length }, 'Launching prompt');

    return new Promise<LaunchResult>((resolve, reject) => {
      let child: ChildProcessByStdio<null, Readable, null>;

      try {
        child = spawn(executable, args, { stdio: ['ignore', 'pipe', 'ignore'] });
      } catch (err) {
        reject(new LauncherSpawnError(executable, err instanceof Error ? err : undefined));
        return;
      }

      const chunks: Buffer[] = [];
      let settled = false;

      child.stdout.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });

      child.on('error', (err) => {
        if (settled) return;
        settled = true;
        reject(new LauncherSpawnError(executable, err));
      });

      child.on('close', (code, signal) => {
        if (settled) return;
        settled = true;

        log.debug({ executable, exitCode: code, signal }, 'Launcher exited');
        resolve(interpretExit(code, Buffer.concat(chunks).toString('utf8')));
      });
    });
  }
}
