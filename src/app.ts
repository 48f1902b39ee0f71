import type { Readable, Writable } from 'stream';
import type { Logger } from 'pino';
import type { Config } from './config/index.js';
import { RUNNER_CATALOG } from './runners/catalog.js';
import { resolveRunner } from './runners/resolver.js';
import { ProcessLauncher } from './prompt/launcher.js';
import { PinentrySession } from './protocol/session.js';
import { logger, type LoggerHandle } from './utils/logger.js';
import { MissingDisplayError, PinentryMenuError } from './utils/errors.js';
import type { ExecutableProbe, RunnerCatalog } from './runners/types.js';
import type { Launcher } from './prompt/types.js';

export interface RunPinentryOptions {
  /** Positional arguments; the first one names the preferred runner. */
  args: string[];
  config: Config;
  input: Readable;
  output: Writable;
  errorOutput: Writable;
  catalog?: RunnerCatalog;
  probe?: ExecutableProbe;
  launcher?: Launcher;
  logger?: Logger;
}

export function ensureDisplay(config: Config): void {
  // An empty value still counts as set.
  if (config.display.x11 === undefined && config.display.wayland === undefined) {
    throw new MissingDisplayError();
  }
}

/**
 * Runs the pre-flight checks and one protocol session, returning the process
 * exit code. Configuration failures are reported before any protocol output.
 */
export async function runPinentry(options: RunPinentryOptions): Promise<number> {
  const base = options.logger ?? logger;
  const log = base.child({ component: 'app' });

  try {
    ensureDisplay(options.config);

    const requested = options.args[0] || options.config.runner.requested;
    const runner = resolveRunner(requested, options.catalog ?? RUNNER_CATALOG, {
      probe: options.probe,
      logger: base.child({ component: 'runner-resolver' }),
    });
    log.info({ runner: runner.name, requested }, 'Runner resolved');

    const session = new PinentrySession({
      runner,
      launcher: options.launcher ?? new ProcessLauncher(),
    });
    const outcome = await session.run(options.input, options.output);

    log.info({ outcome }, 'Session ended');
    return 0;
  } catch (err) {
    if (!(err instanceof PinentryMenuError)) {
      throw err;
    }

    // stderr gets the single `Error:` line; the record is for the debug log.
    log.debug({ err, code: err.code }, 'Fatal configuration error');
    options.errorOutput.write(`Error: ${err.message}\n`);
    return 1;
  }
}

/** Runs a session on `handle`'s logger and releases it whichever way the run ends. */
export async function runWithLogger(
  handle: LoggerHandle,
  options: Omit<RunPinentryOptions, 'logger'>
): Promise<number> {
  try {
    return await runPinentry({ ...options, logger: handle.logger });
  } catch (err) {
    handle.logger.fatal({ err }, 'Pinentry run failed');
    throw err;
  } finally {
    handle.close();
  }
}
