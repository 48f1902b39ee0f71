import type { Logger } from 'pino';
import { logger } from '../utils/logger.js';
import { isExecutableOnPath } from '../utils/system.js';
import { NoRunnerAvailableError, UnsupportedRunnerError } from '../utils/errors.js';
import type { ExecutableProbe, ResolvedRunner, RunnerCatalog, RunnerSpec } from './types.js';

const defaultLog = logger.child({ component: 'runner-resolver' });

export interface ResolveRunnerOptions {
  probe?: ExecutableProbe;
  logger?: Logger;
}

function toResolved(spec: RunnerSpec): ResolvedRunner {
  return { name: spec.name, executableTemplate: spec.template };
}

/**
 * Picks the launcher for this session. An unknown request is fatal; a known
 * request whose executable is missing falls back to the first installed entry
 * in catalog order.
 */
export function resolveRunner(
  requested: string | undefined,
  catalog: RunnerCatalog,
  options: ResolveRunnerOptions = {}
): ResolvedRunner {
  const probe = options.probe ?? isExecutableOnPath;
  const log = options.logger ?? defaultLog;

  if (requested) {
    const spec = catalog.get(requested);
    if (!spec) {
      throw new UnsupportedRunnerError(requested, [...catalog.keys()]);
    }

    if (probe(spec.template[0])) {
      log.debug({ runner: spec.name }, 'Using requested runner');
      return toResolved(spec);
    }

    log.warn({ requested }, `requested runner '${requested}' not found, falling back`);
  }

  for (const spec of catalog.values()) {
    if (probe(spec.template[0])) {
      log.debug({ runner: spec.name, requested }, 'Using first installed runner');
      return toResolved(spec);
    }
  }

  throw new NoRunnerAvailableError([...catalog.keys()]);
}
