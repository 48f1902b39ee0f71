import { execFileSync } from 'child_process';
import { logger } from './logger.js';

const log = logger.child({ component: 'system' });

const presence = new Map<string, boolean>();

/**
 * Looks an executable up on PATH without running it. Answers are cached for
 * the life of the process.
 */
export function isExecutableOnPath(name: string): boolean {
  const cached = presence.get(name);
  if (cached !== undefined) {
    return cached;
  }

  let found: boolean;
  try {
    // The name travels as $1 so it is never parsed by the shell.
    execFileSync('/bin/sh', ['-c', 'command -v "$1"', 'sh', name], { stdio: 'ignore' });
    found = true;
  } catch {
    found = false;
  }

  log.debug({ executable: name, found }, 'Probed executable');
  presence.set(name, found);
  return found;
}
