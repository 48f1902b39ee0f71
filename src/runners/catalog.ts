import type { PlaceholderName, RunnerCatalog, RunnerSpec, RunnerTemplate } from './types.js';

export const PLACEHOLDERS: readonly PlaceholderName[] = ['prompt', 'message'];

export function countPlaceholder(template: RunnerTemplate, name: PlaceholderName): number {
  const token = `{${name}}`;
  return template.reduce((count, word) => count + word.split(token).length - 1, 0);
}

/**
 * Builds a read-only catalog, rejecting duplicate names and templates that do
 * not carry each placeholder exactly once.
 */
export function createCatalog(specs: readonly RunnerSpec[]): RunnerCatalog {
  const catalog = new Map<string, RunnerSpec>();

  for (const spec of specs) {
    if (catalog.has(spec.name)) {
      throw new Error(`Duplicate runner '${spec.name}' in catalog`);
    }

    for (const placeholder of PLACEHOLDERS) {
      const count = countPlaceholder(spec.template, placeholder);
      if (count !== 1) {
        throw new Error(
          `Runner '${spec.name}' must use {${placeholder}} exactly once, found ${count}`
        );
      }
    }

    catalog.set(spec.name, spec);
  }

  return catalog;
}

// Declaration order is the fallback order when several launchers are installed.
export const RUNNER_CATALOG: RunnerCatalog = createCatalog([
  {
    name: 'rofi',
    template: ['rofi', '-dmenu', '-input', '/dev/null', '-password', '-lines', '0', '-p', '{prompt}', '-mesg', '{message}'],
  },
  {
    // wofi has no separate message line
    name: 'wofi',
    template: ['wofi', '--dmenu', '--cache-file', '/dev/null', '--password', '--prompt', '{prompt} {message}'],
  },
  {
    name: 'fuzzel',
    template: ['fuzzel', '--prompt-only={prompt} {message}', '--cache', '/dev/null', '--dmenu', '--password'],
  },
]);
