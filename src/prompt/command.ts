import type { RunnerTemplate } from '../runners/types.js';
import type { PromptText } from './types.js';

const PLACEHOLDER_PATTERN = /\{(prompt|message)\}/g;

/**
 * Expands a launcher template into an argument vector. Each template word
 * becomes exactly one argument, so whitespace or quotes inside the prompt
 * text can never introduce extra arguments.
 */
export function buildArgv(template: RunnerTemplate, text: PromptText): [string, ...string[]] {
  const [executable, ...args] = template;
  return [
    expandWord(executable, text),
    ...args.map((word) => expandWord(word, text)),
  ];
}

function expandWord(word: string, text: PromptText): string {
  // A replacer function keeps `$&`-style patterns in the text literal.
  const expanded = word.replace(PLACEHOLDER_PATTERN, (_match: string, name: string) =>
    name === 'prompt' ? text.prompt : text.message
  );
  // Words joining two parts drop the separator when one side is empty.
  return word.includes(' ') ? expanded.trim() : expanded;
}
