import type { RunnerTemplate } from '../runners/types.js';

export interface PromptText {
  prompt: string;
  message: string;
}

export interface LaunchResult {
  /** Text the launcher printed, or null when nothing usable was returned. */
  secret: string | null;
  /** False when the launcher exited non-zero or was killed. */
  accepted: boolean;
}

export interface Launcher {
  prompt(template: RunnerTemplate, text: PromptText): Promise<LaunchResult>;
}
