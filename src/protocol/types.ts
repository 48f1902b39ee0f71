import type { Launcher, PromptText } from '../prompt/types.js';
import type { ResolvedRunner } from '../runners/types.js';

export interface SessionState extends PromptText {
  errorAnnotation?: string;
}

/** `closed` after BYE, `disconnected` when the peer hung up first. */
export type SessionOutcome = 'closed' | 'disconnected';

export interface PinentrySessionOptions {
  runner: ResolvedRunner;
  launcher: Launcher;
  /** Reported by GETINFO pid; defaults to this process. */
  pid?: number;
}
