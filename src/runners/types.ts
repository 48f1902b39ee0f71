export type PlaceholderName = 'prompt' | 'message';

/** Launcher argv; word 0 is the executable looked up on PATH. */
export type RunnerTemplate = readonly [executable: string, ...args: string[]];

export interface RunnerSpec {
  name: string;
  template: RunnerTemplate;
}

export type RunnerCatalog = ReadonlyMap<string, RunnerSpec>;

export interface ResolvedRunner {
  readonly name: string;
  readonly executableTemplate: RunnerTemplate;
}

/** Reports whether an executable can be found; must not run it. */
export type ExecutableProbe = (executable: string) => boolean;
