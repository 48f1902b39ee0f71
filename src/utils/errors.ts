export class PinentryMenuError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PinentryMenuError';
  }
}

export class ConfigError extends PinentryMenuError {
  constructor(public readonly issues: string[]) {
    super(
      `invalid configuration: ${issues.join('; ')}`,
      'INVALID_CONFIG',
      { issues }
    );
    this.name = 'ConfigError';
  }
}

export class MissingDisplayError extends PinentryMenuError {
  constructor() {
    super(
      'DISPLAY or WAYLAND_DISPLAY must be set.',
      'MISSING_DISPLAY'
    );
    this.name = 'MissingDisplayError';
  }
}

export class UnsupportedRunnerError extends PinentryMenuError {
  constructor(requested: string, supported: string[]) {
    super(
      `requested runner '${requested}' not supported, exiting.`,
      'UNSUPPORTED_RUNNER',
      { requested, supported }
    );
    this.name = 'UnsupportedRunnerError';
  }
}

export class NoRunnerAvailableError extends PinentryMenuError {
  constructor(candidates: string[]) {
    super(
      'no supported runners found',
      'NO_RUNNER_AVAILABLE',
      { candidates }
    );
    this.name = 'NoRunnerAvailableError';
  }
}

export class LauncherSpawnError extends PinentryMenuError {
  constructor(executable: string, cause?: Error) {
    super(
      `Failed to spawn launcher '${executable}': ${cause?.message ?? 'unknown error'}`,
      'LAUNCHER_SPAWN_FAILED',
      { executable, cause: cause?.message }
    );
    this.name = 'LauncherSpawnError';
  }
}
