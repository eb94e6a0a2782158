export class HostwatchError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'HostwatchError';
    this.code = code;
  }
}

export class ConfigValidationError extends HostwatchError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed:\n${errors.join('\n')}`, 'CONFIG_VALIDATION_ERROR');
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

export class CommandFailedError extends HostwatchError {
  public readonly command: string;
  public readonly exitCode: number | null;

  constructor(command: string, exitCode: number | null, detail?: string) {
    const suffix = detail ? `: ${detail}` : '';
    super(`Command failed (${command}, exit ${exitCode ?? 'none'})${suffix}`, 'COMMAND_FAILED');
    this.name = 'CommandFailedError';
    this.command = command;
    this.exitCode = exitCode;
  }
}

export class SinkWriteError extends HostwatchError {
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to append to ${path}: ${reason}`, 'SINK_WRITE_FAILED');
    this.name = 'SinkWriteError';
    this.path = path;
  }
}
