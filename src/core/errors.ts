export class GeneratorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'GeneratorError';
  }
}

export class ConfigError extends GeneratorError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class SourceFileError extends GeneratorError {
  constructor(message: string, public readonly path: string, cause?: Error) {
    super(message, 'SOURCE_FILE_ERROR', 'io', cause);
    this.name = 'SourceFileError';
  }
}

export class UnknownMachineError extends GeneratorError {
  constructor(public readonly machine: string) {
    super(`Unknown machine: ${machine}`, 'UNKNOWN_MACHINE', 'query');
    this.name = 'UnknownMachineError';
  }
}

export class KernelSignatureError extends GeneratorError {
  constructor(message: string, public readonly kernel: string, public readonly impl: string) {
    super(message, 'KERNEL_SIGNATURE_ERROR', 'extract');
    this.name = 'KernelSignatureError';
  }
}

/** Narrow an unknown thrown value to an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
