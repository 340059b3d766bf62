export type ErrorStage =
  | 'config'
  | 'initialize'
  | 'reset'
  | 'save'
  | 'release'
  | 'observe'
  | 'process'
  | 'predict'
  | 'instructions';

export class ContainerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: ErrorStage,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ContainerError';
  }
}

export class ConfigError extends ContainerError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

/**
 * An operation was called in a lifecycle phase that does not permit it.
 * Always a programming error on the caller's side.
 */
export class LifecycleError extends ContainerError {
  constructor(
    public readonly operation: string,
    public readonly phase: string,
    detail?: string,
  ) {
    super(
      `Cannot ${operation} while container is ${phase}${detail ? `: ${detail}` : ''}`,
      'INVALID_STATE',
    );
    this.name = 'LifecycleError';
  }
}

export class InitializationError extends ContainerError {
  constructor(message: string, cause?: Error) {
    super(message, 'INITIALIZATION_FAILED', 'initialize', cause);
    this.name = 'InitializationError';
  }
}

export class StorageError extends ContainerError {
  constructor(
    message: string,
    public readonly operation: string,
    stage?: ErrorStage,
    cause?: Error,
  ) {
    super(message, 'STORAGE_ERROR', stage, cause);
    this.name = 'StorageError';
  }
}

export class EngineError extends ContainerError {
  constructor(
    message: string,
    public readonly operation: string,
    stage?: ErrorStage,
    cause?: Error,
  ) {
    super(message, 'ENGINE_ERROR', stage, cause);
    this.name = 'EngineError';
  }
}

export class ObservationError extends ContainerError {
  constructor(message: string, cause?: Error) {
    super(message, 'OBSERVATION_ERROR', 'observe', cause);
    this.name = 'ObservationError';
  }
}

export class InstructionParseError extends ContainerError {
  constructor(message: string, public readonly line: number, cause?: Error) {
    super(`Line ${line}: ${message}`, 'INSTRUCTION_PARSE_ERROR', 'instructions', cause);
    this.name = 'InstructionParseError';
  }
}

/**
 * Normalise anything thrown into an Error instance.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}
