export type ChatErrorCode =
  | 'MODEL_UNAVAILABLE'
  | 'DATA_UNAVAILABLE'
  | 'DATABASE_ERROR'
  | 'INVALID_TOOL_PARAMETERS'
  | 'CONFIG_ERROR';

export class ChatError extends Error {
  readonly code: ChatErrorCode;

  constructor(code: ChatErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The language model call failed or timed out. */
export class ModelUnavailableError extends ChatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MODEL_UNAVAILABLE', message, options);
  }
}

/** The dataset store could not be reached or the table is missing. */
export class DataUnavailableError extends ChatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DATA_UNAVAILABLE', message, options);
  }
}

export class DatabaseError extends ChatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DATABASE_ERROR', message, options);
  }
}

export class InvalidToolParametersError extends ChatError {
  readonly parameter: string;

  constructor(parameter: string, message: string) {
    super('INVALID_TOOL_PARAMETERS', message);
    this.parameter = parameter;
  }
}

export class ConfigError extends ChatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_ERROR', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof ChatError) {
    return { name: error.name, code: error.code, message: error.message, cause: error.cause === undefined ? undefined : errorMessage(error.cause) };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { error: String(error) };
}
