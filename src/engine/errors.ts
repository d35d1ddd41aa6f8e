export type GenerationErrorCode =
  | "InvalidConfiguration"
  | "UnknownClassOrTradition"
  | "DataIntegrityError";

export class CharacterGenerationError extends Error {
  readonly code: GenerationErrorCode;

  constructor(code: GenerationErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidConfigurationError extends CharacterGenerationError {
  constructor(message: string) {
    super("InvalidConfiguration", message);
  }
}

export class UnknownClassOrTraditionError extends CharacterGenerationError {
  constructor(message: string) {
    super("UnknownClassOrTradition", message);
  }
}

export class DataIntegrityError extends CharacterGenerationError {
  readonly path: string;

  constructor(path: string, message: string) {
    super("DataIntegrityError", path ? `${path}: ${message}` : message);
    this.path = path;
  }
}

export function isGenerationError(error: unknown): error is CharacterGenerationError {
  return error instanceof CharacterGenerationError;
}
