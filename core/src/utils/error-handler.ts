import { GenerationErrorCode, GenerationErrorDetails } from '../types';

export class GenerationError extends Error {
  constructor(
    public readonly code: GenerationErrorCode,
    message: string,
    public readonly details?: GenerationErrorDetails
  ) {
    super(message);
    this.name = 'GenerationError';
  }
}

export class ErrorHandler {
  static createError(code: GenerationErrorCode, message: string, details?: GenerationErrorDetails): GenerationError {
    return new GenerationError(code, message, details);
  }

  static invalidSpec(field: string, message: string, value?: unknown): GenerationError {
    return new GenerationError(GenerationErrorCode.InvalidSpec, `${field}: ${message}`, { field, value });
  }

  static invalidGeometry(message: string, details?: GenerationErrorDetails): GenerationError {
    return new GenerationError(GenerationErrorCode.InvalidGeometry, message, details);
  }

  static isGenerationError(error: unknown): error is GenerationError {
    return error instanceof GenerationError;
  }

  static isSpecError(error: unknown): boolean {
    return ErrorHandler.isGenerationError(error) && error.code === GenerationErrorCode.InvalidSpec;
  }

  static isGeometryError(error: unknown): boolean {
    return ErrorHandler.isGenerationError(error) && error.code === GenerationErrorCode.InvalidGeometry;
  }

  static formatError(error: unknown): string {
    if (ErrorHandler.isGenerationError(error)) {
      return `[${error.code}] ${error.message}`;
    }
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  }
}
