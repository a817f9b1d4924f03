export type StructuralErrorCode =
  | 'MISSING_DOCUMENT_PART'
  | 'MALFORMED_XML'
  | 'XML_TOO_LARGE'
  | 'DUPLICATE_REFERENCE'
  | 'INVALID_NOTE_INPUT';

export class AppError extends Error {
  public statusCode: number;
  public isOperational: boolean;
  public code?: string;

  constructor(message: string, statusCode: number, code?: string) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = true;
    this.code = code;

    Error.captureStackTrace(this, this.constructor);
  }

  static badRequest(message: string, code?: string): AppError {
    return new AppError(message, 400, code || 'BAD_REQUEST');
  }

  /**
   * Document-level failure: the conversion is aborted and the caller
   * leaves the original document untouched.
   */
  static structural(message: string, code: StructuralErrorCode): AppError {
    return new AppError(message, 422, code);
  }
}
