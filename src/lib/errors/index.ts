export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    statusCode: number,
    isOperational: boolean = true
  ) {
    super(message);
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    code: string = 'VALIDATION_ERROR',
    statusCode: number = 400
  ) {
    super(message, code, statusCode, true);
  }
}

export class NotFoundError extends AppError {
  constructor(
    message: string,
    code: string = 'NOT_FOUND',
    statusCode: number = 404
  ) {
    super(message, code, statusCode, true);
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(
    message: string,
    code: string = 'PAYLOAD_TOO_LARGE',
    statusCode: number = 413
  ) {
    super(message, code, statusCode, true);
  }
}

export class UnsupportedMediaTypeError extends AppError {
  constructor(
    message: string,
    code: string = 'UNSUPPORTED_MEDIA_TYPE',
    statusCode: number = 415
  ) {
    super(message, code, statusCode, true);
  }
}

export class InternalError extends AppError {
  constructor(
    message: string,
    code: string = 'INTERNAL_ERROR',
    statusCode: number = 500,
    isOperational: boolean = false
  ) {
    super(message, code, statusCode, isOperational);
  }
}

// ============================================================================
// STORAGE HANDSHAKE
// ============================================================================

/** The store refused to issue an upload credential. */
export class PresignError extends AppError {
  readonly key: string;

  constructor(key: string, cause?: unknown) {
    super(`Presigned upload could not be generated for ${key}`, 'PRESIGN_FAILED', 502, true);
    this.key = key;
    this.cause = cause;
  }
}

/** The multipart submission never came back with 204. */
export class UploadError extends AppError {
  readonly key: string;
  readonly lastStatus: number | null;
  readonly attempts: number;

  constructor(key: string, lastStatus: number | null, attempts: number, cause?: unknown) {
    const reason = lastStatus === null ? 'no response' : `status ${lastStatus}`;
    super(`Image upload failed after ${attempts} attempt(s) (${reason})`, 'UPLOAD_FAILED', 502, true);
    this.key = key;
    this.lastStatus = lastStatus;
    this.attempts = attempts;
    this.cause = cause;
  }
}

/** Reading the labelled key failed for a reason other than "not there yet". */
export class ResultReadError extends AppError {
  readonly key: string;

  constructor(key: string, cause?: unknown) {
    super(`Result image could not be read from ${key}`, 'RESULT_READ_FAILED', 502, true);
    this.key = key;
    this.cause = cause;
  }
}
