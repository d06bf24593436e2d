export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found') {
    super(message, 'NOT_FOUND', 404);
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Invalid request') {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

/** The media host rejected an upload; the message carries the host's reason. */
export class UploadError extends AppError {
  constructor(cause: string) {
    super(`Image upload failed: ${cause}`, 'UPLOAD_FAILED', 400);
  }
}
