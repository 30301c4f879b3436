export default class HttpError extends Error {
  status: number;
  details?: unknown;

  constructor(status: number, message: string, details?: unknown) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.details = details;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpError);
    }
  }

  static notFound(entity: string, id: number | string): HttpError {
    return new HttpError(404, `${entity} ${id} not found`);
  }

  static badRequest(message: string, details?: unknown): HttpError {
    return new HttpError(400, message, details);
  }

  static conflict(message: string, details?: unknown): HttpError {
    return new HttpError(409, message, details);
  }
}
