export class HttpError extends Error {
  statusCode: number;
  code: string;
  details?: unknown;

  constructor(statusCode: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = "HttpError";
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export function badRequest(code: string, message: string, details?: unknown): never {
  throw new HttpError(400, code, message, details);
}

export function notFound(message: string, details?: unknown): never {
  throw new HttpError(404, "not_found", message, details);
}
