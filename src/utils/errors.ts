export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string,
    public readonly details?: string[]
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class BadRequestError extends HttpError {
  constructor(details?: string[]) {
    super(400, "invalid request", details);
  }
}

export class NotFoundError extends HttpError {
  constructor() {
    super(404, "not found");
  }
}

export class MethodNotAllowedError extends HttpError {
  constructor() {
    super(405, "method not allowed");
  }
}

// Well-formed request that refers to something that can't be used, e.g. an unknown category
export class UnprocessableEntityError extends HttpError {
  constructor() {
    super(422, "could not process the request");
  }
}

export const INTERNAL_ERROR_MESSAGE = "internal server error";
