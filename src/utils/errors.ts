export class HttpError extends Error {
  public readonly name: string = 'HttpError';

  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
  }
}

export class BadRequestError extends HttpError {
  public readonly name = 'BadRequestError';

  constructor(message: string) {
    super(400, message);
  }
}

export class NotFoundError extends HttpError {
  public readonly name = 'NotFoundError';

  constructor(message = 'Not found') {
    super(404, message);
  }
}
