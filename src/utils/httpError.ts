export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export const notFound = (message = 'The requested page could not be found.') => new HttpError(404, message);

export const forbidden = (message = 'You do not have permission to access this page.') => new HttpError(403, message);

export const badRequest = (message: string) => new HttpError(400, message);
