/**
 * REST API Error Class
 * All errors in the application should be converted to this type
 */
export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ApiError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export const Errors = {
  // 400 Bad Request (malformed identifiers, wrong flags)
  badRequest: (message: string, field?: string) => new ApiError(400, message, field),

  // 400 Bad Request: registration collides with an existing account
  conflict: (message: string) => new ApiError(400, message),

  // 401 Unauthorized
  unauthorized: (message: string) => new ApiError(401, message),

  // 404 Not Found
  notFound: (resource: string) => new ApiError(404, `${resource} not found`),

  // 422 Unprocessable Entity: request body has the wrong shape
  validation: (message: string, field?: string) => new ApiError(422, message, field),

  // 500 Internal Server Error
  internal: (message = 'Internal server error') => new ApiError(500, message),
};
