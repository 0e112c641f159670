/**
 * HTTP status code enumerations for API responses.
 *
 * Defines the HTTP status codes used in controllers to ensure type safety
 * and prevent magic numbers in response handling.
 *
 * @module shared/constants/HttpStatusCodes
 */

/**
 * Enumeration of HTTP status codes used in the application.
 */
export enum HttpStatusCode {
  BAD_REQUEST = 400,
  NOT_FOUND = 404,

  INTERNAL_SERVER_ERROR = 500,
}
