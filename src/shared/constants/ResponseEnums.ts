/**
 * Response status enumerations for API responses.
 *
 * @module shared/constants/ResponseEnums
 */

/**
 * Enumeration of response status values for API responses.
 */
export enum ResponseStatus {
  OK = "ok",
}
