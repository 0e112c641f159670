/**
 * Error code enumerations for the ecosystem domain.
 *
 * @module shared/constants/ErrorEnums
 */

/**
 * Codes carried by domain errors and returned in API error bodies.
 */
export enum EcosystemErrorCode {
  INVALID_SPECIES = "INVALID_SPECIES",
  INVALID_AMOUNT = "INVALID_AMOUNT",
}
