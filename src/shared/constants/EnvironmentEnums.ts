/**
 * Environment enumerations: weather events and execution environments.
 *
 * @module shared/constants/EnvironmentEnums
 */

/**
 * Enumeration of random environmental events that swing resource levels.
 */
export enum EnvironmentEvent {
  DROUGHT = "drought",
  RAIN = "rain",
}

/**
 * Enumeration of execution environments.
 */
export enum Environment {
  PRODUCTION = "production",
}
