/**
 * Log level enumerations for the simulation system.
 *
 * Defines all log levels used in the logging system.
 *
 * @module shared/constants/LogEnums
 */

/**
 * Enumeration of log levels, lowest severity first.
 */
export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

/**
 * Enumeration of log categories for identifying which system generated the log.
 * Useful for filtering and analyzing behavior by subsystem.
 */
export enum LogCategory {
  /** Turn pipeline and engine lifecycle */
  SIMULATION = "simulation",
  /** Foraging, hunting and drinking */
  ANIMALS = "animals",
  /** Births, aging and deaths */
  LIFECYCLE = "lifecycle",
  /** Resource pool and environmental events */
  WORLD = "world",
  /** HTTP requests and controllers */
  HTTP = "http",
  /** General/uncategorized logs */
  GENERAL = "general",
}
