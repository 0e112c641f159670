/**
 * Resource type enumerations for the ecosystem simulation.
 *
 * @module shared/constants/ResourceEnums
 */

/**
 * Enumeration of the shared resources held by the resource pool.
 */
export enum ResourceType {
  GRASS = "grass",
  WATER = "water",
}
