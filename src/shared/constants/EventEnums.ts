/**
 * Simulation event enumerations.
 *
 * @module shared/constants/EventEnums
 */

/**
 * Enumeration of events emitted on the simulation event bus.
 */
export enum GameEventType {
  TURN_COMPLETED = "turn_completed",
  ANIMAL_BORN = "animal_born",
  ANIMAL_INTRODUCED = "animal_introduced",
  ANIMAL_DIED = "animal_died",
  ANIMAL_HUNTED = "animal_hunted",
  ENVIRONMENT_EVENT = "environment_event",
  RESOURCES_ADDED = "resources_added",
  SPECIES_EXTINCT = "species_extinct",
}

