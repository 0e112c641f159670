/**
 * Dependency injection type symbols.
 *
 * Used by Inversify container to identify and resolve dependencies.
 *
 * @module config
 */
export const TYPES = {
  SimulationEngine: Symbol.for("SimulationEngine"),
  RandomSource: Symbol.for("RandomSource"),
  InitialPopulation: Symbol.for("InitialPopulation"),
  InitialResources: Symbol.for("InitialResources"),
  SimulationOptions: Symbol.for("SimulationOptions"),
};
