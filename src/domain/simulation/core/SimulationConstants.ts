/**
 * Tunable constants of the turn pipeline.
 * Species-specific values live in AnimalConfigs.
 *
 * Usage:
 * import { SIM_CONSTANTS } from '../core/SimulationConstants';
 * const cap = SIM_CONSTANTS.MAX_ENERGY;
 */
export const SIM_CONSTANTS = {
  // === Energy ===
  MAX_ENERGY: 150,
  NEWBORN_ENERGY: 100,
  /** Energy must exceed this for an adult to be fertile */
  FERTILITY_ENERGY: 60,
  MIN_FERTILE_ADULTS: 2,

  // === Resource regeneration (inclusive ranges) ===
  GRASS_REGEN_MIN: 50,
  GRASS_REGEN_MAX: 100,
  WATER_REGEN_MIN: 30,
  WATER_REGEN_MAX: 70,

  // === Drinking ===
  WATER_RATION: 2,

  // === Environmental events ===
  DROUGHT_CHANCE: 0.05,
  RAIN_CHANCE: 0.05,
  DROUGHT_GRASS_LOSS: 0.4,
  DROUGHT_WATER_LOSS: 0.3,
  RAIN_GRASS_GAIN: 300,
  RAIN_WATER_GAIN: 400,

  // === Ecosystem health ===
  HEALTHY_MIN_POPULATION: 10,
  /** Resources must exceed this for the ecosystem to count as healthy */
  HEALTHY_MIN_RESOURCE: 100,
} as const;
