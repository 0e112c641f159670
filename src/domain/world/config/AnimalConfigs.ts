import type {
  AnimalConfig,
  GrazerConfig,
  PredatorConfig,
} from "../../types/simulation/animals";
import {
  AnimalDiet,
  AnimalType,
  isAnimalType,
} from "../../../shared/constants/AnimalEnums";
import { InvalidSpeciesError } from "../../../shared/errors/EcosystemErrors";

const HUNT_SUCCESS_CHANCE = 0.3;
const HUNT_ENERGY_GAIN = 40;

export const ANIMAL_CONFIGS: Readonly<Record<AnimalType, AnimalConfig>> = {
  [AnimalType.RABBIT]: {
    type: AnimalType.RABBIT,
    displayName: "Rabbit",
    diet: AnimalDiet.GRASS,

    reproductionRate: 0.5,
    reproductionAge: 2,
    lifespan: 8,
    energyCost: 5,
    feedingEnergyGain: 10,

    grassRation: 10,
    hungerThreshold: 5,
  },

  [AnimalType.DEER]: {
    type: AnimalType.DEER,
    displayName: "Deer",
    diet: AnimalDiet.GRASS,

    reproductionRate: 0.3,
    reproductionAge: 3,
    lifespan: 15,
    energyCost: 8,
    feedingEnergyGain: 20,

    grassRation: 20,
    hungerThreshold: 10,
  },

  [AnimalType.FOX]: {
    type: AnimalType.FOX,
    displayName: "Fox",
    diet: AnimalDiet.PREY,

    reproductionRate: 0.2,
    reproductionAge: 3,
    lifespan: 10,
    energyCost: 12,
    feedingEnergyGain: HUNT_ENERGY_GAIN,

    preferredPrey: AnimalType.RABBIT,
    huntSuccessChance: HUNT_SUCCESS_CHANCE,
  },

  [AnimalType.WOLF]: {
    type: AnimalType.WOLF,
    displayName: "Wolf",
    diet: AnimalDiet.PREY,

    reproductionRate: 0.15,
    reproductionAge: 4,
    lifespan: 12,
    energyCost: 15,
    feedingEnergyGain: HUNT_ENERGY_GAIN,

    preferredPrey: AnimalType.DEER,
    huntSuccessChance: HUNT_SUCCESS_CHANCE,
  },
};

export function getAnimalConfig(type: AnimalType): AnimalConfig {
  return ANIMAL_CONFIGS[type];
}

/**
 * Resolves a species identifier from outside the engine.
 * @throws InvalidSpeciesError for anything that is not a known species
 */
export function resolveAnimalType(value: unknown): AnimalType {
  if (!isAnimalType(value)) {
    throw new InvalidSpeciesError(value);
  }
  return value;
}

export function isGrazer(config: AnimalConfig): config is GrazerConfig {
  return config.diet === AnimalDiet.GRASS;
}

export function isPredator(config: AnimalConfig): config is PredatorConfig {
  return config.diet === AnimalDiet.PREY;
}
