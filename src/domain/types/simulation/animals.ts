import type {
  AnimalDiet,
  AnimalType,
  DeathCause,
} from "../../../shared/constants/AnimalEnums";

export interface Animal {
  id: string;
  type: AnimalType;
  /** Turns lived */
  age: number;
  energy: number;
}

/**
 * Seed data for an animal, as supplied at construction time.
 * Fields left out take newborn values.
 */
export interface AnimalSeed {
  type: string;
  age?: number;
  energy?: number;
}

interface BaseAnimalConfig {
  type: AnimalType;
  displayName: string;

  /** Chance of one birth per turn once two fertile adults exist */
  reproductionRate: number;
  /** Minimum age (turns) to be fertile */
  reproductionAge: number;
  /** Maximum age; older animals die */
  lifespan: number;
  /** Energy lost per turn */
  energyCost: number;
  /** Energy gained per successful feeding event */
  feedingEnergyGain: number;
}

export interface GrazerConfig extends BaseAnimalConfig {
  diet: AnimalDiet.GRASS;
  /** Grass taken from the pool per turn */
  grassRation: number;
  /** Least grass that still counts as a meal */
  hungerThreshold: number;
}

export interface PredatorConfig extends BaseAnimalConfig {
  diet: AnimalDiet.PREY;
  preferredPrey: AnimalType;
  huntSuccessChance: number;
}

export type AnimalConfig = GrazerConfig | PredatorConfig;

export type PopulationCounts = Record<AnimalType, number>;

export interface HuntRecord {
  hunterId: string;
  hunterType: AnimalType;
  preyId: string;
  preyType: AnimalType;
}

export interface DeathRecord {
  animalId: string;
  type: AnimalType;
  cause: DeathCause;
  age: number;
}
