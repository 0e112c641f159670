import type { AnimalType } from "../../../shared/constants/AnimalEnums";
import type {
  AnimalSeed,
  DeathRecord,
  HuntRecord,
  PopulationCounts,
} from "./animals";
import type { EnvironmentEventRecord, ResourceLevels } from "./resources";

/**
 * Read model of the ecosystem handed to UIs.
 */
export interface EcosystemSnapshot {
  turn: number;
  counts: PopulationCounts;
  total: number;
  resources: ResourceLevels;
  healthy: boolean;
}

/**
 * Everything that happened during one turn, in pipeline order.
 */
export interface TurnReport {
  turn: number;
  regenerated: ResourceLevels;
  /** Herbivores that found enough grass */
  foraged: number;
  /** Herbivores that went hungry */
  hungry: number;
  kills: HuntRecord[];
  /** Animals that got their full water ration */
  drank: number;
  deaths: DeathRecord[];
  births: Array<{ animalId: string; type: AnimalType }>;
  events: EnvironmentEventRecord[];
}

export interface InitialEcosystem {
  population: AnimalSeed[];
  resources: ResourceLevels;
}

export interface SimulationOptions {
  /** Energy granted for a full water ration; 0 makes drinking energy-neutral */
  drinkEnergyGain: number;
}
