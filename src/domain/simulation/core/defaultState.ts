import { AnimalType } from "../../../shared/constants/AnimalEnums";
import type { AnimalSeed } from "../../types/simulation/animals";
import type { InitialEcosystem } from "../../types/simulation/ecosystem";
import type { AppConfig } from "../../../config/config";

/**
 * Starting world of a fresh game: 20 rabbits, 10 deer, 5 foxes, 3 wolves,
 * 1000 grass and 1000 water unless configured otherwise.
 */
export function createInitialEcosystem(
  initial: AppConfig["INITIAL"],
): InitialEcosystem {
  const population: AnimalSeed[] = [
    ...seeds(AnimalType.RABBIT, initial.RABBITS),
    ...seeds(AnimalType.DEER, initial.DEER),
    ...seeds(AnimalType.FOX, initial.FOXES),
    ...seeds(AnimalType.WOLF, initial.WOLVES),
  ];

  return {
    population,
    resources: { grass: initial.GRASS, water: initial.WATER },
  };
}

function seeds(type: AnimalType, count: number): AnimalSeed[] {
  return Array.from({ length: count }, () => ({ type }));
}
