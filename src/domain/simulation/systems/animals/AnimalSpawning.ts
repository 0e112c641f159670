import type { Animal, AnimalSeed } from "../../../types/simulation/animals";
import type { AnimalRegistry } from "../../core/AnimalRegistry";
import type { RandomUtils } from "../../../../shared/utils/RandomUtils";
import {
  ALL_ANIMAL_TYPES,
  type AnimalType,
} from "../../../../shared/constants/AnimalEnums";
import { InvalidAmountError } from "../../../../shared/errors/EcosystemErrors";
import {
  getAnimalConfig,
  resolveAnimalType,
} from "../../../world/config/AnimalConfigs";
import { SIM_CONSTANTS } from "../../core/SimulationConstants";
import { AnimalLifecycle } from "./AnimalLifecycle";

interface ValidatedSeed {
  type: AnimalType;
  age: number;
  energy: number;
}

export class AnimalSpawning {
  public static spawnNewborn(
    registry: AnimalRegistry,
    type: AnimalType,
  ): Animal {
    return registry.spawn(type, 0, SIM_CONSTANTS.NEWBORN_ENERGY);
  }

  /**
   * Checks a seed without touching any registry.
   * @throws InvalidSpeciesError or InvalidAmountError
   */
  public static validateSeed(seed: AnimalSeed): ValidatedSeed {
    const type = resolveAnimalType(seed.type);
    const age = seed.age ?? 0;
    const energy = seed.energy ?? SIM_CONSTANTS.NEWBORN_ENERGY;

    const { lifespan } = getAnimalConfig(type);
    if (!Number.isInteger(age) || age < 0 || age > lifespan) {
      throw new InvalidAmountError("age", age, `an integer from 0 to ${lifespan}`);
    }
    if (
      !Number.isInteger(energy) ||
      energy < 1 ||
      energy > SIM_CONSTANTS.MAX_ENERGY
    ) {
      throw new InvalidAmountError(
        "energy",
        energy,
        `an integer from 1 to ${SIM_CONSTANTS.MAX_ENERGY}`,
      );
    }
    return { type, age, energy };
  }

  /**
   * Validates the whole batch first, then registers it, so a bad seed
   * leaves the registry untouched.
   */
  public static seedPopulation(
    registry: AnimalRegistry,
    seeds: readonly AnimalSeed[],
  ): Animal[] {
    const validated = seeds.map((seed) => AnimalSpawning.validateSeed(seed));
    return validated.map(({ type, age, energy }) =>
      registry.spawn(type, age, energy),
    );
  }

  /**
   * At most one birth per species: needs two fertile adults and a
   * successful draw against the species' reproduction rate.
   */
  public static reproduce(
    registry: AnimalRegistry,
    random: RandomUtils,
  ): Animal[] {
    const births: Animal[] = [];

    for (const type of ALL_ANIMAL_TYPES) {
      const fertile = registry
        .getByType(type)
        .filter((animal) => AnimalLifecycle.isFertile(animal));
      if (fertile.length < SIM_CONSTANTS.MIN_FERTILE_ADULTS) continue;

      if (random.chance(getAnimalConfig(type).reproductionRate)) {
        births.push(AnimalSpawning.spawnNewborn(registry, type));
      }
    }

    return births;
  }
}
