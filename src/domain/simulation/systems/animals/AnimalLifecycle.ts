import type {
  Animal,
  DeathRecord,
} from "../../../types/simulation/animals";
import type { AnimalRegistry } from "../../core/AnimalRegistry";
import { DeathCause } from "../../../../shared/constants/AnimalEnums";
import { getAnimalConfig } from "../../../world/config/AnimalConfigs";
import { SIM_CONSTANTS } from "../../core/SimulationConstants";

/**
 * Aging, metabolism and death.
 */
export class AnimalLifecycle {
  /**
   * One turn older; pays the species' energy cost.
   */
  public static ageAll(registry: AnimalRegistry): void {
    for (const animal of registry.getAll()) {
      animal.age += 1;
      animal.energy -= getAnimalConfig(animal.type).energyCost;
    }
  }

  public static getDeathCause(animal: Animal): DeathCause | null {
    if (animal.age > getAnimalConfig(animal.type).lifespan) {
      return DeathCause.OLD_AGE;
    }
    if (animal.energy <= 0) {
      return DeathCause.STARVATION;
    }
    return null;
  }

  /**
   * Removes every animal past its lifespan or out of energy.
   */
  public static removeDead(registry: AnimalRegistry): DeathRecord[] {
    const deaths: DeathRecord[] = [];
    for (const animal of registry.getAll()) {
      const cause = AnimalLifecycle.getDeathCause(animal);
      if (!cause) continue;

      registry.removeAnimal(animal.id);
      deaths.push({
        animalId: animal.id,
        type: animal.type,
        cause,
        age: animal.age,
      });
    }
    return deaths;
  }

  public static isFertile(animal: Animal): boolean {
    return (
      animal.age >= getAnimalConfig(animal.type).reproductionAge &&
      animal.energy > SIM_CONSTANTS.FERTILITY_ENERGY
    );
  }
}
