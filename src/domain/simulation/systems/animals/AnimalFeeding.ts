import { logger, LogCategory } from "@/infrastructure/utils/logger";
import type { Animal, HuntRecord } from "../../../types/simulation/animals";
import type { AnimalRegistry } from "../../core/AnimalRegistry";
import type { ResourcePool } from "../world/ResourcePool";
import type { RandomUtils } from "../../../../shared/utils/RandomUtils";
import { ResourceType } from "../../../../shared/constants/ResourceEnums";
import {
  getAnimalConfig,
  isGrazer,
  isPredator,
} from "../../../world/config/AnimalConfigs";
import { SIM_CONSTANTS } from "../../core/SimulationConstants";

export interface ForageResult {
  foraged: number;
  hungry: number;
}

function gainEnergy(animal: Animal, amount: number): void {
  animal.energy = Math.min(SIM_CONSTANTS.MAX_ENERGY, animal.energy + amount);
}

/**
 * Feeding stages of a turn: grazing, hunting and drinking.
 */
export class AnimalFeeding {
  /**
   * Every herbivore, in random order, takes its grass ration from the pool.
   * A meal counts only if the pool yields at least the hunger threshold.
   */
  public static forage(
    registry: AnimalRegistry,
    pool: ResourcePool,
    random: RandomUtils,
  ): ForageResult {
    const herbivores = random.shuffle(
      registry.getAll().filter((a) => isGrazer(getAnimalConfig(a.type))),
    );
    const result: ForageResult = { foraged: 0, hungry: 0 };

    for (const animal of herbivores) {
      const config = getAnimalConfig(animal.type);
      if (!isGrazer(config)) continue;

      const eaten = pool.consume(ResourceType.GRASS, config.grassRation);
      if (eaten >= config.hungerThreshold) {
        gainEnergy(animal, config.feedingEnergyGain);
        result.foraged++;
      } else {
        result.hungry++;
      }
    }

    if (result.hungry > 0) {
      logger.debug(
        `🌾 [AnimalFeeding] ${result.hungry} herbivores went hungry (grass left: ${pool.grass})`,
        LogCategory.ANIMALS,
      );
    }
    return result;
  }

  /**
   * Each predator, in random order, may kill one animal of its preferred
   * prey. Kills leave the registry at once, so later predators cannot
   * take the same animal.
   */
  public static hunt(
    registry: AnimalRegistry,
    random: RandomUtils,
  ): HuntRecord[] {
    const predators = random.shuffle(
      registry.getAll().filter((a) => isPredator(getAnimalConfig(a.type))),
    );
    const kills: HuntRecord[] = [];

    for (const predator of predators) {
      const config = getAnimalConfig(predator.type);
      if (!isPredator(config)) continue;

      const prey = registry.getByType(config.preferredPrey);
      if (prey.length === 0) continue;
      if (!random.chance(config.huntSuccessChance)) continue;

      const victim = random.element(prey);
      if (!victim) continue;

      registry.removeAnimal(victim.id);
      gainEnergy(predator, config.feedingEnergyGain);
      kills.push({
        hunterId: predator.id,
        hunterType: predator.type,
        preyId: victim.id,
        preyType: victim.type,
      });
    }

    return kills;
  }

  /**
   * Every animal takes its water ration. A short ration only forfeits
   * the drinking gain.
   * @returns how many animals got a full ration
   */
  public static drink(
    registry: AnimalRegistry,
    pool: ResourcePool,
    drinkEnergyGain: number,
  ): number {
    let drank = 0;
    for (const animal of registry.getAll()) {
      const taken = pool.consume(ResourceType.WATER, SIM_CONSTANTS.WATER_RATION);
      if (taken === SIM_CONSTANTS.WATER_RATION) {
        gainEnergy(animal, drinkEnergyGain);
        drank++;
      }
    }
    return drank;
  }
}
