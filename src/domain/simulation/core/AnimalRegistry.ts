/**
 * AnimalRegistry - single source of truth for the live population.
 *
 * Holds every living animal keyed by id and allocates ids for new ones.
 * The ecosystem is a single well-mixed pool, so there is no spatial
 * index: per-species views are built on demand.
 *
 * @module core
 */

import { logger, LogCategory } from "@/infrastructure/utils/logger";
import type { Animal, PopulationCounts } from "../../types/simulation/animals";
import { AnimalType } from "../../../shared/constants/AnimalEnums";

export class AnimalRegistry {
  private animals = new Map<string, Animal>();
  private nextAnimalId = 1;

  /**
   * Creates and registers an animal with the next free id.
   */
  public spawn(type: AnimalType, age: number, energy: number): Animal {
    const animal: Animal = {
      id: `animal-${this.nextAnimalId++}`,
      type,
      age,
      energy,
    };
    this.animals.set(animal.id, animal);
    logger.debug(
      `🐾 AnimalRegistry: Registered ${type} (${animal.id})`,
      LogCategory.LIFECYCLE,
    );
    return animal;
  }

  /**
   * Removes an animal from the registry
   */
  public removeAnimal(animalId: string): boolean {
    const removed = this.animals.delete(animalId);
    if (removed) {
      logger.debug(
        `🐾 AnimalRegistry: Removed animal ${animalId}`,
        LogCategory.LIFECYCLE,
      );
    }
    return removed;
  }

  /**
   * Gets an animal by ID - O(1)
   */
  public getAnimal(animalId: string): Animal | undefined {
    return this.animals.get(animalId);
  }

  public hasAnimal(animalId: string): boolean {
    return this.animals.has(animalId);
  }

  /**
   * Live animals in registration order. The array is a fresh copy; the
   * animals are the registry's own records.
   */
  public getAll(): Animal[] {
    return Array.from(this.animals.values());
  }

  public getByType(type: AnimalType): Animal[] {
    return this.getAll().filter((animal) => animal.type === type);
  }

  public countByType(): PopulationCounts {
    const counts: PopulationCounts = {
      [AnimalType.RABBIT]: 0,
      [AnimalType.DEER]: 0,
      [AnimalType.FOX]: 0,
      [AnimalType.WOLF]: 0,
    };
    for (const animal of this.animals.values()) {
      counts[animal.type]++;
    }
    return counts;
  }

  public get size(): number {
    return this.animals.size;
  }

  public clear(): void {
    this.animals.clear();
  }
}
