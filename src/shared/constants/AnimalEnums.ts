/**
 * Animal type enumerations for the ecosystem simulation.
 *
 * Defines the species living in the ecosystem and the diets they follow.
 *
 * @module shared/constants/AnimalEnums
 */

/**
 * Enumeration of animal species.
 */
export enum AnimalType {
  RABBIT = "rabbit",
  DEER = "deer",
  FOX = "fox",
  WOLF = "wolf",
}

/**
 * Enumeration of diets. Grazers eat grass, predators eat other animals.
 */
export enum AnimalDiet {
  GRASS = "grass",
  PREY = "prey",
}

/**
 * Causes of death recorded during the mortality stage.
 */
export enum DeathCause {
  OLD_AGE = "old_age",
  STARVATION = "starvation",
}

/**
 * Array of all animal types for iteration, in declaration order.
 */
export const ALL_ANIMAL_TYPES: readonly AnimalType[] = [
  AnimalType.RABBIT,
  AnimalType.DEER,
  AnimalType.FOX,
  AnimalType.WOLF,
];

/**
 * Type guard for species identifiers coming from outside the engine.
 */
export function isAnimalType(value: unknown): value is AnimalType {
  return ALL_ANIMAL_TYPES.some((type) => type === value);
}
