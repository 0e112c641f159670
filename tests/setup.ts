import "reflect-metadata";
import { AnimalType } from "../src/shared/constants/AnimalEnums";
import type { RandomSource } from "../src/shared/utils/RandomUtils";
import type { AnimalSeed } from "../src/domain/types/simulation/animals";
import type { ResourceLevels } from "../src/domain/types/simulation/resources";
import { SimulationEngine } from "../src/domain/simulation/core/SimulationEngine";
import type { SimulationOptions } from "../src/domain/types/simulation/ecosystem";

/**
 * Source that always returns the same value.
 * 0.99 makes every chance() fail and leaves shuffles in order;
 * 0 makes every chance() succeed.
 */
export function constantSource(value: number): RandomSource {
  return { next: () => value };
}

/**
 * Source that replays `values` in order, then repeats `fallback`.
 */
export function scriptedSource(
  values: readonly number[],
  fallback = 0.99,
): RandomSource & { consumed: () => number } {
  let index = 0;
  return {
    next: () => (index < values.length ? values[index++] : fallback),
    consumed: () => index,
  };
}

export function seedsOf(
  type: AnimalType | string,
  count: number,
  overrides: Omit<AnimalSeed, "type"> = {},
): AnimalSeed[] {
  return Array.from({ length: count }, () => ({ type, ...overrides }));
}

export interface TestEngineOptions {
  population?: AnimalSeed[];
  resources?: ResourceLevels;
  source?: RandomSource;
  options?: Partial<SimulationOptions>;
}

export function createTestEngine({
  population = [],
  resources = { grass: 500, water: 500 },
  source = constantSource(0.99),
  options,
}: TestEngineOptions = {}): SimulationEngine {
  return new SimulationEngine(population, resources, source, options);
}

export { AnimalType };
