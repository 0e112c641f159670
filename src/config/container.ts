import "reflect-metadata";
import { Container } from "inversify";
import { TYPES } from "./Types";
import { CONFIG } from "./config";

/**
 * Dependency injection container configuration.
 *
 * The engine is a singleton: every request works on the same ecosystem.
 *
 * @module config
 */
import { SimulationEngine } from "../domain/simulation/core/SimulationEngine";
import { createInitialEcosystem } from "../domain/simulation/core/defaultState";
import {
  createSeededSource,
  type RandomSource,
} from "../shared/utils/RandomUtils";
import type { AnimalSeed } from "../domain/types/simulation/animals";
import type { ResourceLevels } from "../domain/types/simulation/resources";
import type { SimulationOptions } from "../domain/types/simulation/ecosystem";

export const container = new Container();

const initialEcosystem = createInitialEcosystem(CONFIG.INITIAL);

container
  .bind<readonly AnimalSeed[]>(TYPES.InitialPopulation)
  .toConstantValue(initialEcosystem.population);
container
  .bind<ResourceLevels>(TYPES.InitialResources)
  .toConstantValue(initialEcosystem.resources);
container
  .bind<Partial<SimulationOptions>>(TYPES.SimulationOptions)
  .toConstantValue({ drinkEnergyGain: CONFIG.DRINK_ENERGY_GAIN });

container
  .bind<RandomSource>(TYPES.RandomSource)
  .toDynamicValue(() => createSeededSource(CONFIG.SIM_SEED))
  .inSingletonScope();

container
  .bind<SimulationEngine>(TYPES.SimulationEngine)
  .to(SimulationEngine)
  .inSingletonScope();
