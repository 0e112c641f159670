import "reflect-metadata";
import { injectable, inject, optional } from "inversify";
import { TYPES } from "../../../config/Types";
import { logger, LogCategory } from "../../../infrastructure/utils/logger";
import {
  RandomUtils,
  type RandomSource,
} from "../../../shared/utils/RandomUtils";
import {
  ALL_ANIMAL_TYPES,
  type AnimalType,
} from "../../../shared/constants/AnimalEnums";
import { ResourceType } from "../../../shared/constants/ResourceEnums";
import { EnvironmentEvent } from "../../../shared/constants/EnvironmentEnums";
import { assertNonNegativeInteger } from "../../../shared/errors/EcosystemErrors";
import type {
  Animal,
  AnimalSeed,
  PopulationCounts,
} from "../../types/simulation/animals";
import type {
  EnvironmentEventRecord,
  ResourceLevels,
} from "../../types/simulation/resources";
import type {
  EcosystemSnapshot,
  SimulationOptions,
  TurnReport,
} from "../../types/simulation/ecosystem";
import {
  getAnimalConfig,
  resolveAnimalType,
} from "../../world/config/AnimalConfigs";
import { AnimalFeeding } from "../systems/animals/AnimalFeeding";
import { AnimalLifecycle } from "../systems/animals/AnimalLifecycle";
import { AnimalSpawning } from "../systems/animals/AnimalSpawning";
import { ResourcePool } from "../systems/world/ResourcePool";
import { AnimalRegistry } from "./AnimalRegistry";
import {
  createSimulationEvents,
  GameEventType,
  type SimulationEventListener,
  type SimulationEventMap,
} from "./events";
import { SIM_CONSTANTS } from "./SimulationConstants";

const DEFAULT_OPTIONS: SimulationOptions = {
  drinkEnergyGain: 0,
};

/**
 * Turn-based ecosystem engine.
 *
 * Owns the population and the resource pool; every mutation goes through
 * its methods. A turn runs, in order: regeneration, foraging, hunting,
 * drinking, aging, mortality, reproduction and random events. All
 * randomness comes from the injected source.
 *
 * Not reentrant: one caller drives turns sequentially.
 */
@injectable()
export class SimulationEngine {
  private readonly registry = new AnimalRegistry();
  private readonly pool: ResourcePool;
  private readonly random: RandomUtils;
  private readonly options: SimulationOptions;
  private readonly emitter = createSimulationEvents();
  private turn = 0;

  constructor(
    @inject(TYPES.InitialPopulation) initialPopulation: readonly AnimalSeed[],
    @inject(TYPES.InitialResources) initialResources: ResourceLevels,
    @inject(TYPES.RandomSource) randomSource: RandomSource,
    @inject(TYPES.SimulationOptions)
    @optional()
    options?: Partial<SimulationOptions>,
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    assertNonNegativeInteger("drinkEnergyGain", this.options.drinkEnergyGain);

    this.random = new RandomUtils(randomSource);
    this.pool = new ResourcePool(initialResources, this.random);
    AnimalSpawning.seedPopulation(this.registry, initialPopulation);

    logger.info(
      `🌲 SimulationEngine initialized with ${this.registry.size} animals`,
      LogCategory.SIMULATION,
      { counts: this.registry.countByType(), resources: this.pool.getLevels() },
    );
  }

  public on<E extends GameEventType>(
    event: E,
    listener: SimulationEventListener<E>,
  ): void {
    this.emitter.on(event, listener);
  }

  public off<E extends GameEventType>(
    event: E,
    listener: SimulationEventListener<E>,
  ): void {
    this.emitter.off(event, listener);
  }

  private emit<E extends GameEventType>(
    event: E,
    payload: SimulationEventMap[E],
  ): void {
    this.emitter.emit(event, payload);
  }

  /**
   * Runs one full turn.
   */
  public advanceTurn(): void {
    this.turn++;
    logger.setTurn(this.turn);
    const countsBefore = this.registry.countByType();

    const regenerated = this.pool.regenerate();
    const { foraged, hungry } = AnimalFeeding.forage(
      this.registry,
      this.pool,
      this.random,
    );
    const kills = AnimalFeeding.hunt(this.registry, this.random);
    const drank = AnimalFeeding.drink(
      this.registry,
      this.pool,
      this.options.drinkEnergyGain,
    );
    AnimalLifecycle.ageAll(this.registry);
    const deaths = AnimalLifecycle.removeDead(this.registry);
    const births = AnimalSpawning.reproduce(this.registry, this.random);
    const events = this.rollEnvironmentEvents();

    for (const kill of kills) this.emit(GameEventType.ANIMAL_HUNTED, kill);
    for (const death of deaths) this.emit(GameEventType.ANIMAL_DIED, death);
    for (const birth of births) this.emit(GameEventType.ANIMAL_BORN, { ...birth });
    for (const event of events) this.emit(GameEventType.ENVIRONMENT_EVENT, event);
    this.reportExtinctions(countsBefore);

    const report: TurnReport = {
      turn: this.turn,
      regenerated,
      foraged,
      hungry,
      kills,
      drank,
      deaths,
      births: births.map((animal) => ({ animalId: animal.id, type: animal.type })),
      events,
    };

    logger.debug(
      `🔄 Turn ${this.turn}: ${foraged} fed, ${hungry} hungry, ${kills.length} kills, ${deaths.length} deaths, ${births.length} births`,
      LogCategory.SIMULATION,
      { population: this.registry.size, resources: this.pool.getLevels() },
    );
    this.emit(GameEventType.TURN_COMPLETED, report);
  }

  /**
   * Runs `turns` turns in a row.
   * @throws InvalidAmountError unless `turns` is a non-negative integer
   */
  public advanceTurns(turns: number): EcosystemSnapshot {
    assertNonNegativeInteger("turns", turns);
    for (let i = 0; i < turns; i++) {
      this.advanceTurn();
    }
    return this.getSnapshot();
  }

  /**
   * Drought and rain are rolled independently; both can hit in one turn.
   */
  private rollEnvironmentEvents(): EnvironmentEventRecord[] {
    const events: EnvironmentEventRecord[] = [];
    if (this.random.chance(SIM_CONSTANTS.DROUGHT_CHANCE)) {
      events.push(this.pool.applyEvent(EnvironmentEvent.DROUGHT));
    }
    if (this.random.chance(SIM_CONSTANTS.RAIN_CHANCE)) {
      events.push(this.pool.applyEvent(EnvironmentEvent.RAIN));
    }
    return events;
  }

  private reportExtinctions(countsBefore: PopulationCounts): void {
    const countsAfter = this.registry.countByType();
    for (const type of ALL_ANIMAL_TYPES) {
      if (countsBefore[type] > 0 && countsAfter[type] === 0) {
        logger.info(
          `💀 ${getAnimalConfig(type).displayName} went extinct`,
          LogCategory.LIFECYCLE,
        );
        this.emit(GameEventType.SPECIES_EXTINCT, { type, turn: this.turn });
      }
    }
  }

  public addGrass(amount: number): void {
    this.addResource(ResourceType.GRASS, amount);
  }

  public addWater(amount: number): void {
    this.addResource(ResourceType.WATER, amount);
  }

  private addResource(type: ResourceType, amount: number): void {
    try {
      this.pool.add(type, amount);
    } catch (error) {
      logger.warn(
        `Rejected ${type} intervention: ${error instanceof Error ? error.message : String(error)}`,
        LogCategory.SIMULATION,
      );
      throw error;
    }
    this.emit(GameEventType.RESOURCES_ADDED, { type, amount });
  }

  /**
   * Adds `count` newborns of a species.
   * @throws InvalidSpeciesError for an unknown species
   * @throws InvalidAmountError unless `count` is a non-negative integer
   */
  public introduceAnimals(species: string, count: number): Animal[] {
    const type = this.validateIntroduction(species, count);
    const introduced: Animal[] = [];
    for (let i = 0; i < count; i++) {
      const animal = AnimalSpawning.spawnNewborn(this.registry, type);
      introduced.push({ ...animal });
      this.emit(GameEventType.ANIMAL_INTRODUCED, { ...animal });
    }
    return introduced;
  }

  private validateIntroduction(species: string, count: number): AnimalType {
    try {
      const type = resolveAnimalType(species);
      assertNonNegativeInteger("count", count);
      return type;
    } catch (error) {
      logger.warn(
        `Rejected animal introduction: ${error instanceof Error ? error.message : String(error)}`,
        LogCategory.SIMULATION,
      );
      throw error;
    }
  }

  /**
   * Total population ≥ 10, grass > 100 and water > 100.
   */
  public isHealthy(): boolean {
    return (
      this.registry.size >= SIM_CONSTANTS.HEALTHY_MIN_POPULATION &&
      this.pool.grass > SIM_CONSTANTS.HEALTHY_MIN_RESOURCE &&
      this.pool.water > SIM_CONSTANTS.HEALTHY_MIN_RESOURCE
    );
  }

  public countsBySpecies(): PopulationCounts {
    return this.registry.countByType();
  }

  public resourceLevels(): ResourceLevels {
    return this.pool.getLevels();
  }

  public getTurn(): number {
    return this.turn;
  }

  /**
   * Copies of the live animals; changing them does not affect the engine.
   */
  public getAnimals(): Animal[] {
    return this.registry.getAll().map((animal) => ({ ...animal }));
  }

  public getSnapshot(): EcosystemSnapshot {
    return {
      turn: this.turn,
      counts: this.countsBySpecies(),
      total: this.registry.size,
      resources: this.resourceLevels(),
      healthy: this.isHealthy(),
    };
  }
}
