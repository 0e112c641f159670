import { logger, LogCategory } from "@/infrastructure/utils/logger";
import type { RandomUtils } from "../../../../shared/utils/RandomUtils";
import { ResourceType } from "../../../../shared/constants/ResourceEnums";
import { EnvironmentEvent } from "../../../../shared/constants/EnvironmentEnums";
import {
  InvalidAmountError,
  assertNonNegativeInteger,
} from "../../../../shared/errors/EcosystemErrors";
import type {
  EnvironmentEventRecord,
  ResourceLevels,
} from "../../../types/simulation/resources";
import { SIM_CONSTANTS } from "../../core/SimulationConstants";

/**
 * Shared grass and water of the ecosystem.
 *
 * Levels are integers that never go below zero: consumption is clamped
 * to what is available and losses are floored. There is no upper cap.
 */
export class ResourcePool {
  private levels: ResourceLevels;

  constructor(
    initial: ResourceLevels,
    private readonly random: RandomUtils,
  ) {
    assertNonNegativeInteger("grass", initial.grass);
    assertNonNegativeInteger("water", initial.water);
    this.levels = { grass: initial.grass, water: initial.water };
  }

  public get grass(): number {
    return this.levels.grass;
  }

  public get water(): number {
    return this.levels.water;
  }

  public getLevels(): ResourceLevels {
    return { ...this.levels };
  }

  /**
   * Grows grass and water by a random amount.
   * @returns the amounts added
   */
  public regenerate(): ResourceLevels {
    const grass = this.random.intRange(
      SIM_CONSTANTS.GRASS_REGEN_MIN,
      SIM_CONSTANTS.GRASS_REGEN_MAX,
    );
    const water = this.random.intRange(
      SIM_CONSTANTS.WATER_REGEN_MIN,
      SIM_CONSTANTS.WATER_REGEN_MAX,
    );
    this.levels.grass += grass;
    this.levels.water += water;
    return { grass, water };
  }

  /**
   * Takes up to `amount` of a resource.
   * @returns what was actually taken, `min(amount, available)`; never negative
   */
  public consume(type: ResourceType, amount: number): number {
    const requested = Number.isFinite(amount) ? Math.max(0, Math.floor(amount)) : 0;
    const taken = Math.min(requested, this.levels[type]);
    this.levels[type] -= taken;
    return taken;
  }

  /**
   * Player intervention: adds a non-negative integer amount.
   * The resulting level must stay a safe integer.
   * @throws InvalidAmountError before touching the pool
   */
  public add(type: ResourceType, amount: number): void {
    assertNonNegativeInteger("amount", amount);
    const headroom = Number.MAX_SAFE_INTEGER - this.levels[type];
    if (amount > headroom) {
      throw new InvalidAmountError(
        "amount",
        amount,
        `an integer from 0 to ${headroom}`,
      );
    }
    this.levels[type] += amount;
  }

  public applyEvent(kind: EnvironmentEvent): EnvironmentEventRecord {
    const before = this.getLevels();

    switch (kind) {
      case EnvironmentEvent.DROUGHT:
        this.levels.grass -= Math.floor(
          this.levels.grass * SIM_CONSTANTS.DROUGHT_GRASS_LOSS,
        );
        this.levels.water -= Math.floor(
          this.levels.water * SIM_CONSTANTS.DROUGHT_WATER_LOSS,
        );
        break;
      case EnvironmentEvent.RAIN:
        this.levels.grass += SIM_CONSTANTS.RAIN_GRASS_GAIN;
        this.levels.water += SIM_CONSTANTS.RAIN_WATER_GAIN;
        break;
    }

    const record: EnvironmentEventRecord = {
      kind,
      grassDelta: this.levels.grass - before.grass,
      waterDelta: this.levels.water - before.water,
    };
    logger.info(
      `🌦️ [ResourcePool] ${kind}: grass ${before.grass} → ${this.levels.grass}, water ${before.water} → ${this.levels.water}`,
      LogCategory.WORLD,
      record,
    );
    return record;
  }
}
