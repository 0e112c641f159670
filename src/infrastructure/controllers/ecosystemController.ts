import type { Request, Response } from "express";

import { logger, LogCategory } from "../utils/logger";
import { HttpStatusCode } from "../../shared/constants/HttpStatusCodes";
import {
  InvalidAmountError,
  InvalidSpeciesError,
  assertNonNegativeInteger,
  isEcosystemError,
} from "../../shared/errors/EcosystemErrors";
import { container } from "../../config/container";
import { TYPES } from "../../config/Types";
import { CONFIG } from "../../config/config";
import type { SimulationEngine } from "../../domain/simulation/core/SimulationEngine";

function getEngine(): SimulationEngine {
  return container.get<SimulationEngine>(TYPES.SimulationEngine);
}

/**
 * Reads one field of a JSON body without trusting its shape.
 */
function readField(body: unknown, key: string): unknown {
  if (typeof body !== "object" || body === null) return undefined;
  return Object.prototype.hasOwnProperty.call(body, key)
    ? Reflect.get(body, key)
    : undefined;
}

function sendError(res: Response, action: string, error: unknown): void {
  if (isEcosystemError(error)) {
    res
      .status(HttpStatusCode.BAD_REQUEST)
      .json({ error: error.message, code: error.code });
    return;
  }

  const message = error instanceof Error ? error.message : "Unknown error";
  logger.error(`Error in ${action}:`, LogCategory.HTTP, { error: message });
  res
    .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
    .json({ error: `Failed to ${action}` });
}

/**
 * Controller for ecosystem state and player interventions.
 *
 * Every successful call answers with the ecosystem snapshot so a client
 * can redraw after any action.
 */
export class EcosystemController {
  getState(_req: Request, res: Response): void {
    try {
      res.json(getEngine().getSnapshot());
    } catch (error) {
      sendError(res, "read ecosystem", error);
    }
  }

  /**
   * Body: `{ turns?: number }`, 1 when omitted, capped by
   * MAX_TURNS_PER_REQUEST.
   */
  advance(req: Request, res: Response): void {
    try {
      const requested = readField(req.body, "turns");
      const turns = requested === undefined ? 1 : requested;
      if (
        typeof turns !== "number" ||
        !Number.isInteger(turns) ||
        turns < 1 ||
        turns > CONFIG.MAX_TURNS_PER_REQUEST
      ) {
        throw new InvalidAmountError(
          "turns",
          turns,
          `an integer from 1 to ${CONFIG.MAX_TURNS_PER_REQUEST}`,
        );
      }

      const snapshot = getEngine().advanceTurns(turns);
      logger.info(
        `⏭️ [EcosystemController] advanced ${turns} turn(s) to turn ${snapshot.turn}`,
        LogCategory.HTTP,
      );
      res.json(snapshot);
    } catch (error) {
      sendError(res, "advance turns", error);
    }
  }

  addGrass(req: Request, res: Response): void {
    try {
      const amount = readField(req.body, "amount");
      assertNonNegativeInteger("amount", amount);
      const engine = getEngine();
      engine.addGrass(amount);
      res.json(engine.getSnapshot());
    } catch (error) {
      sendError(res, "add grass", error);
    }
  }

  addWater(req: Request, res: Response): void {
    try {
      const amount = readField(req.body, "amount");
      assertNonNegativeInteger("amount", amount);
      const engine = getEngine();
      engine.addWater(amount);
      res.json(engine.getSnapshot());
    } catch (error) {
      sendError(res, "add water", error);
    }
  }

  /**
   * Body: `{ species: "rabbit" | "deer" | "fox" | "wolf", count: number }`.
   */
  introduceAnimals(req: Request, res: Response): void {
    try {
      const species = readField(req.body, "species");
      const count = readField(req.body, "count");
      if (typeof species !== "string") {
        throw new InvalidSpeciesError(species);
      }
      assertNonNegativeInteger("count", count);

      const engine = getEngine();
      const introduced = engine.introduceAnimals(species, count);
      logger.info(
        `🐇 [EcosystemController] introduced ${introduced.length} ${species}`,
        LogCategory.HTTP,
      );
      res.json(engine.getSnapshot());
    } catch (error) {
      sendError(res, "introduce animals", error);
    }
  }
}

export const ecosystemController = new EcosystemController();
