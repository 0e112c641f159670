import "dotenv/config";
import app from "./app";
import { CONFIG } from "../config/config";
import { container } from "../config/container";
import { TYPES } from "../config/Types";
import type { SimulationEngine } from "../domain/simulation/core/SimulationEngine";
import { GameEventType } from "../domain/simulation/core/events";
import { logger, LogCategory } from "../infrastructure/utils/logger";

/**
 * Main server entry point.
 *
 * Builds the ecosystem engine up front, so a bad initial configuration
 * fails at startup, then serves the HTTP API.
 *
 * @module application
 */

const engine = container.get<SimulationEngine>(TYPES.SimulationEngine);

engine.on(GameEventType.SPECIES_EXTINCT, ({ type, turn }) => {
  logger.warn(`⚠️ No ${type} left after turn ${turn}`, LogCategory.SIMULATION);
});

engine.on(GameEventType.TURN_COMPLETED, () => {
  logger.flush().catch((err: unknown) => {
    logger.error("Failed to flush logs:", LogCategory.GENERAL, {
      error: err instanceof Error ? err.message : String(err),
    });
  });
});

app.listen(CONFIG.PORT, () => {
  logger.info(
    `🚀 Ecosystem server running on http://localhost:${CONFIG.PORT}`,
    LogCategory.HTTP,
    { seed: CONFIG.SIM_SEED ?? "random", snapshot: engine.getSnapshot() },
  );
});
