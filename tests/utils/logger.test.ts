import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";
import {
  Logger,
  LogLevel,
  LogCategory,
} from "../../src/infrastructure/utils/logger";

describe("Logger", () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger({
      minLevel: LogLevel.INFO,
      silent: true,
      maxMemoryLogs: 100,
      throttleWindowMs: 60_000,
      maxThrottleCount: 3,
      logDir: undefined,
    });
  });

  it("drops entries below the minimum level", () => {
    logger.debug("hidden", LogCategory.SIMULATION);
    expect(logger.getBufferSize()).toBe(0);
  });

  it("records category, turn and data", () => {
    logger.setTurn(7);
    logger.info("drought", LogCategory.WORLD, { grassDelta: -40 });

    const [entry] = logger.queryLogs();
    expect(entry).toMatchObject({
      id: 1,
      level: LogLevel.INFO,
      category: LogCategory.WORLD,
      message: "drought",
      turn: 7,
      data: { grassDelta: -40 },
    });
  });

  it("falls back to the general category when given data only", () => {
    logger.warn("careful", { reason: "test" });

    const [entry] = logger.queryLogs();
    expect(entry.category).toBe(LogCategory.GENERAL);
    expect(entry.data).toEqual({ reason: "test" });
  });

  it("filters queries by level, category, text and limit", () => {
    logger.info("turn one", LogCategory.SIMULATION);
    logger.warn("rejected grass", LogCategory.SIMULATION);
    logger.error("request failed", LogCategory.HTTP);
    logger.info("turn two", LogCategory.SIMULATION);

    expect(logger.queryLogs({ levels: [LogLevel.WARN] }).map((e) => e.message)).toEqual([
      "rejected grass",
    ]);
    expect(logger.queryLogs({ categories: [LogCategory.HTTP] })).toHaveLength(1);
    expect(logger.queryLogs({ messageContains: "TURN" }).map((e) => e.message)).toEqual([
      "turn one",
      "turn two",
    ]);
    expect(logger.queryLogs({ limit: 1 }).map((e) => e.message)).toEqual(["turn two"]);
  });

  it("throttles repeated messages but never errors", () => {
    for (let i = 0; i < 5; i++) {
      logger.info("same message", LogCategory.ANIMALS);
      logger.error("same failure", LogCategory.HTTP);
    }

    expect(logger.queryLogs({ levels: [LogLevel.INFO] })).toHaveLength(3);
    expect(logger.queryLogs({ levels: [LogLevel.ERROR] })).toHaveLength(5);
  });

  it("keeps only the newest entries in memory", () => {
    logger.configure({ maxMemoryLogs: 2 });
    logger.info("a");
    logger.info("b");
    logger.info("c");

    expect(logger.queryLogs().map((e) => e.message)).toEqual(["b", "c"]);
  });

  it("clears the buffer", () => {
    logger.info("a");
    logger.clear();
    expect(logger.getBufferSize()).toBe(0);
  });

  describe("flush", () => {
    let logDir: string;

    beforeEach(async () => {
      logDir = await fs.mkdtemp(path.join(os.tmpdir(), "ecosystem-logs-"));
    });

    afterEach(async () => {
      await fs.rm(logDir, { recursive: true, force: true });
    });

    it("appends buffered entries as JSON lines", async () => {
      logger.configure({ logDir });
      logger.info("first", LogCategory.SIMULATION);
      logger.warn("second", LogCategory.WORLD);

      await logger.flush();
      await logger.flush();

      const [file] = await fs.readdir(logDir);
      const lines = (await fs.readFile(path.join(logDir, file), "utf-8"))
        .trim()
        .split("\n");
      expect(lines.map((line) => JSON.parse(line).message)).toEqual(["first", "second"]);
    });

    it("does nothing without a log directory", async () => {
      logger.info("kept in memory");
      await logger.flush();
      expect(await fs.readdir(logDir)).toEqual([]);
    });
  });
});
