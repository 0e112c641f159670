/**
 * Application configuration loaded from environment variables.
 *
 * The server entry point loads `.env` through `dotenv/config` before this
 * module is evaluated.
 *
 * @module config
 */

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(
      `Invalid ${name}: "${raw}" (expected a non-negative integer)`,
    );
  }
  return value;
}

/**
 * Application configuration object.
 *
 * @property PORT - HTTP server port (default: 8080)
 * @property ALLOWED_ORIGINS - CORS origins, `*` when unset
 * @property SIM_SEED - seed for reproducible runs; unset means a fresh seed per process
 * @property INITIAL - starting world: resources and animals per species
 * @property DRINK_ENERGY_GAIN - energy an animal gains from a full water ration
 * @property MAX_TURNS_PER_REQUEST - upper bound for one advance request
 */
export interface AppConfig {
  PORT: number;
  ALLOWED_ORIGINS: string[] | "*";
  SIM_SEED?: string;
  INITIAL: {
    GRASS: number;
    WATER: number;
    RABBITS: number;
    DEER: number;
    FOXES: number;
    WOLVES: number;
  };
  DRINK_ENERGY_GAIN: number;
  MAX_TURNS_PER_REQUEST: number;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const origins = env.ALLOWED_ORIGINS?.split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  return {
    PORT: readInt(env, "PORT", 8080),
    ALLOWED_ORIGINS: origins && origins.length > 0 ? origins : "*",
    SIM_SEED: env.SIM_SEED || undefined,
    INITIAL: {
      GRASS: readInt(env, "INITIAL_GRASS", 1000),
      WATER: readInt(env, "INITIAL_WATER", 1000),
      RABBITS: readInt(env, "INITIAL_RABBITS", 20),
      DEER: readInt(env, "INITIAL_DEER", 10),
      FOXES: readInt(env, "INITIAL_FOXES", 5),
      WOLVES: readInt(env, "INITIAL_WOLVES", 3),
    },
    DRINK_ENERGY_GAIN: readInt(env, "DRINK_ENERGY_GAIN", 0),
    MAX_TURNS_PER_REQUEST: Math.max(
      1,
      readInt(env, "MAX_TURNS_PER_REQUEST", 100),
    ),
  };
}

export const CONFIG = loadConfig();
