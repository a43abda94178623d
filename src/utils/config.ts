import dotenv from 'dotenv';
import pino from 'pino';

dotenv.config();

export interface Config {
  readonly logLevel: string;
  readonly checkInvariant: boolean;
  readonly growthFactor: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return Object.freeze({
    logLevel: env.LOG_LEVEL || 'info',
    checkInvariant: env.HEAP_CHECK_INVARIANT === 'true',
    growthFactor: Number(env.HEAP_GROWTH_FACTOR) || 2,
  });
}

export const config = loadConfig();

export function verifyConfig(cfg: Config = config) {
  if (cfg.logLevel !== 'silent' && !Object.hasOwn(pino.levels.values, cfg.logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: ${cfg.logLevel}`);
  }
  if (!Number.isFinite(cfg.growthFactor) || cfg.growthFactor <= 1) {
    throw new Error(`HEAP_GROWTH_FACTOR must be a finite number greater than 1, got ${cfg.growthFactor}`);
  }
}
