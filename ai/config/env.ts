import dotenv from 'dotenv';
import { z } from 'zod';
import { TRAINING_CONFIG, TrainingConfig } from './training.config';
import { TrainingRuntimeError } from '../errors';
import type { Race } from '../types';
import mapCatalogue from '../data/maps.json';

let envLoaded = false;

/**
 * Load .env, then .env.local on top of it for local development
 */
export function loadEnvFiles(): void {
  if (envLoaded) return;
  dotenv.config();
  dotenv.config({ path: '.env.local', override: true });
  envLoaded = true;
}

const raceSchema = z.enum(['T', 'P', 'Z']);

const intFromEnv = z.coerce.number().int();
const numberFromEnv = z.coerce.number().finite();
const booleanFromEnv = z.enum(['true', 'false', '1', '0']).transform(v => v === 'true' || v === '1');

// Every override is optional; unset variables keep the defaults
const envSchema = z.object({
  A3C_RACE: raceSchema.optional(),
  A3C_SCREEN_SIZE: intFromEnv.min(1).optional(),
  A3C_MINIMAP_SIZE: intFromEnv.min(1).optional(),
  A3C_UNIT_TYPE_COUNT: intFromEnv.min(1).optional(),
  A3C_WORKERS: intFromEnv.min(1).optional(),
  A3C_LEARNING_RATE: numberFromEnv.positive().optional(),
  A3C_GAMMA: numberFromEnv.min(0).max(1).optional(),
  A3C_ROLLOUT_CUTOFF: intFromEnv.min(2).optional(),
  A3C_MAX_EPISODE_LENGTH: intFromEnv.min(1).optional(),
  A3C_ENV_URL: z.string().url().optional(),
  A3C_ENV_TIMEOUT_MS: intFromEnv.positive().optional(),
  A3C_CHECKPOINT_DIR: z.string().min(1).optional(),
  A3C_MAX_TO_KEEP: intFromEnv.min(1).optional(),
  A3C_SAVE_INCREMENT: intFromEnv.min(1).optional(),
  A3C_LOAD_MODEL: booleanFromEnv.optional(),
  A3C_LOG_DIR: z.string().min(1).optional(),
  A3C_SUMMARY_INTERVAL: intFromEnv.min(1).optional(),
});

function formatIssues(error: z.ZodError): string {
  return error.errors.map(e => `${e.path.join('.') || 'env'}: ${e.message}`).join('; ');
}

/**
 * Build the effective training configuration from the defaults and the
 * A3C_* environment variables
 */
export function loadTrainingConfig(env: NodeJS.ProcessEnv = process.env): TrainingConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new TrainingRuntimeError('INVALID_CONFIG', `Invalid environment configuration: ${formatIssues(result.error)}`);
  }
  const o = result.data;
  const d = TRAINING_CONFIG;

  return {
    agent: {
      ...d.agent,
      race: o.A3C_RACE ?? d.agent.race,
      screenSize: o.A3C_SCREEN_SIZE ?? d.agent.screenSize,
      minimapSize: o.A3C_MINIMAP_SIZE ?? d.agent.minimapSize,
      unitTypeCount: o.A3C_UNIT_TYPE_COUNT ?? d.agent.unitTypeCount,
    },
    network: { ...d.network },
    training: {
      ...d.training,
      learningRate: o.A3C_LEARNING_RATE ?? d.training.learningRate,
      gamma: o.A3C_GAMMA ?? d.training.gamma,
      rolloutCutoff: o.A3C_ROLLOUT_CUTOFF ?? d.training.rolloutCutoff,
      maxEpisodeLength: o.A3C_MAX_EPISODE_LENGTH ?? d.training.maxEpisodeLength,
    },
    workers: {
      ...d.workers,
      count: o.A3C_WORKERS ?? d.workers.count,
    },
    environment: {
      ...d.environment,
      url: o.A3C_ENV_URL ?? d.environment.url,
      ackTimeoutMs: o.A3C_ENV_TIMEOUT_MS ?? d.environment.ackTimeoutMs,
    },
    checkpoints: {
      ...d.checkpoints,
      saveDir: o.A3C_CHECKPOINT_DIR ?? d.checkpoints.saveDir,
      maxToKeep: o.A3C_MAX_TO_KEEP ?? d.checkpoints.maxToKeep,
      saveIncrement: o.A3C_SAVE_INCREMENT ?? d.checkpoints.saveIncrement,
      loadModel: o.A3C_LOAD_MODEL ?? d.checkpoints.loadModel,
    },
    telemetry: {
      ...d.telemetry,
      logDir: o.A3C_LOG_DIR ?? d.telemetry.logDir,
      summaryInterval: o.A3C_SUMMARY_INTERVAL ?? d.telemetry.summaryInterval,
    },
  };
}

export const KNOWN_MAPS: readonly string[] = mapCatalogue.maps;

export function parseRace(value: string): Race {
  const result = raceSchema.safeParse(value);
  if (!result.success) {
    throw new TrainingRuntimeError('INVALID_CONFIG', `Invalid race selected: ${value}. Race must be one of T, P, Z.`);
  }
  return result.data;
}

/**
 * The map identifier is the one required setting: it must be non-empty and
 * present in the map catalogue
 */
export function resolveMapName(candidate: string | undefined): string {
  const name = candidate?.trim();
  if (!name) {
    throw new TrainingRuntimeError('INVALID_CONFIG', 'A map name is required (argument or A3C_MAP_NAME)');
  }
  if (!KNOWN_MAPS.includes(name)) {
    throw new TrainingRuntimeError('INVALID_CONFIG', `Unknown map: ${name}`, { knownMaps: KNOWN_MAPS });
  }
  return name;
}
