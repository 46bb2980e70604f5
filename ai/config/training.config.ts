import type { Race } from '../types';

const DEFAULT_RACE: Race = 'T';

export const TRAINING_CONFIG = {
  // Agent / observation layout
  agent: {
    race: DEFAULT_RACE,
    screenSize: 64,
    minimapSize: 64,
    unitTypeCount: 1850,
    unitMemoryDecay: 0.75, // maxUnitsSeen shrinks by this ratio every step
    enemyMarker: 4, // player_relative value for hostile units
    selectElementWidth: 7, // values per unit in select/cargo/queue fields
  },

  // Network architecture
  network: {
    nonspatialUnits: 32,
    latentUnits: 256,
  },

  // Training hyperparameters
  training: {
    learningRate: 1e-4,
    gamma: 0.99, // Discount factor for returns and advantages
    entropyCoef: 0.01,
    valueCoef: 0.5,
    maxGradNorm: 40.0, // Global-norm gradient clipping
    logProbFloor: 1e-20,
    rolloutCutoff: 30, // Mid-episode train once the rollout reaches this length
    maxEpisodeLength: 300,
  },

  // Worker pool
  workers: {
    count: 1,
    startStaggerMs: 125,
  },

  // Environment bridge
  environment: {
    url: 'http://localhost:5005',
    ackTimeoutMs: 120000,
    reconnectionAttempts: 5,
    reconnectionDelay: 1000,
  },

  // Checkpointing
  checkpoints: {
    saveDir: './ai/checkpoints',
    maxToKeep: 5,
    saveIncrement: 100, // worker_0 saves every N episodes
    loadModel: false,
  },

  // Telemetry
  telemetry: {
    logDir: './ai/logs',
    summaryInterval: 5, // Episodes between summaries
  },
};

type DefaultTrainingConfig = typeof TRAINING_CONFIG;

export type TrainingConfig = Omit<DefaultTrainingConfig, 'agent'> & {
  agent: Omit<DefaultTrainingConfig['agent'], 'race'> & { race: Race };
};

export const SENTINEL = -1;
