import type { Checkpointer, ParameterSnapshot, PolicyValueModel, Telemetry } from '../types';
import type { Environment } from '../env/environment';
import type { ObservationEncoder } from '../encoding/observationEncoder';
import type { ActionCodec } from '../encoding/actionCodec';
import { GlobalParameterStore, ParameterStoreOptions } from './parameterStore';
import { EpisodeStats } from './episodeStats';
import { Worker, WorkerOptions } from './worker';
import { TRAINING_CONFIG } from '../config/training.config';

/**
 * Everything one worker owns privately
 */
export interface WorkerResources {
  network: PolicyValueModel;
  environment: Environment;
  encoder: ObservationEncoder;
  codec: ActionCodec;
  telemetry: Telemetry;
}

export interface ResumableCheckpointer extends Checkpointer {
  loadLatest(): Promise<{ episodeCount: number; snapshot: ParameterSnapshot } | null>;
}

export interface CoordinatorDependencies {
  // Source of the initial parameters when nothing is loaded
  createTemplateNetwork: () => PolicyValueModel;
  createWorkerResources: (workerIndex: number) => Promise<WorkerResources>;
  checkpointer: ResumableCheckpointer;
}

export interface CoordinatorOptions {
  workerCount: number;
  startStaggerMs: number;
  loadModel: boolean;
  maxEpisodes?: number;
  store: ParameterStoreOptions;
  worker: Partial<WorkerOptions>;
}

export const DEFAULT_COORDINATOR_OPTIONS: CoordinatorOptions = {
  workerCount: TRAINING_CONFIG.workers.count,
  startStaggerMs: TRAINING_CONFIG.workers.startStaggerMs,
  loadModel: TRAINING_CONFIG.checkpoints.loadModel,
  store: {
    learningRate: TRAINING_CONFIG.training.learningRate,
    maxGradNorm: TRAINING_CONFIG.training.maxGradNorm,
  },
  worker: {},
};

export interface WorkerFailure {
  worker: number;
  error: unknown;
}

export interface TrainingReport {
  episodes: number;
  failures: WorkerFailure[];
}

/**
 * Starts the workers, owns the shared parameter store and the global episode
 * counter, and shuts everything down cooperatively. Failed workers are
 * reported, not restarted.
 *
 * Workers are async tasks on one event loop: environment round-trips overlap,
 * but forward and backward passes run one at a time. Parameter pushes never
 * yield, so each one is applied whole.
 */
export class Coordinator {
  readonly stats: EpisodeStats;

  private options: CoordinatorOptions;
  private stopRequested = false;
  private globalEpisodes = 0;
  private store: GlobalParameterStore | null = null;

  constructor(private deps: CoordinatorDependencies, options: Partial<CoordinatorOptions> = {}) {
    this.options = { ...DEFAULT_COORDINATOR_OPTIONS, ...options };
    this.stats = new EpisodeStats(this.options.workerCount);
  }

  async run(): Promise<TrainingReport> {
    const initial = await this.initialParameters();
    const store = new GlobalParameterStore(initial, this.options.store);
    this.store = store;

    // A worker may fail while later ones are still waiting to start
    const tasks: Promise<WorkerFailure | null>[] = [];
    try {
      for (let i = 0; i < this.options.workerCount; i++) {
        if (i > 0) {
          await this.sleep(this.options.startStaggerMs);
        }
        if (this.stopRequested) break;
        tasks.push(this.runWorker(i, store).then(
          () => null,
          (error: unknown) => ({ worker: i, error })
        ));
      }

      const results = await Promise.all(tasks);
      const failures = results.filter((result): result is WorkerFailure => result !== null);

      if (failures.length > 0) {
        console.error(`${failures.length} of ${tasks.length} workers failed`);
      }
      console.log(`Training finished after ${this.globalEpisodes} episodes`);
      return { episodes: this.globalEpisodes, failures };
    } finally {
      store.close();
      this.store = null;
    }
  }

  /**
   * Ask every worker to finish its current episode and exit
   */
  stop(): void {
    if (this.stopRequested) return;
    console.log('Stop requested; workers will exit at the end of their episodes');
    this.stopRequested = true;
  }

  isStopping(): boolean {
    return this.stopRequested;
  }

  get globalEpisodeCounter(): number {
    return this.globalEpisodes;
  }

  getStoreVersion(): number | null {
    return this.store?.getVersion() ?? null;
  }

  private async initialParameters(): Promise<ParameterSnapshot> {
    if (this.options.loadModel) {
      console.log('Loading Model...');
      const latest = await this.deps.checkpointer.loadLatest();
      if (latest) {
        this.globalEpisodes = latest.episodeCount;
        console.log(`Resuming from episode ${latest.episodeCount}`);
        return latest.snapshot;
      }
      console.log('No saved model found, starting fresh');
    }

    const template = this.deps.createTemplateNetwork();
    try {
      return template.getParameters();
    } finally {
      template.dispose();
    }
  }

  private async runWorker(index: number, store: GlobalParameterStore): Promise<void> {
    const resources = await this.deps.createWorkerResources(index);
    const leader = index === 0;

    const worker = new Worker(
      index,
      {
        ...resources,
        store,
        stats: this.stats,
        checkpointer: leader ? this.deps.checkpointer : undefined,
        episodeCounter: leader ? { increment: () => this.incrementEpisodes() } : undefined,
        shouldStop: () => this.stopRequested,
      },
      this.options.worker,
      this.globalEpisodes
    );

    try {
      await worker.run();
    } finally {
      await resources.environment.close();
      resources.network.dispose();
    }
  }

  private incrementEpisodes(): number {
    this.globalEpisodes++;
    const { maxEpisodes } = this.options;
    if (maxEpisodes !== undefined && this.globalEpisodes >= maxEpisodes) {
      this.stop();
    }
    return this.globalEpisodes;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
