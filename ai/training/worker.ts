import type {
  Checkpointer,
  EncodedObservation,
  LossStats,
  ParameterStore,
  PolicyValueModel,
  RolloutStep,
  Telemetry,
} from '../types';
import type { Environment } from '../env/environment';
import type { AgentState, ObservationEncoder } from '../encoding/observationEncoder';
import type { ActionCodec } from '../encoding/actionCodec';
import type { EpisodeStats } from './episodeStats';
import { computeAdvantages } from './advantage';
import { TRAINING_CONFIG } from '../config/training.config';

export interface WorkerOptions {
  gamma: number;
  rolloutCutoff: number;
  maxEpisodeLength: number;
  summaryInterval: number;
  saveIncrement: number;
}

export const DEFAULT_WORKER_OPTIONS: WorkerOptions = {
  gamma: TRAINING_CONFIG.training.gamma,
  rolloutCutoff: TRAINING_CONFIG.training.rolloutCutoff,
  maxEpisodeLength: TRAINING_CONFIG.training.maxEpisodeLength,
  summaryInterval: TRAINING_CONFIG.telemetry.summaryInterval,
  saveIncrement: TRAINING_CONFIG.checkpoints.saveIncrement,
};

export interface EpisodeCounter {
  increment(): number;
}

export interface WorkerDependencies {
  network: PolicyValueModel;
  store: ParameterStore;
  environment: Environment;
  encoder: ObservationEncoder;
  codec: ActionCodec;
  stats: EpisodeStats;
  telemetry: Telemetry;
  // Only worker 0 is handed these
  checkpointer?: Checkpointer;
  episodeCounter?: EpisodeCounter;
  shouldStop: () => boolean;
}

export interface EpisodeResult {
  reward: number;
  length: number;
  meanValue: number;
}

/**
 * One actor-learner. Plays episodes on its own environment against a local
 * copy of the parameters and pushes gradients to the shared store every
 * rolloutCutoff steps and at the end of each episode.
 */
export class Worker {
  readonly name: string;

  private options: WorkerOptions;
  private agentState: AgentState;
  private episodeCount: number;
  private totalSteps = 0;
  private episodeStep = 0;
  private rewards: number[] = [];
  private lengths: number[] = [];
  private meanValues: number[] = [];
  private lastLosses: LossStats | null = null;

  constructor(
    readonly index: number,
    private deps: WorkerDependencies,
    options: Partial<WorkerOptions> = {},
    startEpisode: number = 0
  ) {
    this.name = `worker_${index}`;
    this.options = { ...DEFAULT_WORKER_OPTIONS, ...options };
    this.agentState = deps.encoder.createState();
    this.episodeCount = startEpisode;
  }

  /**
   * Play and train until asked to stop. The stop flag is only read between
   * episodes.
   */
  async run(): Promise<void> {
    console.log(`Starting worker ${this.index}`);
    try {
      while (!this.deps.shouldStop()) {
        await this.runEpisode();
      }
    } catch (error) {
      console.error(
        `[${this.name}] Fatal error at episode ${this.episodeCount}, step ${this.episodeStep} (total ${this.totalSteps}):`,
        error
      );
      throw error;
    }
    console.log(`[${this.name}] Stopped after ${this.episodeCount} episodes`);
  }

  async runEpisode(): Promise<EpisodeResult> {
    const { network, environment, encoder, codec } = this.deps;
    const { rolloutCutoff, maxEpisodeLength } = this.options;

    this.syncParameters();

    let rollout: RolloutStep[] = [];
    const values: number[] = [];
    let episodeReward = 0;
    this.episodeStep = 0;

    this.agentState.reset();
    let raw = await environment.reset();
    let current = encoder.encode(raw, this.agentState);
    let episodeEnd = current.isTerminal;

    while (!episodeEnd) {
      const policy = network.evaluate(current);
      const selection = codec.selectAction(policy.baseDist, policy.argDists, new Set(raw.availableActions));

      raw = await environment.step(selection.call);
      this.agentState.recordAction(selection.actionIndex);

      const next = encoder.encode(raw, this.agentState);
      episodeEnd = next.isTerminal;
      // A terminal observation is never a state to learn from
      const successor: EncodedObservation = episodeEnd ? current : next;

      rollout.push({
        screen: current.screen,
        minimap: current.minimap,
        nonspatial: current.nonspatial,
        baseAction: selection.actionIndex,
        argSamples: selection.argSamples,
        reward: next.reward,
        nextScreen: successor.screen,
        nextMinimap: successor.minimap,
        nextNonspatial: successor.nonspatial,
        done: episodeEnd,
        valueEstimate: policy.value,
      });
      values.push(policy.value);
      episodeReward += next.reward;
      current = successor;
      this.totalSteps++;
      this.episodeStep++;

      if (rollout.length === rolloutCutoff && !episodeEnd && this.episodeStep !== maxEpisodeLength - 1) {
        const bootstrap = network.evaluate(next).value;
        this.lastLosses = this.train(rollout, bootstrap);
        rollout = rollout.slice(Math.floor(rollout.length / 2));
        this.syncParameters();
      }
    }

    const result: EpisodeResult = {
      reward: episodeReward,
      length: this.episodeStep,
      meanValue: mean(values),
    };
    await this.endEpisode(result, rollout);
    return result;
  }

  getEpisodeCount(): number {
    return this.episodeCount;
  }

  getTotalSteps(): number {
    return this.totalSteps;
  }

  getLastLosses(): LossStats | null {
    return this.lastLosses;
  }

  private async endEpisode(result: EpisodeResult, rollout: RolloutStep[]): Promise<void> {
    const { stats, telemetry, checkpointer, episodeCounter, store } = this.deps;
    const { summaryInterval, saveIncrement } = this.options;

    this.rewards.push(result.reward);
    this.lengths.push(result.length);
    this.meanValues.push(result.meanValue);
    this.episodeCount++;

    stats.recordEpisode(this.index, result.reward, this.totalSteps, this.episodeCount);
    const totals = stats.snapshot();
    console.log(`${this.name} Step #${this.totalSteps} Episode #${this.episodeCount} Reward: ${result.reward}`);
    console.log(
      `Total Steps: ${totals.totalSteps}\tTotal Episodes: ${totals.totalEpisodes}\t` +
      `Max Score: ${totals.maxScore}\tAvg Score: ${totals.runningAvgScore}`
    );

    if (rollout.length > 0) {
      this.lastLosses = this.train(rollout, 0);
    }

    if (checkpointer && this.episodeCount % saveIncrement === 0) {
      await checkpointer.saveSnapshot(store.pull(), this.episodeCount);
    }

    if (this.episodeCount % summaryInterval === 0) {
      telemetry.recordSummary(this.summaryMetrics(summaryInterval), this.episodeCount);
    }

    episodeCounter?.increment();
  }

  /**
   * Advantages, gradients and one push for a rollout. Losses are reported
   * per step.
   */
  private train(rollout: RolloutStep[], bootstrapValue: number): LossStats {
    const { network, store } = this.deps;
    const { discountedReturns, advantages } = computeAdvantages(
      rollout.map(step => step.reward),
      rollout.map(step => step.valueEstimate),
      bootstrapValue,
      this.options.gamma
    );

    const result = network.computeGradients(
      {
        nonspatial: rollout.map(step => step.nonspatial),
        screen: rollout.map(step => step.screen),
        minimap: rollout.map(step => step.minimap),
      },
      {
        baseActions: rollout.map(step => step.baseAction),
        argSamples: rollout.map(step => step.argSamples),
        discountedReturns,
        advantages,
      }
    );
    const report = store.push(result.gradients);

    const n = rollout.length;
    return {
      valueLoss: result.valueLoss / n,
      policyLoss: result.policyLoss / n,
      entropy: result.entropy / n,
      gradNorm: report.gradNorm,
      varNorm: result.varNorm,
    };
  }

  private syncParameters(): void {
    this.deps.network.setParameters(this.deps.store.pull());
  }

  private summaryMetrics(window: number): Record<string, number> {
    const metrics: Record<string, number> = {
      'Perf/Reward': mean(this.rewards.slice(-window)),
      'Perf/Length': mean(this.lengths.slice(-window)),
      'Perf/Value': mean(this.meanValues.slice(-window)),
      'Perf/Degenerate Fallbacks': this.deps.codec.getDegenerateCount(),
    };
    if (this.lastLosses) {
      metrics['Losses/Value Loss'] = this.lastLosses.valueLoss;
      metrics['Losses/Policy Loss'] = this.lastLosses.policyLoss;
      metrics['Losses/Entropy'] = this.lastLosses.entropy;
      metrics['Losses/Grad Norm'] = this.lastLosses.gradNorm;
      metrics['Losses/Var Norm'] = this.lastLosses.varNorm;
    }
    return metrics;
  }
}

function mean(xs: readonly number[]): number {
  return xs.length === 0 ? 0 : xs.reduce((a, b) => a + b, 0) / xs.length;
}
