import type {
  ActionCall,
  ActionCatalogue,
  EncodedObservation,
  GradientResult,
  ParameterSnapshot,
  PolicyOutput,
  PolicyValueModel,
  RawObservation,
  StepType,
  TrainingBatch,
  TrainingTargets,
} from '../types';
import type { Environment } from '../env/environment';
import { TrainingRuntimeError } from '../errors';
import { ActionSpace } from '../encoding/actionSpace';
import { ObservationEncoder, EncoderOptions } from '../encoding/observationEncoder';
import { MINIMAP_CHANNELS, SCREEN_CHANNELS } from '../encoding/features';

// Small catalogue: three general actions and one race action per race
export const TEST_CATALOGUE: ActionCatalogue = {
  argTypes: [
    { name: 'screen', sizes: [0, 0] },
    { name: 'queued', sizes: [2] },
    { name: 'select_add', sizes: [2] },
  ],
  functions: [
    { id: 0, name: 'no_op', args: [], race: 'N' },
    { id: 7, name: 'Move_screen', args: ['queued', 'screen'], race: 'N' },
    { id: 2, name: 'select_point', args: ['select_add', 'screen'], race: 'N' },
    { id: 40, name: 'Train_Marine_quick', args: ['queued'], race: 'T' },
    { id: 41, name: 'Train_Zealot_quick', args: ['queued'], race: 'P' },
  ],
};

export const TEST_SPATIAL = { screenSize: 4, minimapSize: 4 };

export const TEST_ENCODER_OPTIONS: Partial<EncoderOptions> = {
  unitTypeCount: 8,
  unitMemoryDecay: 0.75,
  enemyMarker: 4,
  selectElementWidth: 3,
  nonspatialFeatures: [
    { name: 'player', kind: 'fixed', length: 2 },
    { name: 'multi_select', kind: 'variable', maxCount: 2 },
  ],
};

export function testActionSpace(spatial = TEST_SPATIAL): ActionSpace {
  return ActionSpace.fromCatalogue(TEST_CATALOGUE, 'T', spatial);
}

export function testEncoder(space: ActionSpace = testActionSpace()): ObservationEncoder {
  return new ObservationEncoder(space, TEST_ENCODER_OPTIONS);
}

export function planes(channels: number, size: number, fill = 0): number[][][] {
  return Array.from({ length: channels }, () =>
    Array.from({ length: size }, () => new Array<number>(size).fill(fill))
  );
}

export interface ObservationOverrides {
  reward?: number;
  stepType?: StepType;
  availableActions?: number[];
  screen?: number[][][];
  minimap?: number[][][];
  features?: Record<string, number[]>;
}

export function rawObservation(overrides: ObservationOverrides = {}, size = TEST_SPATIAL.screenSize): RawObservation {
  return {
    reward: overrides.reward ?? 0,
    stepType: overrides.stepType ?? 'mid',
    availableActions: overrides.availableActions ?? [0, 7],
    screen: overrides.screen ?? planes(SCREEN_CHANNELS.length, size),
    minimap: overrides.minimap ?? planes(MINIMAP_CHANNELS.length, size),
    features: overrides.features ?? { player: [1, 2], multi_select: [] },
  };
}

/**
 * Deterministic stand-in for Math.random that replays the given values
 */
export function sequence(values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}

export function tinySnapshot(): ParameterSnapshot {
  return {
    version: 0,
    tensors: [
      { name: 'dense/kernel', shape: [2, 1], values: new Float32Array([1, 2]) },
      { name: 'dense/bias', shape: [1], values: new Float32Array([0]) },
    ],
  };
}

function uniform(size: number): Float32Array {
  return new Float32Array(size).fill(1 / size);
}

/**
 * Policy-value model over the test action space with fixed outputs. Records
 * every training batch and every parameter sync.
 */
export class FakeNetwork implements PolicyValueModel {
  evaluations = 0;
  batches: TrainingBatch[] = [];
  targets: TrainingTargets[] = [];
  syncedVersions: number[] = [];
  disposed = false;

  constructor(private value = 0.5) {}

  evaluate(_observation: EncodedObservation): PolicyOutput {
    this.evaluations++;
    return {
      baseDist: uniform(4),
      argDists: { screen: [uniform(4), uniform(4)], queued: [uniform(2)], select_add: [uniform(2)] },
      value: this.value,
    };
  }

  computeGradients(batch: TrainingBatch, targets: TrainingTargets): GradientResult {
    this.batches.push(batch);
    this.targets.push(targets);
    const n = targets.baseActions.length;
    return {
      gradients: [new Float32Array([0.1, 0.1]), new Float32Array([0.1])],
      valueLoss: 2 * n,
      policyLoss: n,
      entropy: 3 * n,
      varNorm: 1,
    };
  }

  getParameters(): ParameterSnapshot {
    return tinySnapshot();
  }

  setParameters(snapshot: ParameterSnapshot): void {
    this.syncedVersions.push(snapshot.version);
  }

  dispose(): void {
    this.disposed = true;
  }
}

/**
 * Environment that plays fixed-length episodes. Step k (from 1) pays 1 when k
 * is odd, 0 otherwise, and the observation it returns carries k in player[0].
 */
export class ScriptedEnvironment implements Environment {
  resets = 0;
  calls: ActionCall[] = [];
  closed = false;
  private stepsTaken = 0;

  constructor(private episodeLength: number, private failAtStep?: number) {}

  async reset(): Promise<RawObservation> {
    this.resets++;
    this.stepsTaken = 0;
    return rawObservation({ stepType: 'first', features: { player: [0, 0], multi_select: [] } });
  }

  async step(call: ActionCall): Promise<RawObservation> {
    this.calls.push(call);
    this.stepsTaken++;
    if (this.stepsTaken === this.failAtStep) {
      throw new TrainingRuntimeError('ENVIRONMENT_FAILURE', 'env:step failed: timeout');
    }
    return rawObservation({
      reward: this.stepsTaken % 2 === 1 ? 1 : 0,
      stepType: this.stepsTaken === this.episodeLength ? 'last' : 'mid',
      features: { player: [this.stepsTaken, 0], multi_select: [] },
    });
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function errorOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
