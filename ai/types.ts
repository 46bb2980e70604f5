// Shared types for the actor-critic trainer

export type Race = 'T' | 'P' | 'Z';
export type ActionGroup = 'N' | Race;

export interface ArgType {
  name: string;
  sizes: readonly number[]; // 0 = resolved against the active spatial resolution
}

export interface ActionSpec {
  id: number;
  name: string;
  argTypes: readonly ArgType[];
}

export interface ActionCatalogue {
  argTypes: ArgType[];
  functions: Array<{
    id: number;
    name: string;
    args: string[];
    race: string;
  }>;
}

export interface SpatialConfig {
  screenSize: number;
  minimapSize: number;
}

// Environment-facing call: function id plus one value list per declared argument
export interface ActionCall {
  functionId: number;
  arguments: number[][];
}

export type StepType = 'first' | 'mid' | 'last';

export interface RawObservation {
  reward: number;
  stepType: StepType;
  availableActions: number[];
  screen: number[][][]; // channel, row, column
  minimap: number[][][];
  features: Record<string, number[]>;
}

// Row-major H x W x C
export interface SpatialTensor {
  shape: [number, number, number];
  data: Float32Array;
}

export interface EncodedObservation {
  reward: number;
  nonspatial: Float32Array;
  screen: SpatialTensor;
  minimap: SpatialTensor;
  isTerminal: boolean;
}

// argName -> one sample per dimension; -1 marks an argument the chosen action does not use
export type ArgSamples = Record<string, number[]>;

// argName -> one probability vector per dimension
export type ArgDistributions = Record<string, Float32Array[]>;

export interface PolicyOutput {
  baseDist: Float32Array;
  argDists: ArgDistributions;
  value: number;
}

export interface RolloutStep {
  screen: SpatialTensor;
  minimap: SpatialTensor;
  nonspatial: Float32Array;
  baseAction: number;
  argSamples: ArgSamples;
  reward: number;
  nextScreen: SpatialTensor;
  nextMinimap: SpatialTensor;
  nextNonspatial: Float32Array;
  done: boolean;
  valueEstimate: number;
}

export interface ParameterTensor {
  name: string;
  shape: number[];
  values: Float32Array;
}

export interface ParameterSnapshot {
  version: number;
  tensors: ParameterTensor[];
}

// Aligned index-for-index with ParameterSnapshot.tensors
export type GradientSet = Float32Array[];

export interface TrainingTargets {
  baseActions: number[];
  argSamples: ArgSamples[];
  discountedReturns: number[];
  advantages: number[];
}

export interface TrainingBatch {
  nonspatial: Float32Array[];
  screen: SpatialTensor[];
  minimap: SpatialTensor[];
}

export interface GradientResult {
  gradients: GradientSet;
  valueLoss: number;
  policyLoss: number;
  entropy: number;
  varNorm: number;
}

export interface LossStats {
  valueLoss: number;
  policyLoss: number;
  entropy: number;
  gradNorm: number;
  varNorm: number;
}

/**
 * What a worker needs from the policy-value network. The layer topology
 * behind it is free to change.
 */
export interface PolicyValueModel {
  evaluate(observation: EncodedObservation): PolicyOutput;
  computeGradients(batch: TrainingBatch, targets: TrainingTargets): GradientResult;
  getParameters(): ParameterSnapshot;
  setParameters(snapshot: ParameterSnapshot): void;
  dispose(): void;
}

export interface PushReport {
  version: number;
  gradNorm: number;
}

export interface ParameterStore {
  pull(): ParameterSnapshot;
  push(gradients: GradientSet): PushReport;
}

export interface Checkpointer {
  saveSnapshot(snapshot: ParameterSnapshot, episodeCount: number): Promise<void>;
}

export interface Telemetry {
  recordSummary(metrics: Record<string, number>, episodeCount: number): void;
}
