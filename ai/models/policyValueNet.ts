import * as tf from '@tensorflow/tfjs';
import type { ActionSpace } from '../encoding/actionSpace';
import type {
  ArgDistributions,
  EncodedObservation,
  GradientResult,
  ParameterSnapshot,
  PolicyOutput,
  PolicyValueModel,
  SpatialTensor,
  TrainingBatch,
  TrainingTargets,
} from '../types';
import { SENTINEL, TRAINING_CONFIG } from '../config/training.config';
import { oneHotTargets } from '../encoding/actionCodec';
import { TrainingRuntimeError } from '../errors';

export interface NetworkShape {
  nonspatialSize: number;
  screenShape: [number, number, number];
  minimapShape: [number, number, number];
}

export interface LossWeights {
  valueCoef: number;
  entropyCoef: number;
  logProbFloor: number;
}

const DEFAULT_LOSS_WEIGHTS: LossWeights = {
  valueCoef: TRAINING_CONFIG.training.valueCoef,
  entropyCoef: TRAINING_CONFIG.training.entropyCoef,
  logProbFloor: TRAINING_CONFIG.training.logProbFloor,
};

let nextNetworkId = 0;

/**
 * Actor-critic network for the factored action space.
 * One softmax head for base actions, one per argument type and dimension
 * (spatial x and y modelled independently), one linear value head.
 */
export class PolicyValueNet implements PolicyValueModel {
  private model: tf.LayersModel | null = null;
  private readonly scope: string;
  private argHeads: Array<{ name: string; dim: number; size: number }> = [];

  constructor(
    private actionSpace: ActionSpace,
    private shape: NetworkShape,
    private lossWeights: LossWeights = DEFAULT_LOSS_WEIGHTS
  ) {
    this.scope = `net${nextNetworkId++}`;
  }

  /**
   * Build the network architecture
   */
  build(
    nonspatialUnits: number = TRAINING_CONFIG.network.nonspatialUnits,
    latentUnits: number = TRAINING_CONFIG.network.latentUnits
  ): void {
    const name = (layer: string) => `${this.scope}_${layer}`;

    const nonspatialInput = tf.input({ shape: [this.shape.nonspatialSize], name: name('nonspatial') });
    const screenInput = tf.input({ shape: this.shape.screenShape, name: name('screen') });
    const minimapInput = tf.input({ shape: this.shape.minimapShape, name: name('minimap') });

    const nonspatialDense = tf.layers.dense({
      units: nonspatialUnits,
      activation: 'tanh',
      name: name('nonspatial_dense'),
    }).apply(nonspatialInput) as tf.SymbolicTensor;

    const convStack = (input: tf.SymbolicTensor, prefix: string): tf.SymbolicTensor => {
      let x = tf.layers.conv2d({
        filters: 16,
        kernelSize: 8,
        strides: 4,
        padding: 'valid',
        activation: 'relu',
        name: name(`${prefix}_conv1`),
      }).apply(input) as tf.SymbolicTensor;
      x = tf.layers.conv2d({
        filters: 32,
        kernelSize: 4,
        strides: 2,
        padding: 'valid',
        activation: 'relu',
        name: name(`${prefix}_conv2`),
      }).apply(x) as tf.SymbolicTensor;
      return tf.layers.flatten({ name: name(`${prefix}_flatten`) }).apply(x) as tf.SymbolicTensor;
    };

    const merged = tf.layers.concatenate({ name: name('concat') }).apply([
      nonspatialDense,
      convStack(screenInput, 'screen'),
      convStack(minimapInput, 'minimap'),
    ]) as tf.SymbolicTensor;

    const latent = tf.layers.dense({
      units: latentUnits,
      activation: 'relu',
      name: name('latent'),
    }).apply(merged) as tf.SymbolicTensor;

    // Small initial weights keep the starting policy close to uniform
    const policyInit = () => tf.initializers.randomNormal({ mean: 0, stddev: 0.01 });

    const basePolicy = tf.layers.dense({
      units: this.actionSpace.actionCount,
      activation: 'softmax',
      kernelInitializer: policyInit(),
      name: name('policy_base'),
    }).apply(latent) as tf.SymbolicTensor;

    this.argHeads = [];
    const argPolicies: tf.SymbolicTensor[] = [];
    for (const arg of this.actionSpace.argTypes) {
      this.actionSpace.argSizes(arg.name).forEach((size, dim) => {
        this.argHeads.push({ name: arg.name, dim, size });
        argPolicies.push(tf.layers.dense({
          units: size,
          activation: 'softmax',
          kernelInitializer: policyInit(),
          name: name(`policy_${arg.name}_${dim}`),
        }).apply(latent) as tf.SymbolicTensor);
      });
    }

    const value = tf.layers.dense({
      units: 1,
      activation: 'linear',
      kernelInitializer: 'glorotUniform',
      name: name('value'),
    }).apply(latent) as tf.SymbolicTensor;

    this.model = tf.model({
      inputs: [nonspatialInput, screenInput, minimapInput],
      outputs: [basePolicy, ...argPolicies, value],
      name: name('policy_value'),
    });
  }

  /**
   * Forward pass for a single observation
   */
  evaluate(observation: EncodedObservation): PolicyOutput {
    const model = this.getModel();
    const inputs = this.toInputs([observation.nonspatial], [observation.screen], [observation.minimap]);
    const outputs = tf.tidy(() => model.predict(inputs));

    try {
      if (!Array.isArray(outputs)) {
        throw new Error('Expected one output per head from model');
      }
      const baseDist = Float32Array.from(outputs[0].dataSync());
      const argDists: ArgDistributions = {};
      this.argHeads.forEach((head, i) => {
        (argDists[head.name] ??= [])[head.dim] = Float32Array.from(outputs[i + 1].dataSync());
      });
      const value = outputs[outputs.length - 1].dataSync()[0];
      return { baseDist, argDists, value };
    } finally {
      tf.dispose(outputs);
      tf.dispose(inputs);
    }
  }

  /**
   * Gradients of 0.5*valueLoss + policyLoss - 0.01*entropy with respect to
   * this network's parameters, ordered like getParameters()
   */
  computeGradients(batch: TrainingBatch, targets: TrainingTargets): GradientResult {
    const model = this.getModel();
    const n = targets.baseActions.length;
    if (batch.nonspatial.length !== n || targets.advantages.length !== n || targets.discountedReturns.length !== n) {
      throw new TrainingRuntimeError('INDEX_OUT_OF_RANGE', `Batch of ${batch.nonspatial.length} does not match ${n} targets`);
    }

    const { valueCoef, entropyCoef, logProbFloor } = this.lossWeights;
    const inputs = this.toInputs(batch.nonspatial, batch.screen, batch.minimap);
    const baseTargets = tf.tensor2d(oneHotTargets(targets.baseActions, this.actionSpace.actionCount), [n, this.actionSpace.actionCount]);
    const argTargets = this.argHeads.map(head =>
      tf.tensor2d(oneHotTargets(targets.argSamples.map(s => s[head.name]?.[head.dim] ?? SENTINEL), head.size), [n, head.size])
    );
    const advantages = tf.tensor1d(targets.advantages);
    const returns = tf.tensor1d(targets.discountedReturns);

    let parts: tf.Tensor[] = [];
    try {
      const { value: loss, grads } = tf.variableGrads(() => {
        const outputs = model.predict(inputs);
        if (!Array.isArray(outputs)) {
          throw new Error('Expected one output per head from model');
        }
        const logClip = (p: tf.Tensor) => tf.log(tf.clipByValue(p, logProbFloor, 1.0));

        const values = tf.reshape(outputs[outputs.length - 1], [-1]);
        const valueLoss = tf.mul(0.5, tf.sum(tf.square(tf.sub(returns, values))));

        const policies = outputs.slice(0, -1);
        const oneHots = [baseTargets, ...argTargets];

        // Heads whose target row is all zero (sentinel) drop out via the mask
        const policyTerms = policies.map((probs, i) => {
          const responsible = tf.sum(tf.mul(probs, oneHots[i]), 1);
          const present = tf.sum(oneHots[i], 1);
          return tf.neg(tf.sum(tf.mul(tf.mul(logClip(responsible), advantages), present)));
        });
        const policyLoss = tf.addN(policyTerms);

        const entropy = tf.neg(tf.addN(policies.map(probs => tf.sum(tf.mul(probs, logClip(probs))))));

        parts = [tf.keep(valueLoss), tf.keep(policyLoss), tf.keep(entropy)];

        return tf.sub(
          tf.add(tf.mul(valueLoss, valueCoef), policyLoss),
          tf.mul(entropy, entropyCoef)
        ).asScalar();
      });

      const gradients = model.weights.map(weight => {
        const grad = grads[weight.name];
        return grad ? Float32Array.from(grad.dataSync()) : new Float32Array(weight.shape.reduce<number>((a, b) => a * (b ?? 1), 1));
      });
      tf.dispose(loss);
      tf.dispose(grads);

      const [valueLoss, policyLoss, entropy] = parts.map(t => t.dataSync()[0]);
      return { gradients, valueLoss, policyLoss, entropy, varNorm: this.varNorm() };
    } finally {
      tf.dispose(parts);
      tf.dispose([...inputs, baseTargets, ...argTargets, advantages, returns]);
    }
  }

  getParameters(): ParameterSnapshot {
    const model = this.getModel();
    return {
      version: 0,
      tensors: model.weights.map(weight => ({
        name: this.logicalName(weight.name),
        shape: weight.shape.map(d => d ?? 1),
        values: Float32Array.from(weight.read().dataSync()),
      })),
    };
  }

  setParameters(snapshot: ParameterSnapshot): void {
    const model = this.getModel();
    const weights = model.weights;
    if (snapshot.tensors.length !== weights.length) {
      throw new TrainingRuntimeError('GRADIENT_SHAPE_MISMATCH', `Snapshot has ${snapshot.tensors.length} tensors, model has ${weights.length}`);
    }
    snapshot.tensors.forEach((t, i) => {
      const expected = weights[i].shape.reduce((a: number, b) => a * (b ?? 1), 1);
      if (t.values.length !== expected) {
        throw new TrainingRuntimeError('GRADIENT_SHAPE_MISMATCH', `Parameter ${t.name} has ${t.values.length} values`, { expected });
      }
    });
    tf.tidy(() => {
      model.setWeights(snapshot.tensors.map(t => tf.tensor(t.values, t.shape, 'float32')));
    });
  }

  getModel(): tf.LayersModel {
    if (!this.model) {
      throw new Error('Model not built. Call build() first.');
    }
    return this.model;
  }

  dispose(): void {
    this.model?.dispose();
    this.model = null;
  }

  private varNorm(): number {
    let sumSquares = 0;
    for (const t of this.getParameters().tensors) {
      for (let i = 0; i < t.values.length; i++) {
        sumSquares += t.values[i] * t.values[i];
      }
    }
    return Math.sqrt(sumSquares);
  }

  private logicalName(weightName: string): string {
    return weightName.replace(`${this.scope}_`, '');
  }

  private toInputs(nonspatial: Float32Array[], screen: SpatialTensor[], minimap: SpatialTensor[]): tf.Tensor[] {
    const n = nonspatial.length;
    return [
      tf.tensor2d(concat(nonspatial), [n, this.shape.nonspatialSize]),
      tf.tensor4d(concat(screen.map(s => s.data)), [n, ...this.shape.screenShape]),
      tf.tensor4d(concat(minimap.map(s => s.data)), [n, ...this.shape.minimapShape]),
    ];
  }
}

function concat(arrays: Float32Array[]): Float32Array {
  const total = arrays.reduce((sum, a) => sum + a.length, 0);
  const out = new Float32Array(total);
  let offset = 0;
  for (const a of arrays) {
    out.set(a, offset);
    offset += a.length;
  }
  return out;
}
