import * as tf from '@tensorflow/tfjs';
import type { GradientSet, ParameterSnapshot, ParameterStore, PushReport } from '../types';
import { TRAINING_CONFIG } from '../config/training.config';
import { TrainingRuntimeError } from '../errors';

export interface ParameterStoreOptions {
  learningRate: number;
  maxGradNorm: number;
}

/**
 * Global norm of a gradient set and the factor that brings it under maxNorm:
 * t * maxNorm / max(norm, maxNorm)
 */
export function clipByGlobalNorm(gradients: GradientSet, maxNorm: number): { clipped: GradientSet; norm: number } {
  let sumSquares = 0;
  for (const grad of gradients) {
    for (let i = 0; i < grad.length; i++) {
      sumSquares += grad[i] * grad[i];
    }
  }
  const norm = Math.sqrt(sumSquares);
  const scale = maxNorm / Math.max(norm, maxNorm);
  const clipped = scale === 1 ? gradients.map(g => Float32Array.from(g)) : gradients.map(g => g.map(v => v * scale));
  return { clipped, norm };
}

/**
 * Owns the canonical trainable parameters. Workers pull snapshots and push
 * gradients; nothing else is shared between them.
 *
 * push() never yields, so two pushes cannot interleave their updates. pull()
 * gives no isolation against a later push: a worker's gradients may be
 * computed against parameters that are already stale.
 */
export class GlobalParameterStore implements ParameterStore {
  private static instances = 0;

  private variables: tf.Variable[];
  private names: string[];
  private optimizer: tf.Optimizer;
  private maxGradNorm: number;
  private version: number;
  private closed = false;

  constructor(
    initial: ParameterSnapshot,
    options: ParameterStoreOptions = {
      learningRate: TRAINING_CONFIG.training.learningRate,
      maxGradNorm: TRAINING_CONFIG.training.maxGradNorm,
    }
  ) {
    // Engine-wide variable names must be unique
    const scope = `global_${GlobalParameterStore.instances++}`;
    this.names = initial.tensors.map(t => t.name);
    this.variables = initial.tensors.map((t, i) =>
      tf.tidy(() => tf.variable(tf.tensor(t.values, t.shape, 'float32'), true, `${scope}/${i}/${t.name}`))
    );
    this.optimizer = tf.train.adam(options.learningRate);
    this.maxGradNorm = options.maxGradNorm;
    this.version = initial.version;
  }

  pull(): ParameterSnapshot {
    this.assertOpen('pull');
    return {
      version: this.version,
      tensors: this.variables.map((variable, i) => ({
        name: this.names[i],
        shape: [...variable.shape],
        values: Float32Array.from(variable.dataSync()),
      })),
    };
  }

  push(gradients: GradientSet): PushReport {
    this.assertOpen('push');
    if (gradients.length !== this.variables.length) {
      throw new TrainingRuntimeError('GRADIENT_SHAPE_MISMATCH', `Got ${gradients.length} gradients for ${this.variables.length} parameters`);
    }
    gradients.forEach((grad, i) => {
      if (grad.length !== this.variables[i].size) {
        throw new TrainingRuntimeError('GRADIENT_SHAPE_MISMATCH', `Gradient ${i} has ${grad.length} values`, {
          parameter: this.names[i],
          expected: this.variables[i].size,
        });
      }
    });

    const { clipped, norm } = clipByGlobalNorm(gradients, this.maxGradNorm);

    tf.tidy(() => {
      const named: tf.NamedTensorMap = {};
      this.variables.forEach((variable, i) => {
        named[variable.name] = tf.tensor(clipped[i], variable.shape, 'float32');
      });
      this.optimizer.applyGradients(named);
    });

    this.version++;
    return { version: this.version, gradNorm: norm };
  }

  getVersion(): number {
    return this.version;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.variables.forEach(v => v.dispose());
    this.optimizer.dispose();
  }

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw new TrainingRuntimeError('PARAMETER_STORE_UNAVAILABLE', `Cannot ${operation}: parameter store is closed`);
    }
  }
}
