import type { ActionCall, ActionSpec, ArgDistributions, ArgSamples } from '../types';
import type { ActionSpace } from './actionSpace';
import { SENTINEL } from '../config/training.config';
import { indexOutOfRange } from '../errors';

export type RandomSource = () => number;

export interface ActionSelection {
  actionIndex: number;
  action: ActionSpec;
  call: ActionCall;
  argSamples: ArgSamples;
  degenerate: boolean; // every base action was masked out; sampled unmasked
}

/**
 * Zero unavailable entries and renormalize the rest. Returns null when no
 * probability mass survives.
 */
export function maskDistribution(dist: ArrayLike<number>, mask: ArrayLike<number>): Float32Array | null {
  if (dist.length !== mask.length) {
    throw indexOutOfRange(`Distribution has ${dist.length} entries, mask has ${mask.length}`);
  }
  const masked = new Float32Array(dist.length);
  let sum = 0;
  for (let i = 0; i < dist.length; i++) {
    masked[i] = mask[i] > 0 ? dist[i] : 0;
    sum += masked[i];
  }
  if (sum === 0) {
    return null;
  }
  if (sum !== 1) {
    for (let i = 0; i < masked.length; i++) {
      masked[i] /= sum;
    }
  }
  return masked;
}

/**
 * Single categorical draw
 */
export function categoricalSample(probs: ArrayLike<number>, random: RandomSource = Math.random): number {
  const rand = random();
  let cumsum = 0;

  for (let i = 0; i < probs.length; i++) {
    cumsum += probs[i];
    if (rand < cumsum) {
      return i;
    }
  }

  // Rounding left the cumulative sum short of 1: take the last non-zero entry
  for (let i = probs.length - 1; i >= 0; i--) {
    if (probs[i] > 0) return i;
  }
  return probs.length - 1;
}

/**
 * Row-major [samples.length, size] one-hot targets. Sentinel samples give an
 * all-zero row, so that head contributes no loss for the step.
 */
export function oneHotTargets(samples: readonly number[], size: number): Float32Array {
  const targets = new Float32Array(samples.length * size);
  samples.forEach((sample, row) => {
    if (sample === SENTINEL) return;
    if (!Number.isInteger(sample) || sample < 0 || sample >= size) {
      throw indexOutOfRange(`Sample ${sample} outside [0, ${size})`);
    }
    targets[row * size + sample] = 1;
  });
  return targets;
}

/**
 * Turns network distributions into an environment call and the argument
 * samples used as training targets
 */
export class ActionCodec {
  private degenerateCount = 0;

  constructor(private actionSpace: ActionSpace, private random: RandomSource = Math.random) {}

  getDegenerateCount(): number {
    return this.degenerateCount;
  }

  selectAction(
    baseDist: ArrayLike<number>,
    argDists: ArgDistributions,
    availableIds: ReadonlySet<number>
  ): ActionSelection {
    const space = this.actionSpace;
    if (baseDist.length !== space.actionCount) {
      throw indexOutOfRange(`Base distribution has ${baseDist.length} entries, action space has ${space.actionCount}`);
    }

    // 1-2. Mask and renormalize, or fall back to the raw distribution
    const masked = maskDistribution(baseDist, space.availabilityMask(availableIds));
    const degenerate = masked === null;
    if (degenerate) {
      this.degenerateCount++;
      console.warn('[ActionCodec] No available action has probability mass; sampling the unmasked distribution');
    }

    // 3. Base action
    const actionIndex = categoricalSample(masked ?? baseDist, this.random);
    const action = space.resolve(actionIndex);

    // 4. Every argument dimension, independently
    const argSamples: ArgSamples = {};
    for (const arg of space.argTypes) {
      const sizes = space.argSizes(arg.name);
      const dists = argDists[arg.name];
      if (!dists || dists.length !== sizes.length) {
        throw indexOutOfRange(`Argument ${arg.name} expects ${sizes.length} distributions`);
      }
      argSamples[arg.name] = dists.map((dist, dim) => {
        if (dist.length !== sizes[dim]) {
          throw indexOutOfRange(`Argument ${arg.name}[${dim}] distribution has ${dist.length} entries, expected ${sizes[dim]}`);
        }
        return categoricalSample(dist, this.random);
      });
    }

    // 5. Call arguments in declared order
    const used = new Set(action.argTypes.map(arg => arg.name));
    const call: ActionCall = {
      functionId: action.id,
      arguments: action.argTypes.map(arg => [...argSamples[arg.name]]),
    };

    // 6. Unused arguments are excluded from the loss
    for (const name of Object.keys(argSamples)) {
      if (!used.has(name)) {
        argSamples[name] = argSamples[name].map(() => SENTINEL);
      }
    }

    return { actionIndex, action, call, argSamples, degenerate };
  }
}
