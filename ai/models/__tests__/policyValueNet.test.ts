import * as tf from '@tensorflow/tfjs';
import { afterEach, describe, expect, it } from 'vitest';
import { PolicyValueNet, LossWeights } from '../policyValueNet';
import { SENTINEL } from '../../config/training.config';
import { isTrainingErrorCode } from '../../errors';
import type { EncodedObservation, TrainingBatch, TrainingTargets } from '../../types';
import { errorOf, rawObservation, testActionSpace, testEncoder } from '../../__tests__/fixtures';

// The two stride-reducing convolutions need at least 20x20 inputs
const SIZE = 20;

const space = testActionSpace({ screenSize: SIZE, minimapSize: SIZE });
const encoder = testEncoder(space);
const shape = {
  nonspatialSize: encoder.nonspatialSize(),
  screenShape: encoder.screenShape,
  minimapShape: encoder.minimapShape,
};

const networks: PolicyValueNet[] = [];

function network(lossWeights?: LossWeights): PolicyValueNet {
  const net = new PolicyValueNet(space, shape, lossWeights);
  net.build(8, 16);
  networks.push(net);
  return net;
}

function observation(reward = 0): EncodedObservation {
  return encoder.encode(rawObservation({ reward }, SIZE), encoder.createState());
}

function batchOf(observations: EncodedObservation[]): TrainingBatch {
  return {
    nonspatial: observations.map(o => o.nonspatial),
    screen: observations.map(o => o.screen),
    minimap: observations.map(o => o.minimap),
  };
}

const targets: TrainingTargets = {
  baseActions: [1, 1, 0],
  argSamples: [
    { screen: [3, 5], queued: [1], select_add: [SENTINEL] },
    { screen: [7, 2], queued: [0], select_add: [SENTINEL] },
    { screen: [SENTINEL, SENTINEL], queued: [SENTINEL], select_add: [SENTINEL] },
  ],
  discountedReturns: [1, 0, 1],
  advantages: [1, -0.5, 2],
};

describe('PolicyValueNet', () => {
  afterEach(() => {
    networks.splice(0).forEach(net => net.dispose());
  });

  it('produces one distribution per head and a value', () => {
    const output = network().evaluate(observation());

    expect(output.baseDist).toHaveLength(4);
    expect(output.baseDist.reduce((a, b) => a + b, 0)).toBeCloseTo(1, 5);
    expect(output.argDists.screen.map(d => d.length)).toEqual([SIZE, SIZE]);
    expect(output.argDists.queued.map(d => d.length)).toEqual([2]);
    expect(output.argDists.select_add.map(d => d.length)).toEqual([2]);
    expect(Number.isFinite(output.value)).toBe(true);
  });

  it('does not leak tensors when evaluating', () => {
    const net = network();
    const obs = observation();
    net.evaluate(obs);
    const before = tf.memory().numTensors;
    net.evaluate(obs);
    expect(tf.memory().numTensors).toBe(before);
  });

  it('exposes parameters under names free of the network scope', () => {
    const names = network().getParameters().tensors.map(t => t.name);
    expect(names).toContain('policy_base/kernel');
    expect(names).toContain('policy_screen_1/bias');
    expect(names).toContain('value/kernel');
    expect(names.some(name => name.startsWith('net'))).toBe(false);
  });

  it('reproduces another network once given its parameters', () => {
    const source = network();
    const copy = network();
    const obs = observation();

    copy.setParameters(source.getParameters());

    const expected = source.evaluate(obs);
    const actual = copy.evaluate(obs);
    Array.from(actual.baseDist).forEach((p, i) => expect(p).toBeCloseTo(expected.baseDist[i], 6));
    expect(actual.value).toBeCloseTo(expected.value, 6);
  });

  it('rejects snapshots that do not fit the model', () => {
    const net = network();
    const snapshot = net.getParameters();
    const truncated = { ...snapshot, tensors: snapshot.tensors.slice(1) };
    expect(isTrainingErrorCode(errorOf(() => net.setParameters(truncated)), 'GRADIENT_SHAPE_MISMATCH')).toBe(true);
  });

  it('computes finite gradients aligned with the parameters', () => {
    const net = network();
    const parameters = net.getParameters().tensors;

    const result = net.computeGradients(batchOf([observation(1), observation(0), observation(1)]), targets);

    expect(result.gradients).toHaveLength(parameters.length);
    result.gradients.forEach((grad, i) => {
      expect(grad.length).toBe(parameters[i].values.length);
      expect(grad.every(Number.isFinite)).toBe(true);
    });
    expect(Number.isFinite(result.valueLoss)).toBe(true);
    expect(Number.isFinite(result.policyLoss)).toBe(true);
    expect(result.entropy).toBeGreaterThan(0);
    expect(result.varNorm).toBeGreaterThan(0);
  });

  it('gives heads with only sentinel targets no policy gradient', () => {
    const net = network({ valueCoef: 0.5, entropyCoef: 0, logProbFloor: 1e-20 });
    const names = net.getParameters().tensors.map(t => t.name);

    const { gradients } = net.computeGradients(batchOf([observation(1), observation(0), observation(1)]), targets);

    const unused = gradients[names.indexOf('policy_select_add_0/kernel')];
    const used = gradients[names.indexOf('policy_queued_0/kernel')];
    expect(unused.every(g => g === 0)).toBe(true);
    expect(used.some(g => g !== 0)).toBe(true);
  });

  it('rejects targets that do not match the batch', () => {
    const net = network();
    const error = errorOf(() => net.computeGradients(batchOf([observation()]), targets));
    expect(isTrainingErrorCode(error, 'INDEX_OUT_OF_RANGE')).toBe(true);
  });
});
