import { describe, expect, it } from 'vitest';
import { KNOWN_MAPS, loadTrainingConfig, parseRace, resolveMapName } from '../env';
import { TRAINING_CONFIG } from '../training.config';
import { isTrainingErrorCode } from '../../errors';
import { errorOf } from '../../__tests__/fixtures';

describe('loadTrainingConfig', () => {
  it('keeps the defaults when nothing is overridden', () => {
    expect(loadTrainingConfig({})).toEqual(TRAINING_CONFIG);
  });

  it('applies A3C_* overrides', () => {
    const config = loadTrainingConfig({
      A3C_RACE: 'Z',
      A3C_WORKERS: '4',
      A3C_LEARNING_RATE: '0.0005',
      A3C_ROLLOUT_CUTOFF: '20',
      A3C_ENV_URL: 'http://127.0.0.1:6000',
      A3C_LOAD_MODEL: 'true',
      A3C_SUMMARY_INTERVAL: '10',
    });

    expect(config.agent.race).toBe('Z');
    expect(config.workers.count).toBe(4);
    expect(config.training.learningRate).toBe(0.0005);
    expect(config.training.rolloutCutoff).toBe(20);
    expect(config.environment.url).toBe('http://127.0.0.1:6000');
    expect(config.checkpoints.loadModel).toBe(true);
    expect(config.telemetry.summaryInterval).toBe(10);
    // Untouched values keep their defaults
    expect(config.training.gamma).toBe(0.99);
    expect(config.workers.startStaggerMs).toBe(125);
  });

  it('accepts 0 and 1 for boolean switches', () => {
    expect(loadTrainingConfig({ A3C_LOAD_MODEL: '1' }).checkpoints.loadModel).toBe(true);
    expect(loadTrainingConfig({ A3C_LOAD_MODEL: '0' }).checkpoints.loadModel).toBe(false);
  });

  it('rejects invalid values and names each one', () => {
    const error = errorOf(() => loadTrainingConfig({ A3C_WORKERS: '0', A3C_GAMMA: 'abc', A3C_RACE: 'X' }));

    expect(isTrainingErrorCode(error, 'INVALID_CONFIG')).toBe(true);
    const message = error instanceof Error ? error.message : '';
    expect(message).toContain('A3C_WORKERS');
    expect(message).toContain('A3C_GAMMA');
    expect(message).toContain('A3C_RACE');
  });

  it('rejects a malformed environment bridge URL', () => {
    expect(isTrainingErrorCode(errorOf(() => loadTrainingConfig({ A3C_ENV_URL: 'localhost' })), 'INVALID_CONFIG')).toBe(true);
  });
});

describe('parseRace', () => {
  it('accepts the three races', () => {
    expect(['T', 'P', 'Z'].map(parseRace)).toEqual(['T', 'P', 'Z']);
  });

  it('rejects anything else', () => {
    expect(isTrainingErrorCode(errorOf(() => parseRace('R')), 'INVALID_CONFIG')).toBe(true);
  });
});

describe('resolveMapName', () => {
  it('accepts a known map', () => {
    expect(resolveMapName(' MoveToBeacon ')).toBe('MoveToBeacon');
    expect(KNOWN_MAPS).toContain('CollectMineralShards');
  });

  it('requires a map name', () => {
    expect(isTrainingErrorCode(errorOf(() => resolveMapName(undefined)), 'INVALID_CONFIG')).toBe(true);
    expect(isTrainingErrorCode(errorOf(() => resolveMapName('   ')), 'INVALID_CONFIG')).toBe(true);
  });

  it('rejects maps outside the catalogue', () => {
    const error = errorOf(() => resolveMapName('Nowhere'));
    expect(isTrainingErrorCode(error, 'INVALID_CONFIG')).toBe(true);
    expect(isTrainingErrorCode(error, 'INVALID_CONFIG') ? error.context : undefined).toEqual({ knownMaps: KNOWN_MAPS });
  });
});
