import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Coordinator, CoordinatorDependencies, ResumableCheckpointer, WorkerResources } from '../coordinator';
import { ActionCodec } from '../../encoding/actionCodec';
import { isTrainingErrorCode } from '../../errors';
import type { ParameterSnapshot } from '../../types';
import {
  FakeNetwork,
  ScriptedEnvironment,
  sequence,
  testActionSpace,
  testEncoder,
  tinySnapshot,
} from '../../__tests__/fixtures';

interface Setup {
  deps: CoordinatorDependencies;
  resources: WorkerResources[];
  networks: FakeNetwork[];
  environments: ScriptedEnvironment[];
  startedAt: number[];
  templatesBuilt: () => number;
}

function setup(
  makeEnvironment: () => ScriptedEnvironment,
  latest: { episodeCount: number; snapshot: ParameterSnapshot } | null = null,
  onWorkerCreated: () => void = () => undefined
): Setup {
  const space = testActionSpace();
  const resources: WorkerResources[] = [];
  const networks: FakeNetwork[] = [];
  const environments: ScriptedEnvironment[] = [];
  const startedAt: number[] = [];
  let templates = 0;

  const checkpointer: ResumableCheckpointer = {
    saveSnapshot: async () => undefined,
    loadLatest: async () => latest,
  };

  const deps: CoordinatorDependencies = {
    createTemplateNetwork: () => {
      templates++;
      return new FakeNetwork();
    },
    createWorkerResources: async () => {
      startedAt.push(Date.now());
      const network = new FakeNetwork();
      const environment = makeEnvironment();
      networks.push(network);
      environments.push(environment);
      const res: WorkerResources = {
        network,
        environment,
        encoder: testEncoder(space),
        codec: new ActionCodec(space, sequence([0.3])),
        telemetry: { recordSummary: () => undefined },
      };
      resources.push(res);
      onWorkerCreated();
      return res;
    },
    checkpointer,
  };
  return { deps, resources, networks, environments, startedAt, templatesBuilt: () => templates };
}

const STORE = { learningRate: 0.01, maxGradNorm: 40 };

describe('Coordinator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('stops itself once the global episode counter reaches the limit', async () => {
    const { deps, networks, environments, templatesBuilt } = setup(() => new ScriptedEnvironment(3));
    const coordinator = new Coordinator(deps, { workerCount: 1, startStaggerMs: 0, maxEpisodes: 3, store: STORE });

    const report = await coordinator.run();

    expect(report).toEqual({ episodes: 3, failures: [] });
    expect(coordinator.globalEpisodeCounter).toBe(3);
    expect(coordinator.isStopping()).toBe(true);
    expect(coordinator.stats.snapshot().totalEpisodes).toBe(3);
    expect(environments[0].resets).toBe(3);
    expect(environments[0].closed).toBe(true);
    expect(networks[0].disposed).toBe(true);
    expect(templatesBuilt()).toBe(1);
    expect(coordinator.getStoreVersion()).toBeNull();
  });

  it('lets workers exit at the episode boundary after stop()', async () => {
    let coordinator: Coordinator | null = null;
    const { deps, environments } = setup(() => new ScriptedEnvironment(3), null, () => coordinator?.stop());
    coordinator = new Coordinator(deps, { workerCount: 2, startStaggerMs: 0, store: STORE });

    const report = await coordinator.run();

    expect(report).toEqual({ episodes: 0, failures: [] });
    // The second worker is never started once a stop is pending
    expect(environments).toHaveLength(1);
    expect(environments[0].resets).toBe(0);
    expect(environments[0].closed).toBe(true);
  });

  it('staggers worker starts and reports failed workers without restarting them', async () => {
    const { deps, environments, startedAt } = setup(() => new ScriptedEnvironment(5, 1));
    const coordinator = new Coordinator(deps, { workerCount: 3, startStaggerMs: 20, store: STORE });

    const report = await coordinator.run();

    expect(report.episodes).toBe(0);
    expect(report.failures.map(f => f.worker)).toEqual([0, 1, 2]);
    for (const failure of report.failures) {
      expect(isTrainingErrorCode(failure.error, 'ENVIRONMENT_FAILURE')).toBe(true);
    }
    expect(startedAt).toHaveLength(3);
    expect(startedAt[1] - startedAt[0]).toBeGreaterThanOrEqual(15);
    expect(startedAt[2] - startedAt[1]).toBeGreaterThanOrEqual(15);
    expect(environments.map(e => e.resets)).toEqual([1, 1, 1]);
    expect(environments.every(e => e.closed)).toBe(true);
  });

  it('keeps a worker that fails before the next one starts from crashing the run', async () => {
    const unhandled: unknown[] = [];
    const onUnhandled = (reason: unknown) => unhandled.push(reason);
    process.on('unhandledRejection', onUnhandled);
    try {
      const { deps, environments } = setup(() => new ScriptedEnvironment(5, 1));
      const coordinator = new Coordinator(deps, { workerCount: 2, startStaggerMs: 50, store: STORE });

      const report = await coordinator.run();

      expect(report.failures.map(f => f.worker)).toEqual([0, 1]);
      expect(environments).toHaveLength(2);
      expect(environments.every(e => e.closed)).toBe(true);
    } finally {
      process.off('unhandledRejection', onUnhandled);
    }
    expect(unhandled).toHaveLength(0);
  });

  it('resumes from the latest snapshot when asked to load', async () => {
    const saved = { ...tinySnapshot(), version: 7 };
    const { deps, networks, templatesBuilt } = setup(() => new ScriptedEnvironment(2), { episodeCount: 200, snapshot: saved });
    const coordinator = new Coordinator(deps, {
      workerCount: 1,
      startStaggerMs: 0,
      loadModel: true,
      maxEpisodes: 201,
      store: STORE,
    });

    const report = await coordinator.run();

    expect(report.episodes).toBe(201);
    expect(templatesBuilt()).toBe(0);
    expect(networks[0].syncedVersions[0]).toBe(7);
  });

  it('starts fresh when there is nothing to load', async () => {
    const { deps, networks, templatesBuilt } = setup(() => new ScriptedEnvironment(2));
    const coordinator = new Coordinator(deps, {
      workerCount: 1,
      startStaggerMs: 0,
      loadModel: true,
      maxEpisodes: 1,
      store: STORE,
    });

    await coordinator.run();

    expect(templatesBuilt()).toBe(1);
    expect(networks[0].syncedVersions[0]).toBe(0);
  });
});
