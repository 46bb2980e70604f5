#!/usr/bin/env node
import * as path from 'path';
import { loadEnvFiles, loadTrainingConfig, parseRace, resolveMapName, KNOWN_MAPS } from './config/env';
import type { TrainingConfig } from './config/training.config';
import { ActionSpace } from './encoding/actionSpace';
import { ObservationEncoder } from './encoding/observationEncoder';
import { ActionCodec } from './encoding/actionCodec';
import { PolicyValueNet } from './models/policyValueNet';
import { RemoteEnvironment } from './env/remoteEnvironment';
import { FileCheckpointer } from './training/checkpointer';
import { Coordinator, WorkerResources } from './training/coordinator';
import { TelemetryRecorder } from './utils/logger';
import { isTrainingErrorCode } from './errors';

interface CliArgs {
  mapName?: string;
  workers?: number;
  race?: string;
  load: boolean;
  episodes?: number;
}

const USAGE = 'Usage: npm run train -- <mapName> [--workers N] [--race T|P|Z] [--load] [--episodes N]';

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { load: false };

  const positiveInt = (flag: string, value: string | undefined): number => {
    const parsed = value === undefined ? NaN : Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
      throw new Error(`${flag} expects a positive integer, got ${value ?? 'nothing'}`);
    }
    return parsed;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--workers':
        args.workers = positiveInt(arg, argv[++i]);
        break;
      case '--episodes':
        args.episodes = positiveInt(arg, argv[++i]);
        break;
      case '--race':
        args.race = argv[++i];
        break;
      case '--load':
        args.load = true;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        args.mapName = arg;
    }
  }
  return args;
}

function applyArgs(config: TrainingConfig, args: CliArgs): TrainingConfig {
  return {
    ...config,
    agent: { ...config.agent, race: args.race !== undefined ? parseRace(args.race) : config.agent.race },
    workers: { ...config.workers, count: args.workers ?? config.workers.count },
    checkpoints: { ...config.checkpoints, loadModel: args.load || config.checkpoints.loadModel },
  };
}

function createCoordinator(config: TrainingConfig, mapName: string, maxEpisodes?: number): Coordinator {
  const { agent, network, training, environment, checkpoints, telemetry } = config;
  const spatial = { screenSize: agent.screenSize, minimapSize: agent.minimapSize };
  const actionSpace = ActionSpace.withDefaultCatalogue(agent.race, spatial);
  const encoderOptions = {
    unitTypeCount: agent.unitTypeCount,
    unitMemoryDecay: agent.unitMemoryDecay,
    enemyMarker: agent.enemyMarker,
    selectElementWidth: agent.selectElementWidth,
  };
  const shapeEncoder = new ObservationEncoder(actionSpace, encoderOptions);
  const networkShape = {
    nonspatialSize: shapeEncoder.nonspatialSize(),
    screenShape: shapeEncoder.screenShape,
    minimapShape: shapeEncoder.minimapShape,
  };

  const createNetwork = (): PolicyValueNet => {
    const net = new PolicyValueNet(actionSpace, networkShape);
    net.build(network.nonspatialUnits, network.latentUnits);
    return net;
  };

  const modelDir = path.join(checkpoints.saveDir, `model${agent.race}`);

  return new Coordinator(
    {
      createTemplateNetwork: createNetwork,
      createWorkerResources: async (index: number): Promise<WorkerResources> => ({
        network: createNetwork(),
        environment: await RemoteEnvironment.connect(
          `worker_${index}`,
          { mapName, race: agent.race, screenSize: agent.screenSize, minimapSize: agent.minimapSize },
          environment
        ),
        encoder: new ObservationEncoder(actionSpace, encoderOptions),
        codec: new ActionCodec(actionSpace),
        telemetry: new TelemetryRecorder(`train_${index}`, telemetry.logDir),
      }),
      checkpointer: new FileCheckpointer(modelDir, checkpoints.maxToKeep),
    },
    {
      workerCount: config.workers.count,
      startStaggerMs: config.workers.startStaggerMs,
      loadModel: checkpoints.loadModel,
      maxEpisodes,
      store: { learningRate: training.learningRate, maxGradNorm: training.maxGradNorm },
      worker: {
        gamma: training.gamma,
        rolloutCutoff: training.rolloutCutoff,
        maxEpisodeLength: training.maxEpisodeLength,
        summaryInterval: telemetry.summaryInterval,
        saveIncrement: checkpoints.saveIncrement,
      },
    }
  );
}

/**
 * Main training entry point
 */
async function main(): Promise<number> {
  loadEnvFiles();

  let args: CliArgs;
  let config: TrainingConfig;
  let mapName: string;
  try {
    args = parseArgs(process.argv.slice(2));
    config = applyArgs(loadTrainingConfig(), args);
    mapName = resolveMapName(args.mapName ?? process.env.A3C_MAP_NAME);
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    if (isTrainingErrorCode(error, 'INVALID_CONFIG')) {
      console.error(`Known maps: ${KNOWN_MAPS.join(', ')}`);
    }
    console.error(USAGE);
    return 1;
  }

  console.log('=================================================');
  console.log('     A3C Training');
  console.log('=================================================\n');

  console.log('Configuration:');
  console.log(`- Map: ${mapName}`);
  console.log(`- Race: ${config.agent.race}`);
  console.log(`- Workers: ${config.workers.count}`);
  console.log(`- Learning rate: ${config.training.learningRate}`);
  console.log(`- Rollout cutoff: ${config.training.rolloutCutoff}`);
  console.log(`- Environment bridge: ${config.environment.url}`);
  console.log('');

  const coordinator = createCoordinator(config, mapName, args.episodes);
  process.once('SIGINT', () => coordinator.stop());

  const report = await coordinator.run();
  for (const failure of report.failures) {
    console.error(`worker_${failure.worker} failed:`, failure.error);
  }

  console.log('\n=================================================');
  console.log('     Training Complete!');
  console.log('=================================================\n');
  return report.failures.length > 0 ? 1 : 0;
}

main()
  .then(code => process.exit(code))
  .catch(error => {
    console.error('Training error:', error);
    process.exit(1);
  });
