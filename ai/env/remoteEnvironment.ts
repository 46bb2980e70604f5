import { io, Socket } from 'socket.io-client';
import { z } from 'zod';
import type { ActionCall, RawObservation } from '../types';
import type { Environment, EnvironmentSettings } from './environment';
import { TRAINING_CONFIG } from '../config/training.config';
import { TrainingRuntimeError } from '../errors';

const planesSchema = z.array(z.array(z.array(z.number().finite())));

export const observationSchema = z.object({
  reward: z.number().finite(),
  stepType: z.enum(['first', 'mid', 'last']),
  availableActions: z.array(z.number().int()),
  screen: planesSchema,
  minimap: planesSchema,
  features: z.record(z.array(z.number().finite())),
});

const failureSchema = z.object({ ok: z.literal(false), error: z.string() });

const observationAckSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), observation: observationSchema }),
  failureSchema,
]);

const createAckSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true) }),
  failureSchema,
]);

export interface RemoteEnvironmentOptions {
  url: string;
  ackTimeoutMs: number;
  reconnectionAttempts: number;
  reconnectionDelay: number;
}

const DEFAULT_OPTIONS: RemoteEnvironmentOptions = {
  url: TRAINING_CONFIG.environment.url,
  ackTimeoutMs: TRAINING_CONFIG.environment.ackTimeoutMs,
  reconnectionAttempts: TRAINING_CONFIG.environment.reconnectionAttempts,
  reconnectionDelay: TRAINING_CONFIG.environment.reconnectionDelay,
};

/**
 * Game instance hosted by an environment bridge, driven over socket.io.
 * Every request is acknowledged; a timeout, a disconnect or a refused
 * request is an environment failure and is not retried.
 */
export class RemoteEnvironment implements Environment {
  private socket: Socket;
  private lost: string | null = null;

  private constructor(private name: string, private options: RemoteEnvironmentOptions) {
    // One connection per game, even when workers share a bridge.
    // socket.io-client treats 0 attempts as unlimited, so 0 turns reconnection off.
    this.socket = io(options.url, {
      forceNew: true,
      reconnection: options.reconnectionAttempts > 0,
      reconnectionAttempts: options.reconnectionAttempts,
      reconnectionDelay: options.reconnectionDelay,
    });

    this.socket.on('connect', () => {
      console.log(`[${this.name}] Connected to environment bridge`);
    });

    this.socket.on('disconnect', (reason) => {
      console.log(`[${this.name}] Disconnected from environment bridge (${reason})`);
      this.lost = reason;
    });
  }

  /**
   * Connect to the bridge and create a game for the given settings
   */
  static async connect(
    name: string,
    settings: EnvironmentSettings,
    options: Partial<RemoteEnvironmentOptions> = {}
  ): Promise<RemoteEnvironment> {
    const env = new RemoteEnvironment(name, { ...DEFAULT_OPTIONS, ...options });
    try {
      await env.waitForConnection();
      const ack = createAckSchema.parse(await env.request('env:create', settings));
      if (!ack.ok) {
        throw new TrainingRuntimeError('ENVIRONMENT_FAILURE', `Environment bridge refused env:create: ${ack.error}`, { ...settings });
      }
    } catch (error) {
      env.socket.disconnect();
      throw env.asFailure('env:create', error);
    }
    return env;
  }

  async reset(): Promise<RawObservation> {
    return this.observe('env:reset');
  }

  async step(call: ActionCall): Promise<RawObservation> {
    return this.observe('env:step', call);
  }

  async close(): Promise<void> {
    this.socket.disconnect();
  }

  private async observe(event: string, payload?: unknown): Promise<RawObservation> {
    try {
      const ack = observationAckSchema.parse(await this.request(event, payload));
      if (!ack.ok) {
        throw new TrainingRuntimeError('ENVIRONMENT_FAILURE', `Environment bridge refused ${event}: ${ack.error}`);
      }
      return ack.observation;
    } catch (error) {
      throw this.asFailure(event, error);
    }
  }

  private async request(event: string, payload?: unknown): Promise<unknown> {
    if (this.lost !== null) {
      throw new TrainingRuntimeError('ENVIRONMENT_FAILURE', `Connection to environment bridge lost (${this.lost})`);
    }
    const emitter = this.socket.timeout(this.options.ackTimeoutMs);
    const response: unknown = payload === undefined
      ? await emitter.emitWithAck(event)
      : await emitter.emitWithAck(event, payload);
    return response;
  }

  private asFailure(event: string, error: unknown): TrainingRuntimeError {
    if (error instanceof TrainingRuntimeError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new TrainingRuntimeError('ENVIRONMENT_FAILURE', `${event} failed: ${message}`, { environment: this.name }, error);
  }

  private async waitForConnection(): Promise<void> {
    if (this.socket.connected) return;

    return new Promise((resolve, reject) => {
      const unreachable = (reason: string) => {
        reject(new TrainingRuntimeError('ENVIRONMENT_FAILURE', `Could not reach environment bridge at ${this.options.url} (${reason})`));
      };

      this.socket.once('connect', () => resolve());
      if (this.options.reconnectionAttempts > 0) {
        this.socket.io.once('reconnect_failed', () => unreachable(`gave up after ${this.options.reconnectionAttempts} attempts`));
      } else {
        this.socket.once('connect_error', (error) => unreachable(error.message));
      }
    });
  }
}
