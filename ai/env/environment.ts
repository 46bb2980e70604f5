import type { ActionCall, RawObservation } from '../types';

/**
 * A single game instance driven by one worker
 */
export interface Environment {
  reset(): Promise<RawObservation>;
  step(call: ActionCall): Promise<RawObservation>;
  close(): Promise<void>;
}

export interface EnvironmentSettings {
  mapName: string;
  race: string;
  screenSize: number;
  minimapSize: number;
}
