import type { EncodedObservation, RawObservation, SpatialTensor } from '../types';
import type { ActionSpace } from './actionSpace';
import { TRAINING_CONFIG } from '../config/training.config';
import { TrainingRuntimeError } from '../errors';
import {
  MINIMAP_CHANNELS,
  NONSPATIAL_FEATURES,
  NonspatialFeatureSpec,
  PLAYER_RELATIVE_CHANNEL,
  SCREEN_CHANNELS,
  UNIT_TYPE_CHANNEL,
} from './features';

const UNIT_MEMORY_FLOOR = 1e-30;

export interface EncoderOptions {
  unitTypeCount: number;
  unitMemoryDecay: number;
  enemyMarker: number;
  selectElementWidth: number;
  nonspatialFeatures: readonly NonspatialFeatureSpec[];
}

export const DEFAULT_ENCODER_OPTIONS: EncoderOptions = {
  unitTypeCount: TRAINING_CONFIG.agent.unitTypeCount,
  unitMemoryDecay: TRAINING_CONFIG.agent.unitMemoryDecay,
  enemyMarker: TRAINING_CONFIG.agent.enemyMarker,
  selectElementWidth: TRAINING_CONFIG.agent.selectElementWidth,
  nonspatialFeatures: NONSPATIAL_FEATURES,
};

/**
 * Per-episode running state folded into every encoded observation
 */
export class AgentState {
  lastActionUsed = 0;
  readonly maxUnitsSeen: Float32Array;
  readonly generalActionCounts: Float32Array;
  readonly raceActionCounts: Float32Array;

  constructor(private actionSpace: ActionSpace, unitTypeCount: number) {
    this.maxUnitsSeen = new Float32Array(unitTypeCount);
    this.generalActionCounts = new Float32Array(actionSpace.generalActions.length);
    this.raceActionCounts = new Float32Array(actionSpace.raceActions.length);
  }

  reset(): void {
    this.lastActionUsed = 0;
    this.maxUnitsSeen.fill(0);
    this.generalActionCounts.fill(0);
    this.raceActionCounts.fill(0);
  }

  /**
   * Note an action sent to the environment
   */
  recordAction(actionIndex: number): void {
    // resolve() rejects out-of-range indices
    this.actionSpace.resolve(actionIndex);
    this.lastActionUsed = actionIndex;
    if (this.actionSpace.isGeneral(actionIndex)) {
      this.generalActionCounts[actionIndex] += 1;
    } else {
      this.raceActionCounts[actionIndex - this.actionSpace.generalActions.length] += 1;
    }
  }
}

/**
 * Encodes raw environment observations into the fixed-shape tensors the
 * policy-value network consumes
 */
export class ObservationEncoder {
  private options: EncoderOptions;

  constructor(private actionSpace: ActionSpace, options: Partial<EncoderOptions> = {}) {
    this.options = { ...DEFAULT_ENCODER_OPTIONS, ...options };
  }

  createState(): AgentState {
    return new AgentState(this.actionSpace, this.options.unitTypeCount);
  }

  get screenShape(): [number, number, number] {
    const size = this.actionSpace.spatial.screenSize;
    return [size, size, SCREEN_CHANNELS.length];
  }

  get minimapShape(): [number, number, number] {
    const size = this.actionSpace.spatial.minimapSize;
    return [size, size, MINIMAP_CHANNELS.length];
  }

  /**
   * Width of the nonspatial vector
   */
  nonspatialSize(): number {
    const { unitTypeCount, selectElementWidth, nonspatialFeatures } = this.options;
    // usage counts + availability mask, plus one slot for the last action
    let size = this.actionSpace.actionCount * 2 + unitTypeCount + 1;
    for (const feature of nonspatialFeatures) {
      size += feature.kind === 'fixed' ? feature.length : feature.maxCount * selectElementWidth;
    }
    return size;
  }

  encode(raw: RawObservation, state: AgentState): EncodedObservation {
    // 1-2. Decayed memory of enemy unit types on screen
    this.updateUnitsSeen(raw.screen, state);

    // 3. Availability mask
    const available = this.actionSpace.availabilityMask(new Set(raw.availableActions));

    // 4. Nonspatial vector in declared order
    const nonspatial = new Float32Array(this.nonspatialSize());
    let offset = 0;
    const put = (values: ArrayLike<number>) => {
      nonspatial.set(values, offset);
      offset += values.length;
    };

    put(state.maxUnitsSeen);
    put(state.generalActionCounts);
    put(state.raceActionCounts);
    put(available);
    put([state.lastActionUsed]);

    for (const feature of this.options.nonspatialFeatures) {
      const values = raw.features[feature.name] ?? [];
      if (feature.kind === 'fixed') {
        if (values.length !== feature.length) {
          throw new TrainingRuntimeError('OBSERVATION_SHAPE_MISMATCH', `Feature ${feature.name} has ${values.length} values`, {
            expected: feature.length,
          });
        }
        put(values);
      } else {
        // Zero-padded to capacity; the buffer is already zero-filled
        const capacity = feature.maxCount * this.options.selectElementWidth;
        put(values.length > capacity ? values.slice(0, capacity) : values);
        offset += Math.max(0, capacity - values.length);
      }
    }

    if (nonspatial.some(isNaN)) console.error('[ObservationEncoder] NaN in nonspatial features');

    // 5. Spatial stacks
    const screen = this.stackChannels(raw.screen, this.screenShape, 'screen');
    const minimap = this.stackChannels(raw.minimap, this.minimapShape, 'minimap');

    return {
      reward: raw.reward,
      nonspatial,
      screen,
      minimap,
      isTerminal: raw.stepType === 'last',
    };
  }

  private updateUnitsSeen(screen: number[][][], state: AgentState): void {
    const { unitTypeCount, unitMemoryDecay, enemyMarker } = this.options;
    const relative = screen[PLAYER_RELATIVE_CHANNEL];
    const unitTypes = screen[UNIT_TYPE_CHANNEL];
    const counts = new Float32Array(unitTypeCount);

    if (relative && unitTypes) {
      for (let row = 0; row < relative.length; row++) {
        for (let col = 0; col < relative[row].length; col++) {
          if (relative[row][col] !== enemyMarker) continue;
          const unitType = unitTypes[row]?.[col];
          // Type 0 is an empty cell; unknown types are skipped
          if (unitType === undefined || !Number.isInteger(unitType) || unitType <= 0 || unitType >= unitTypeCount) continue;
          counts[unitType] += 1;
        }
      }
    }

    for (let t = 0; t < unitTypeCount; t++) {
      const decayed = state.maxUnitsSeen[t] * unitMemoryDecay;
      // Flushed before float32 rounding can stall the decay above zero
      state.maxUnitsSeen[t] = Math.max(decayed < UNIT_MEMORY_FLOOR ? 0 : decayed, counts[t]);
    }
  }

  private stackChannels(planes: number[][][], shape: [number, number, number], label: string): SpatialTensor {
    const [height, width, channels] = shape;
    if (planes.length !== channels) {
      throw new TrainingRuntimeError('OBSERVATION_SHAPE_MISMATCH', `${label} has ${planes.length} channels`, {
        expected: channels,
      });
    }

    const data = new Float32Array(height * width * channels);
    planes.forEach((plane, channel) => {
      if (plane.length !== height || plane.some(row => row.length !== width)) {
        throw new TrainingRuntimeError('OBSERVATION_SHAPE_MISMATCH', `${label} channel ${channel} is not ${height}x${width}`);
      }
      for (let row = 0; row < height; row++) {
        for (let col = 0; col < width; col++) {
          data[(row * width + col) * channels + channel] = plane[row][col];
        }
      }
    });

    return { shape: [height, width, channels], data };
  }
}
