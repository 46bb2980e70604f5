import type { ActionCatalogue, ActionSpec, ArgType, Race, SpatialConfig } from '../types';
import { TrainingRuntimeError, indexOutOfRange } from '../errors';
import defaultCatalogue from '../data/actions.json';

const SCREEN_ARGS = new Set(['screen', 'screen2']);
const MINIMAP_ARGS = new Set(['minimap']);

/**
 * Resolve one dimension of an argument type to its concrete size.
 * Network head sizing and codec sampling both go through here, so the two
 * can never disagree on shapes.
 */
export function argSize(argType: ArgType, dim: number, spatial: SpatialConfig): number {
  if (dim < 0 || dim >= argType.sizes.length) {
    throw indexOutOfRange(`Argument ${argType.name} has no dimension ${dim}`, { dims: argType.sizes.length });
  }
  const declared = argType.sizes[dim];
  if (declared !== 0) {
    return declared;
  }
  if (SCREEN_ARGS.has(argType.name)) return spatial.screenSize;
  if (MINIMAP_ARGS.has(argType.name)) return spatial.minimapSize;
  return 1;
}

/**
 * Immutable description of the factored action space: general actions first,
 * then the actions of the selected race, each in catalogue order
 */
export class ActionSpace {
  readonly generalActions: readonly ActionSpec[];
  readonly raceActions: readonly ActionSpec[];
  readonly actionCount: number;
  readonly argTypes: readonly ArgType[];
  readonly spatial: SpatialConfig;
  readonly race: Race;

  private readonly resolvedSizes: ReadonlyMap<string, readonly number[]>;
  private readonly indexById: ReadonlyMap<number, number>;

  private constructor(
    generalActions: ActionSpec[],
    raceActions: ActionSpec[],
    argTypes: ArgType[],
    spatial: SpatialConfig,
    race: Race
  ) {
    this.generalActions = Object.freeze(generalActions);
    this.raceActions = Object.freeze(raceActions);
    this.actionCount = generalActions.length + raceActions.length;
    this.argTypes = Object.freeze(argTypes);
    this.spatial = Object.freeze({ ...spatial });
    this.race = race;

    const sizes = new Map<string, readonly number[]>();
    for (const arg of argTypes) {
      sizes.set(arg.name, Object.freeze(arg.sizes.map((_, dim) => argSize(arg, dim, spatial))));
    }
    this.resolvedSizes = sizes;

    const byId = new Map<number, number>();
    [...generalActions, ...raceActions].forEach((action, index) => byId.set(action.id, index));
    this.indexById = byId;
  }

  static fromCatalogue(catalogue: ActionCatalogue, race: Race, spatial: SpatialConfig): ActionSpace {
    const argTypes = catalogue.argTypes.map(arg => Object.freeze({ name: arg.name, sizes: Object.freeze([...arg.sizes]) }));
    const argByName = new Map(argTypes.map(arg => [arg.name, arg]));

    const toSpec = (fn: ActionCatalogue['functions'][number]): ActionSpec => {
      const args = fn.args.map(name => {
        const arg = argByName.get(name);
        if (!arg) {
          throw new TrainingRuntimeError('INVALID_CONFIG', `Action ${fn.name} references unknown argument type ${name}`);
        }
        return arg;
      });
      return Object.freeze({ id: fn.id, name: fn.name, argTypes: Object.freeze(args) });
    };

    const general = catalogue.functions.filter(fn => fn.race === 'N').map(toSpec);
    const specific = catalogue.functions.filter(fn => fn.race === race).map(toSpec);

    return new ActionSpace(general, specific, argTypes, spatial, race);
  }

  static withDefaultCatalogue(race: Race, spatial: SpatialConfig): ActionSpace {
    return ActionSpace.fromCatalogue(defaultCatalogue, race, spatial);
  }

  /**
   * Action at a contiguous index: general actions, then race actions
   */
  resolve(index: number): ActionSpec {
    if (!Number.isInteger(index) || index < 0 || index >= this.actionCount) {
      throw indexOutOfRange(`Action index ${index} outside [0, ${this.actionCount})`);
    }
    if (index < this.generalActions.length) {
      return this.generalActions[index];
    }
    return this.raceActions[index - this.generalActions.length];
  }

  isGeneral(index: number): boolean {
    return index < this.generalActions.length;
  }

  indexOf(functionId: number): number | undefined {
    return this.indexById.get(functionId);
  }

  /**
   * Concrete per-dimension sizes of an argument type
   */
  argSizes(name: string): readonly number[] {
    const sizes = this.resolvedSizes.get(name);
    if (!sizes) {
      throw indexOutOfRange(`Unknown argument type ${name}`);
    }
    return sizes;
  }

  /**
   * 1 for every action whose function id the environment currently allows
   */
  availabilityMask(availableIds: ReadonlySet<number>): Float32Array {
    const mask = new Float32Array(this.actionCount);
    for (let i = 0; i < this.actionCount; i++) {
      if (availableIds.has(this.resolve(i).id)) {
        mask[i] = 1;
      }
    }
    return mask;
  }
}
