// Declared feature layout of an observation. Order is part of the network's
// input contract: reordering any list here is a breaking change.

export const SCREEN_CHANNELS = [
  'height_map',
  'visibility_map',
  'creep',
  'power',
  'player_id',
  'player_relative',
  'unit_type',
  'selected',
  'unit_hit_points',
  'unit_energy',
  'unit_shields',
  'unit_density',
  'unit_density_aa',
] as const;

export const MINIMAP_CHANNELS = [
  'height_map',
  'visibility_map',
  'creep',
  'camera',
  'player_id',
  'player_relative',
  'selected',
] as const;

export const PLAYER_RELATIVE_CHANNEL = SCREEN_CHANNELS.indexOf('player_relative');
export const UNIT_TYPE_CHANNEL = SCREEN_CHANNELS.indexOf('unit_type');

export type NonspatialFeatureSpec =
  | { name: string; kind: 'fixed'; length: number }
  | { name: string; kind: 'variable'; maxCount: number };

export const NONSPATIAL_FEATURES: readonly NonspatialFeatureSpec[] = [
  { name: 'player', kind: 'fixed', length: 11 },
  { name: 'game_loop', kind: 'fixed', length: 1 },
  { name: 'score_cumulative', kind: 'fixed', length: 13 },
  { name: 'single_select', kind: 'variable', maxCount: 1 },
  { name: 'multi_select', kind: 'variable', maxCount: 500 },
  { name: 'cargo', kind: 'variable', maxCount: 500 },
  { name: 'cargo_slots_available', kind: 'fixed', length: 1 },
  { name: 'build_queue', kind: 'variable', maxCount: 10 },
  { name: 'control_groups', kind: 'fixed', length: 20 },
];
