/**
 * Plan domain model.
 *
 * A Plan is an ordered list of Steps submitted for execution on one of
 * three priority layers. Field names follow the wire payloads exchanged on
 * the bus (snake_case), since plans arrive from bus peers as-is.
 */

/** Priority tiers a plan can occupy. */
export enum Layer {
  Ambient = 'ambient',
  Foreground = 'foreground',
  Override = 'override',
}

/** Higher number wins. */
export const LAYER_PRIORITY: Record<Layer, number> = {
  [Layer.Ambient]: 1,
  [Layer.Foreground]: 2,
  [Layer.Override]: 3,
};

export const VALID_LAYERS: readonly Layer[] = [Layer.Ambient, Layer.Foreground, Layer.Override];

export function isLayer(value: unknown): value is Layer {
  return typeof value === 'string' && VALID_LAYERS.some((layer) => layer === value);
}

/** Layers with strictly lower priority than the given one, highest first. */
export function lowerLayers(layer: Layer): Layer[] {
  return VALID_LAYERS
    .filter((other) => LAYER_PRIORITY[other] < LAYER_PRIORITY[layer])
    .sort((a, b) => LAYER_PRIORITY[b] - LAYER_PRIORITY[a]);
}

export type StepType = 'speak' | 'play_music' | 'eye_pattern' | 'move' | 'delay' | 'wait_for_event';

export const VALID_STEP_TYPES: readonly StepType[] = [
  'speak',
  'play_music',
  'eye_pattern',
  'move',
  'delay',
  'wait_for_event',
];

export function isStepType(value: unknown): value is StepType {
  return typeof value === 'string' && VALID_STEP_TYPES.some((type) => type === value);
}

/** Sentinel genre meaning "stop playback". */
export const STOP_MUSIC_GENRE = 'stop';

export interface PlanStep {
  id: string;
  type: StepType;
  text?: string;
  clip_id?: string;
  genre?: string;
  /** Topic the step waits on before running. */
  event?: string;
  /** Seconds to wait before the step runs. */
  delay?: number;
  pattern?: string;
  motion?: string;
}

export interface Plan {
  plan_id: string;
  layer: Layer;
  steps: PlanStep[];
}

export type StepOutcome = 'success' | 'failure';

export type PlanEndStatus = 'completed' | 'cancelled' | 'failed' | 'paused';

export const PLAN_END_STATUSES: readonly PlanEndStatus[] = ['completed', 'cancelled', 'failed', 'paused'];

export function isPlanEndStatus(value: unknown): value is PlanEndStatus {
  return typeof value === 'string' && PLAN_END_STATUSES.some((status) => status === value);
}

/** Entry in the executor's active-plan table. */
export interface PlanRecord {
  plan: Plan;
  status: 'running' | 'paused';
}

/** Result of dispatching one step. */
export interface StepResult {
  success: boolean;
  details: Record<string, unknown>;
}
