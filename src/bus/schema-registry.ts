/**
 * Topic schema registry.
 *
 * Maps topics to payload validators. The bus consults it on publish so a
 * malformed payload for a known topic is rejected at the boundary instead
 * of surfacing inside a subscriber. Topics without a validator accept any
 * string-keyed map.
 */

import { EventTopics } from '../domain/topics';
import { Payload, PayloadFor, isPayload } from '../domain/payloads';
import { PLAN_END_STATUSES, VALID_LAYERS } from '../domain/plan';
import { ServiceStatus, Severity } from '../domain/service';

/** Returns the list of problems with a payload; empty means valid. */
export type PayloadValidator = (payload: Payload) => string[];

/** Declarative field rule used by the built-in validators. */
type FieldRule =
  | { kind: 'string'; required: boolean }
  | { kind: 'number'; required: boolean }
  | { kind: 'array'; required: boolean }
  | { kind: 'object'; required: boolean }
  | { kind: 'enum'; required: boolean; values: readonly string[] };

const str = (required = true): FieldRule => ({ kind: 'string', required });
const num = (required = true): FieldRule => ({ kind: 'number', required });
const oneOf = (values: readonly string[], required = true): FieldRule => ({ kind: 'enum', values, required });

function checkField(payload: Payload, field: string, rule: FieldRule): string | undefined {
  const value = payload[field];
  if (value === undefined || value === null) {
    return rule.required ? `Missing required field: ${field}` : undefined;
  }
  switch (rule.kind) {
    case 'string':
      return typeof value === 'string' ? undefined : `Field "${field}" must be a string`;
    case 'number':
      return typeof value === 'number' && Number.isFinite(value) ? undefined : `Field "${field}" must be a finite number`;
    case 'array':
      return Array.isArray(value) ? undefined : `Field "${field}" must be an array`;
    case 'object':
      return isPayload(value) ? undefined : `Field "${field}" must be an object`;
    case 'enum':
      return typeof value === 'string' && rule.values.includes(value)
        ? undefined
        : `Field "${field}" must be one of: ${rule.values.join(', ')}`;
  }
}

/** Build a validator from field rules. */
export function fieldsValidator(rules: Record<string, FieldRule>): PayloadValidator {
  return (payload) => {
    const errors: string[] = [];
    for (const [field, rule] of Object.entries(rules)) {
      const error = checkField(payload, field, rule);
      if (error) errors.push(error);
    }
    return errors;
  };
}

const LAYER_NAMES: readonly string[] = VALID_LAYERS;

/**
 * Built-in validators. PLAN_READY only checks the envelope here: layer
 * membership and step contents are judged by the timeline executor, which
 * reports them as status events rather than throwing at the publisher.
 */
export const DEFAULT_TOPIC_SCHEMAS: Record<string, PayloadValidator> = {
  [EventTopics.PLAN_READY]: fieldsValidator({
    plan_id: str(false),
    layer: str(),
    steps: { kind: 'array', required: true },
  }),
  [EventTopics.PLAN_STARTED]: fieldsValidator({ plan_id: str(), layer: oneOf(LAYER_NAMES) }),
  [EventTopics.PLAN_ENDED]: fieldsValidator({
    plan_id: str(),
    layer: oneOf(LAYER_NAMES),
    status: oneOf(PLAN_END_STATUSES),
    reason: str(false),
  }),
  [EventTopics.PLAN_CANCEL_REQUEST]: fieldsValidator({ plan_id: str() }),
  [EventTopics.STEP_READY]: fieldsValidator({ plan_id: str(), step_id: str() }),
  [EventTopics.STEP_EXECUTED]: fieldsValidator({
    plan_id: str(),
    step_id: str(),
    status: oneOf(['success', 'failure']),
    details: { kind: 'object', required: false },
  }),
  [EventTopics.AUDIO_DUCKING_START]: fieldsValidator({ level: num(), fade_ms: num() }),
  [EventTopics.AUDIO_DUCKING_STOP]: fieldsValidator({ fade_ms: num() }),
  [EventTopics.TTS_GENERATE_REQUEST]: fieldsValidator({
    text: str(),
    clip_id: str(),
    step_id: str(),
    plan_id: str(),
  }),
  [EventTopics.SPEECH_SYNTHESIS_ENDED]: fieldsValidator({ clip_id: str(false), step_id: str(false) }),
  [EventTopics.SPEECH_GENERATION_COMPLETE]: fieldsValidator({ clip_id: str(false) }),
  [EventTopics.VOICE_LISTENING_STARTED]: fieldsValidator({ source: str(false) }),
  [EventTopics.LLM_RESPONSE]: fieldsValidator({ text: str(), response_type: str(false) }),
  [EventTopics.MUSIC_COMMAND]: fieldsValidator({
    action: oneOf(['play', 'stop']),
    song_query: str(false),
    source: str(false),
  }),
  [EventTopics.MUSIC_PLAYBACK_STARTED]: fieldsValidator({
    track: { kind: 'object', required: false },
    source: str(false),
    mode: str(false),
  }),
  [EventTopics.MUSIC_PLAYBACK_STOPPED]: fieldsValidator({ reason: str(false) }),
  [EventTopics.EYE_COMMAND]: fieldsValidator({ pattern: str(), color: str() }),
  [EventTopics.MOTION_COMMAND]: fieldsValidator({ motion: str() }),
  [EventTopics.SERVICE_STATUS_UPDATE]: fieldsValidator({
    service_name: str(),
    status: oneOf(Object.values(ServiceStatus)),
    message: str(),
    severity: oneOf(Object.values(Severity), false),
    uptime: str(false),
    last_update: str(false),
  }),
  [EventTopics.SERVICE_STATUS_REQUEST]: fieldsValidator({ service_name: str(false) }),
  [EventTopics.SERVICE_READY]: fieldsValidator({ service_name: str(), timestamp: str() }),
};

export class SchemaRegistry {
  private validators = new Map<string, PayloadValidator>();

  constructor(schemas: Record<string, PayloadValidator> = DEFAULT_TOPIC_SCHEMAS) {
    for (const [topic, validator] of Object.entries(schemas)) {
      this.validators.set(topic, validator);
    }
  }

  register(topic: string, validator: PayloadValidator): void {
    this.validators.set(topic, validator);
  }

  unregister(topic: string): boolean {
    return this.validators.delete(topic);
  }

  has(topic: string): boolean {
    return this.validators.has(topic);
  }

  /** Problems with `payload` for `topic`. */
  validate(topic: string, payload: unknown): string[] {
    if (!isPayload(payload)) return ['Payload must be an object'];
    const validator = this.validators.get(topic);
    return validator ? validator(payload) : [];
  }

  /** Narrow a payload to the registered shape of its topic. */
  conforms<T extends string>(topic: T, payload: unknown): payload is PayloadFor<T> {
    return this.validate(topic, payload).length === 0;
  }
}
