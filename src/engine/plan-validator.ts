/**
 * Plan validator.
 *
 * Turns a PLAN_READY payload into a Plan. Checks the layer, every step's
 * type and the fields each step type needs before any task is started.
 */

import { v4 as uuid } from 'uuid';
import { TypedError, ValidationError, createTypedError } from '../domain/errors';
import { isPayload, Payload } from '../domain/payloads';
import { Plan, PlanStep, StepType, VALID_LAYERS, VALID_STEP_TYPES, isLayer, isStepType } from '../domain/plan';

/** Fields each step type must carry. */
export const REQUIRED_STEP_FIELDS: Record<StepType, readonly (keyof PlanStep)[]> = {
  speak: ['text'],
  play_music: ['genre'],
  eye_pattern: [],
  move: ['motion'],
  delay: ['delay'],
  wait_for_event: ['event'],
};

const STRING_STEP_FIELDS = ['text', 'clip_id', 'genre', 'event', 'pattern', 'motion'] as const;

export interface PlanValidationResult {
  valid: boolean;
  errors: TypedError[];
  plan?: Plan;
}

function fieldError(message: string, path: string, details: Record<string, unknown> = {}): TypedError {
  return createTypedError({
    code: 'VALIDATION.PLAN',
    message,
    details: { path, ...details },
  });
}

function parseStep(raw: unknown, index: number, errors: TypedError[]): PlanStep | undefined {
  const path = `steps[${index}]`;
  if (!isPayload(raw)) {
    errors.push(fieldError(`${path} must be an object`, path));
    return undefined;
  }

  const before = errors.length;
  const { id, type } = raw;
  if (typeof id !== 'string' || id.trim() === '') {
    errors.push(fieldError(`${path}.id must be a non-empty string`, `${path}.id`));
  }
  if (!isStepType(type)) {
    errors.push(
      fieldError(`${path}.type "${String(type)}" is not a valid step type`, `${path}.type`, {
        validTypes: VALID_STEP_TYPES,
      }),
    );
  }
  for (const field of STRING_STEP_FIELDS) {
    if (raw[field] !== undefined && raw[field] !== null && typeof raw[field] !== 'string') {
      errors.push(fieldError(`${path}.${field} must be a string`, `${path}.${field}`));
    }
  }
  const delay = raw.delay;
  if (delay !== undefined && delay !== null && (typeof delay !== 'number' || !Number.isFinite(delay) || delay < 0)) {
    errors.push(fieldError(`${path}.delay must be a non-negative number of seconds`, `${path}.delay`));
  }
  if (errors.length > before || typeof id !== 'string' || !isStepType(type)) return undefined;

  const step: PlanStep = { id, type };
  for (const field of STRING_STEP_FIELDS) {
    const value = raw[field];
    if (typeof value === 'string') step[field] = value;
  }
  if (typeof delay === 'number') step.delay = delay;

  for (const field of REQUIRED_STEP_FIELDS[type]) {
    if (step[field] === undefined) {
      errors.push(fieldError(`${path} (${type}) requires "${field}"`, `${path}.${field}`, { stepId: id }));
    }
  }
  return step;
}

/** Validate a plan payload, collecting every problem. */
export function validatePlan(payload: unknown): PlanValidationResult {
  const errors: TypedError[] = [];
  if (!isPayload(payload)) {
    return { valid: false, errors: [fieldError('Plan must be an object', '')] };
  }
  const raw: Payload = payload;

  if (raw.plan_id !== undefined && raw.plan_id !== null && (typeof raw.plan_id !== 'string' || raw.plan_id === '')) {
    errors.push(fieldError('plan_id must be a non-empty string', 'plan_id'));
  }
  if (!isLayer(raw.layer)) {
    errors.push(
      fieldError(`Invalid layer: ${String(raw.layer)}`, 'layer', { validLayers: VALID_LAYERS }),
    );
  }
  if (!Array.isArray(raw.steps)) {
    errors.push(fieldError('steps must be an array', 'steps'));
  }

  const steps: PlanStep[] = [];
  const seen = new Set<string>();
  if (Array.isArray(raw.steps)) {
    raw.steps.forEach((item: unknown, index: number) => {
      const step = parseStep(item, index, errors);
      if (!step) return;
      if (seen.has(step.id)) {
        errors.push(fieldError(`Duplicate step id: ${step.id}`, `steps[${index}].id`, { stepId: step.id }));
      }
      seen.add(step.id);
      steps.push(step);
    });
  }

  if (errors.length > 0 || !isLayer(raw.layer)) {
    return { valid: false, errors };
  }
  const planId = typeof raw.plan_id === 'string' ? raw.plan_id : uuid();
  return { valid: true, errors, plan: { plan_id: planId, layer: raw.layer, steps } };
}

/** Validate and return the plan, or throw a ValidationError listing every problem. */
export function parsePlan(payload: unknown): Plan {
  const result = validatePlan(payload);
  if (!result.plan) {
    const messages = result.errors.map((error) => error.message);
    throw new ValidationError(
      createTypedError({
        code: 'VALIDATION.PLAN',
        message: `Invalid plan: ${messages.join('; ')}`,
        planId: isPayload(payload) && typeof payload.plan_id === 'string' ? payload.plan_id : undefined,
        details: { errors: messages },
      }),
    );
  }
  return result.plan;
}
