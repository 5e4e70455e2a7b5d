import { validatePlan, parsePlan, REQUIRED_STEP_FIELDS } from '../../src/engine/plan-validator';
import { ValidationError } from '../../src/domain/errors';
import { Layer } from '../../src/domain/plan';

function messages(payload: unknown): string[] {
  return validatePlan(payload).errors.map((error) => error.message);
}

describe('Plan Validator', () => {
  test('accepts a well-formed plan', () => {
    const result = validatePlan({
      plan_id: 'intro',
      layer: 'foreground',
      steps: [
        { id: 'hello', type: 'speak', text: 'Hello there', clip_id: 'clip-1' },
        { id: 'pause', type: 'delay', delay: 0.5 },
      ],
    });

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.plan).toEqual({
      plan_id: 'intro',
      layer: Layer.Foreground,
      steps: [
        { id: 'hello', type: 'speak', text: 'Hello there', clip_id: 'clip-1' },
        { id: 'pause', type: 'delay', delay: 0.5 },
      ],
    });
  });

  test('generates a plan id when none is given', () => {
    const result = validatePlan({ layer: 'ambient', steps: [] });
    expect(result.valid).toBe(true);
    expect(result.plan?.plan_id).toMatch(/^[0-9a-f-]{36}$/);
  });

  test('eye patterns need no extra fields', () => {
    expect(validatePlan({ layer: 'ambient', steps: [{ id: 'eyes', type: 'eye_pattern' }] }).valid).toBe(true);
  });

  test('rejects a non-object plan', () => {
    expect(messages('not a plan')).toEqual(['Plan must be an object']);
  });

  test('rejects an unknown layer', () => {
    const result = validatePlan({ layer: 'backstage', steps: [] });
    expect(result.valid).toBe(false);
    expect(result.plan).toBeUndefined();
    expect(result.errors[0].code).toBe('VALIDATION.PLAN');
    expect(result.errors[0].message).toBe('Invalid layer: backstage');
  });

  test('rejects steps that are not an array', () => {
    expect(messages({ layer: 'ambient', steps: 'wave' })).toEqual(['steps must be an array']);
  });

  test('rejects an unknown step type', () => {
    expect(messages({ layer: 'ambient', steps: [{ id: 's1', type: 'dance' }] })).toEqual([
      'steps[0].type "dance" is not a valid step type',
    ]);
  });

  test('requires the fields of each step type', () => {
    expect(REQUIRED_STEP_FIELDS.speak).toEqual(['text']);
    expect(messages({ layer: 'ambient', steps: [{ id: 's1', type: 'speak' }] })).toEqual([
      'steps[0] (speak) requires "text"',
    ]);
    expect(messages({ layer: 'ambient', steps: [{ id: 's1', type: 'move' }] })).toEqual([
      'steps[0] (move) requires "motion"',
    ]);
  });

  test('rejects a field of the wrong type', () => {
    expect(messages({ layer: 'ambient', steps: [{ id: 's1', type: 'speak', text: 5 }] })).toEqual([
      'steps[0].text must be a string',
    ]);
  });

  test('rejects a negative delay', () => {
    expect(messages({ layer: 'ambient', steps: [{ id: 's1', type: 'speak', text: 'hi', delay: -1 }] })).toEqual([
      'steps[0].delay must be a non-negative number of seconds',
    ]);
  });

  test('rejects duplicate step ids', () => {
    expect(
      messages({
        layer: 'ambient',
        steps: [
          { id: 's1', type: 'eye_pattern' },
          { id: 's1', type: 'move', motion: 'wave' },
        ],
      }),
    ).toEqual(['Duplicate step id: s1']);
  });

  test('rejects an empty plan id', () => {
    expect(messages({ plan_id: '', layer: 'ambient', steps: [] })).toEqual(['plan_id must be a non-empty string']);
  });

  test('parsePlan throws a ValidationError listing every problem', () => {
    expect(() => parsePlan({ layer: 'x' })).toThrow(ValidationError);
    expect(() => parsePlan({ layer: 'x' })).toThrow('Invalid plan: Invalid layer: x; steps must be an array');
  });

  test('parsePlan returns the plan when valid', () => {
    const plan = parsePlan({ plan_id: 'p1', layer: 'override', steps: [{ id: 'm', type: 'move', motion: 'bow' }] });
    expect(plan.layer).toBe(Layer.Override);
    expect(plan.steps).toEqual([{ id: 'm', type: 'move', motion: 'bow' }]);
  });
});
