import { SchemaRegistry, fieldsValidator } from '../../src/bus/schema-registry';
import { EventTopics } from '../../src/domain/topics';

describe('SchemaRegistry', () => {
  let registry: SchemaRegistry;

  beforeEach(() => {
    registry = new SchemaRegistry();
  });

  test('accepts a payload matching the topic schema', () => {
    expect(
      registry.validate(EventTopics.PLAN_ENDED, { plan_id: 'p1', layer: 'ambient', status: 'completed' }),
    ).toEqual([]);
  });

  test('rejects non-object payloads', () => {
    expect(registry.validate(EventTopics.PLAN_ENDED, ['p1'])).toEqual(['Payload must be an object']);
    expect(registry.validate('/anything', null)).toEqual(['Payload must be an object']);
  });

  test('reports missing required fields', () => {
    expect(registry.validate(EventTopics.PLAN_ENDED, { plan_id: 'p1', layer: 'ambient' })).toEqual([
      'Missing required field: status',
    ]);
    expect(registry.validate(EventTopics.PLAN_CANCEL_REQUEST, { plan_id: null })).toEqual([
      'Missing required field: plan_id',
    ]);
  });

  test('validates music playback and reply payloads', () => {
    expect(registry.validate(EventTopics.MUSIC_PLAYBACK_STARTED, { source: 'dashboard', track: { title: 'Cantina' } })).toEqual([]);
    expect(registry.validate(EventTopics.MUSIC_PLAYBACK_STARTED, { track: 'Cantina' })).toEqual([
      'Field "track" must be an object',
    ]);
    expect(registry.validate(EventTopics.MUSIC_PLAYBACK_STOPPED, {})).toEqual([]);
    expect(registry.validate(EventTopics.LLM_RESPONSE, { response_type: 'filler' })).toEqual([
      'Missing required field: text',
    ]);
  });

  test('reports enum and type mismatches', () => {
    expect(
      registry.validate(EventTopics.PLAN_ENDED, { plan_id: 'p1', layer: 'backstage', status: 'completed' }),
    ).toEqual(['Field "layer" must be one of: ambient, foreground, override']);
    expect(registry.validate(EventTopics.AUDIO_DUCKING_START, { level: 'low', fade_ms: 300 })).toEqual([
      'Field "level" must be a finite number',
    ]);
    expect(
      registry.validate(EventTopics.STEP_EXECUTED, { plan_id: 'p1', step_id: 's1', status: 'success', details: [] }),
    ).toEqual(['Field "details" must be an object']);
  });

  test('optional fields may be absent', () => {
    expect(registry.validate(EventTopics.SPEECH_SYNTHESIS_ENDED, {})).toEqual([]);
    expect(registry.validate(EventTopics.MUSIC_COMMAND, { action: 'stop' })).toEqual([]);
  });

  test('topics without a schema accept any map', () => {
    expect(registry.has('/custom/topic')).toBe(false);
    expect(registry.validate('/custom/topic', { anything: true })).toEqual([]);
  });

  test('custom validators can be registered and removed', () => {
    registry.register('/custom/topic', fieldsValidator({ name: { kind: 'string', required: true } }));
    expect(registry.has('/custom/topic')).toBe(true);
    expect(registry.validate('/custom/topic', {})).toEqual(['Missing required field: name']);
    expect(registry.conforms('/custom/topic', { name: 'x' })).toBe(true);

    expect(registry.unregister('/custom/topic')).toBe(true);
    expect(registry.unregister('/custom/topic')).toBe(false);
    expect(registry.conforms('/custom/topic', {})).toBe(true);
  });

  test('a registry built from an empty schema set checks nothing', () => {
    const empty = new SchemaRegistry({});
    expect(empty.validate(EventTopics.PLAN_ENDED, {})).toEqual([]);
  });
});
