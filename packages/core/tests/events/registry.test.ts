import { describe, it, expect } from 'vitest';
import {
  REQUIRED_FIELDS,
  SchemaError,
  annotateInvalid,
  isEventType,
  parseEvent,
  validateEvent,
} from '../../src/index.js';
import { makeEvent } from '../helpers/memory-sink.js';

describe('validateEvent', () => {
  it('accepts a complete event and keeps extra fields', () => {
    const result = validateEvent({ ...makeEvent(1), ticket: 'T-42' });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.event.event_id).toBe('evt_001');
      expect(result.event['ticket']).toBe('T-42');
    }
  });

  it('reports a missing kind-specific field by path', () => {
    const { description: _omitted, ...candidate } = makeEvent(1);
    const result = validateEvent(candidate);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(SchemaError);
      expect(result.error.eventType).toBe('tool_usage');
      expect(result.error.issues).toEqual([{ path: 'description', message: 'Required' }]);
      expect(result.error.message).toBe('Invalid tool_usage event: description: Required');
    }
  });

  it('rejects malformed ids and timestamps', () => {
    const result = validateEvent(makeEvent(1, { event_id: 'event-1', timestamp: '2025-01-01 00:00:00' }));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.issues.map((issue) => issue.path).sort()).toEqual(['event_id', 'timestamp']);
    }
  });

  it('rejects an unknown event type', () => {
    const result = validateEvent({ ...makeEvent(1), event_type: 'bogus' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.eventType).toBe('bogus');
      expect(result.error.issues[0].path).toBe('event_type');
      expect(result.error.message.startsWith('Invalid bogus event: event_type: ')).toBe(true);
    }
  });

  it('rejects values that are not objects', () => {
    const result = validateEvent(42);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.eventType).toBeNull();
      expect(result.error.issues[0].path).toBe('/');
    }
  });

  it('checks numeric ranges the types cannot express', () => {
    const result = validateEvent({
      ...makeEvent(1),
      event_type: 'decision',
      question: 'which parser?',
      options: ['peg', 'hand-written'],
      selected: 'peg',
      confidence: 1.5,
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.issues.map((issue) => issue.path)).toEqual(['confidence']);
    }
  });
});

describe('parseEvent', () => {
  it('throws SchemaError for an invalid candidate', () => {
    expect(() => parseEvent({ event_type: 'error' })).toThrow(SchemaError);
  });
});

describe('annotateInvalid', () => {
  it('keeps the event and records the failure', () => {
    const error = new SchemaError('Invalid tool_usage event: tool: too short', 'tool_usage');
    const annotated = annotateInvalid(makeEvent(3), error);
    expect(annotated.event_id).toBe('evt_003');
    expect(annotated._validation_warning).toBe('Invalid tool_usage event: tool: too short');
  });
});

describe('REQUIRED_FIELDS', () => {
  it('lists common fields first, then the kind-specific ones', () => {
    expect(REQUIRED_FIELDS.tool_usage).toEqual([
      'event_type', 'timestamp', 'session_id', 'event_id', 'parent_event_id',
      'agent', 'tool', 'description', 'success',
    ]);
    expect(REQUIRED_FIELDS.decision).toEqual([
      'event_type', 'timestamp', 'session_id', 'event_id', 'parent_event_id',
      'agent', 'question', 'options', 'selected',
    ]);
  });

  it('does not require optional context on snapshots', () => {
    expect(REQUIRED_FIELDS.context_snapshot).not.toContain('snapshot');
    expect(REQUIRED_FIELDS.context_snapshot).toContain('files_in_context_count');
  });
});

describe('isEventType', () => {
  it('recognises the seven kinds only', () => {
    expect(isEventType('context_snapshot')).toBe(true);
    expect(isEventType('heartbeat')).toBe(false);
    expect(isEventType(undefined)).toBe(false);
  });
});
