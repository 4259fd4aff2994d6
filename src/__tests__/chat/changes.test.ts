import { describe, expect, it } from 'vitest';
import { ChangeSet, PROMPT_CHANGE_FIELDS, SESSION_CHANGE_FIELDS } from '../../chat/changes.js';

describe('ChangeSet', () => {
  it('reports fields in declaration order regardless of insertion order', () => {
    const changes = new ChangeSet().add('messages', 'name', 'temperature');

    expect(changes.toArray()).toEqual(['name', 'temperature', 'messages']);
  });

  it('filters to a subset of fields', () => {
    const changes = new ChangeSet(['description', 'model', 'messages']);

    expect(changes.toArray(SESSION_CHANGE_FIELDS)).toEqual(['model', 'messages']);
    expect(changes.toArray(PROMPT_CHANGE_FIELDS)).toEqual(['description', 'messages']);
  });

  it('merges and clears', () => {
    const a = new ChangeSet(['name']);
    const b = new ChangeSet(['system_prompt']);

    a.merge(b);
    expect(a.has('system_prompt')).toBe(true);
    expect(a.has('model')).toBe(false);

    a.clear();
    expect(a.isEmpty).toBe(true);
  });

  it('clones independently', () => {
    const original = new ChangeSet(['name']);
    const copy = original.clone();

    original.clear();

    expect(copy.toArray()).toEqual(['name']);
  });
});
