import { describe, it, expect } from 'vitest';
import { normalizeChange, priorityLabel } from '../../src/application/field-normalizer.js';
import type { NormalizeContext } from '../../src/application/field-normalizer.js';

function contextWith(data: Record<string, unknown> = {}): NormalizeContext {
  return { data, activity: {}, appUrl: 'https://pm.example.com' };
}

describe('priorityLabel', () => {
  it('maps known codes', () => {
    expect(priorityLabel('urgent')).toBe('🔴 Urgent!');
    expect(priorityLabel('high')).toBe('🟠 High');
    expect(priorityLabel('medium')).toBe('🟡 Medium');
    expect(priorityLabel('low')).toBe('🔵 Low');
    expect(priorityLabel('none')).toBe('⚫ None');
  });

  it('maps unknown codes to empty string', () => {
    expect(priorityLabel('critical')).toBe('');
    expect(priorityLabel('None')).toBe('');
    expect(priorityLabel('constructor')).toBe('');
  });
});

describe('normalizeChange', () => {
  it('maps both sides of a priority change', () => {
    expect(normalizeChange('priority', 'low', 'urgent', contextWith())).toEqual({
      field: 'priority',
      label: 'priority',
      oldValue: '🔵 Low',
      newValue: '🔴 Urgent!',
    });
  });

  it('renders a null prior priority as None', () => {
    const change = normalizeChange('priority', 'None', 'high', contextWith());
    expect(change.oldValue).toBe('None');
    expect(change.newValue).toBe('🟠 High');
  });

  it('keeps unknown priority codes empty', () => {
    expect(normalizeChange('priority', 'bogus', 'high', contextWith()).oldValue).toBe('');
  });

  it('renames state and shows the current state name', () => {
    const ctx = contextWith({ state: { id: 's-2', name: 'In Progress' } });
    expect(normalizeChange('state_id', 's-1', 's-2', ctx)).toEqual({
      field: 'state_id',
      label: 'State',
      oldValue: 'Changed',
      newValue: 'In Progress',
    });
  });

  it('collapses an unset prior state to None', () => {
    const ctx = contextWith({ state: { name: 'Todo' } });
    const change = normalizeChange('state', 'None', 's-1', ctx);
    expect(change.oldValue).toBe('None');
    expect(change.newValue).toBe('Todo');
  });

  it('reads the state name from state_detail when state is an id', () => {
    const ctx = contextWith({ state: 's-2', state_detail: { name: 'Done' } });
    expect(normalizeChange('state', 's-1', 's-2', ctx).newValue).toBe('Done');
  });

  it('falls back to None when the state name is missing', () => {
    expect(normalizeChange('state', 's-1', 's-2', contextWith()).newValue).toBe('None');
  });

  it('lists assignees and takes the first avatar as thumbnail', () => {
    const ctx = contextWith({
      assignees: [
        { display_name: 'Ann', avatar: '/a.png' },
        { display_name: 'Bob', avatar_url: 'https://cdn.example.com/b.png' },
      ],
    });
    expect(normalizeChange('assignee_ids', '[]', '[2,3]', ctx)).toEqual({
      field: 'assignee_ids',
      label: 'Assignees',
      oldValue: 'None',
      newValue: 'Ann, Bob',
      thumbnailUrl: 'https://pm.example.com/a.png',
    });
  });

  it('marks previously set assignees without revealing ids', () => {
    const ctx = contextWith({ assignees: [{ display_name: 'Ann' }] });
    const change = normalizeChange('assignee_ids', '[1]', '[2]', ctx);
    expect(change.oldValue).toBe('Previously set');
    expect(change.thumbnailUrl).toBeUndefined();
  });

  it('renders no assignees as None', () => {
    const change = normalizeChange('assignee_ids', '[1]', '[]', contextWith({ assignees: [] }));
    expect(change.newValue).toBe('None');
    expect(change.thumbnailUrl).toBeUndefined();
  });

  it('passes other fields through unchanged', () => {
    expect(normalizeChange('target_date', 'None', '2026-03-01', contextWith())).toEqual({
      field: 'target_date',
      label: 'target_date',
      oldValue: 'None',
      newValue: '2026-03-01',
    });
  });

  it('gives identical output for identical input', () => {
    const ctx = contextWith({ assignees: [{ display_name: 'Ann', avatar: '/a.png' }] });
    const first = normalizeChange('assignee_ids', '[]', '[2]', ctx);
    const second = normalizeChange('assignee_ids', '[]', '[2]', ctx);
    expect(second).toEqual(first);
  });
});
