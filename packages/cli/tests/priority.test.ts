import { describe, it, expect } from 'vitest';
import { Priority } from '@tasklist/core';
import { parsePriority, priorityLabel } from '../src/utils/priority.js';

describe('parsePriority', () => {
  it('accepts numbers', () => {
    expect(parsePriority('1')).toBe(Priority.HIGH);
    expect(parsePriority('2')).toBe(Priority.MEDIUM);
    expect(parsePriority('3')).toBe(Priority.LOW);
  });

  it('accepts labels in any case', () => {
    expect(parsePriority('High')).toBe(Priority.HIGH);
    expect(parsePriority(' low ')).toBe(Priority.LOW);
  });

  it('rejects anything else', () => {
    expect(parsePriority('0')).toBeUndefined();
    expect(parsePriority('4')).toBeUndefined();
    expect(parsePriority('urgent')).toBeUndefined();
    expect(parsePriority('toString')).toBeUndefined();
    expect(parsePriority('')).toBeUndefined();
  });
});

describe('priorityLabel', () => {
  it('labels known priorities', () => {
    expect(priorityLabel(Priority.MEDIUM)).toBe('medium');
  });

  it('falls back to the number', () => {
    expect(priorityLabel(9)).toBe('9');
  });
});
