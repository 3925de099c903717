import { describe, it, expect } from 'vitest';
import { matchUri, parseTaskId, pathSegments, taskUri, TASKS_URI } from '../src/resources/uri.js';

describe('matchUri', () => {
  describe('collection', () => {
    it('matches the bare collection path', () => {
      expect(matchUri('tasks')).toEqual({ kind: 'collection' });
    });

    it('ignores leading and trailing slashes', () => {
      expect(matchUri('/tasks/')).toEqual({ kind: 'collection' });
    });

    it('matches the fully qualified content uri', () => {
      expect(matchUri('content://tasklist/tasks')).toEqual({ kind: 'collection' });
    });
  });

  describe('item', () => {
    it('extracts the numeric id', () => {
      expect(matchUri('tasks/42')).toEqual({ kind: 'item', id: 42 });
    });

    it('matches the fully qualified content uri', () => {
      expect(matchUri('content://tasklist/tasks/7')).toEqual({ kind: 'item', id: 7 });
    });

    it('accepts leading zeros', () => {
      expect(matchUri('tasks/007')).toEqual({ kind: 'item', id: 7 });
    });
  });

  describe('unknown', () => {
    const unknown = [
      'notes',
      'notes/1',
      '',
      'tasks/abc',
      'tasks/-1',
      'tasks/+1',
      'tasks/1.5',
      'tasks/1/2',
      'tasks/99999999999999999999',
      'content://other/tasks',
      'content://tasklist',
    ];

    for (const uri of unknown) {
      it(`does not recognize "${uri}"`, () => {
        expect(matchUri(uri)).toEqual({ kind: 'unknown' });
      });
    }
  });
});

describe('pathSegments', () => {
  it('drops empty segments', () => {
    expect(pathSegments('//tasks//3/')).toEqual(['tasks', '3']);
  });

  it('returns null for a foreign authority', () => {
    expect(pathSegments('content://contacts/people')).toBeNull();
  });
});

describe('taskUri', () => {
  it('builds an item uri under the collection', () => {
    expect(taskUri(5)).toBe('tasks/5');
    expect(TASKS_URI).toBe('tasks');
  });

  it('round-trips through the matcher', () => {
    expect(matchUri(taskUri(12))).toEqual({ kind: 'item', id: 12 });
  });
});

describe('parseTaskId', () => {
  it('reads a segment of digits', () => {
    expect(parseTaskId('12')).toBe(12);
    expect(parseTaskId('0')).toBe(0);
  });

  it('rejects separators and empty segments', () => {
    expect(parseTaskId('/')).toBeUndefined();
    expect(parseTaskId('')).toBeUndefined();
    expect(parseTaskId('1/2')).toBeUndefined();
  });

  it('rejects ids beyond the safe integer range', () => {
    expect(parseTaskId('99999999999999999999')).toBeUndefined();
  });
});
