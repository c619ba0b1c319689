import { describe, expect, it } from 'vitest';
import { describeIdentity, excludeKnown, removeDuplicates, removeSelf, sameIdentity } from '../src/identity-utils';
import { RosterMatcher } from '../src/roster-matcher';

describe('identity utils', () => {
  describe('sameIdentity', () => {
    it('should match on numeric id regardless of name', () => {
      expect(sameIdentity({ numericId: '1', displayName: 'A' }, { numericId: '1', displayName: 'B' })).toBe(true);
    });

    it('should match on a non-empty alias', () => {
      expect(sameIdentity({ aliasId: 'a', displayName: 'A' }, { numericId: '2', aliasId: 'a', displayName: 'A' })).toBe(true);
      expect(sameIdentity({ aliasId: '', displayName: 'A' }, { aliasId: '', displayName: 'A' })).toBe(false);
    });

    it('should never match on display name alone', () => {
      expect(sameIdentity({ displayName: 'A' }, { displayName: 'A' })).toBe(false);
      expect(sameIdentity({ numericId: '1', displayName: 'A' }, { numericId: '2', displayName: 'A' })).toBe(false);
    });
  });

  it('should keep the first occurrence when removing duplicates', () => {
    const people = [
      { numericId: '1', aliasId: 'a', displayName: 'A' },
      { aliasId: 'a', displayName: 'A (comment)' },
      { numericId: '2', displayName: 'B' },
      { numericId: '1', displayName: 'A again' }
    ];

    expect(removeDuplicates(people)).toEqual([people[0], people[2]]);
  });

  it('should remove the profile itself', () => {
    const self = { numericId: '1', aliasId: 'a', displayName: 'A' };
    const people = [{ aliasId: 'a', displayName: 'A' }, { numericId: '2', displayName: 'B' }];

    expect(removeSelf(self, people)).toEqual([{ numericId: '2', displayName: 'B' }]);
  });

  it('should exclude already known profiles', () => {
    const known = [{ numericId: '1', aliasId: 'a', displayName: 'A' }];
    const people = [
      { numericId: '1', displayName: 'A' },
      { numericId: '3', displayName: 'A' },
      { aliasId: 'a', displayName: 'Other' }
    ];

    expect(excludeKnown(people, known)).toEqual([{ numericId: '3', displayName: 'A' }]);
  });

  it('should describe identities for log lines', () => {
    expect(describeIdentity({ numericId: '1', displayName: 'A' })).toBe('A (1)');
    expect(describeIdentity({ aliasId: 'a', displayName: '' })).toBe('id/a');
    expect(describeIdentity({ displayName: '' })).toBe('?');
  });
});

describe('RosterMatcher', () => {
  const roster = new RosterMatcher(['Alice', 'Bob', 'Bob']);

  it('should count distinct names', () => {
    expect(roster.size).toBe(2);
  });

  it('should compare names exactly', () => {
    expect(roster.isOnRoster('Alice')).toBe(true);
    expect(roster.isOnRoster('alice')).toBe(false);
    expect(roster.isOnRoster('Alice ')).toBe(false);
  });

  it('should keep matching candidates in order', () => {
    const candidates = [
      { numericId: '2', displayName: 'Bob' },
      { numericId: '9', displayName: 'Dan' },
      { aliasId: 'a', displayName: 'Alice' }
    ];

    expect(roster.match(candidates)).toEqual([candidates[0], candidates[2]]);
  });
});
