import { ProfileIdentity } from './types';

/**
 * Two identities are the same profile when their numeric ids match or their
 * aliases match. Display names never decide identity.
 */
export function sameIdentity(a: ProfileIdentity, b: ProfileIdentity): boolean {
  if (a.numericId !== undefined && b.numericId !== undefined && a.numericId === b.numericId) {
    return true;
  }
  return !!a.aliasId && !!b.aliasId && a.aliasId === b.aliasId;
}

/**
 * Keep the first occurrence of every identity, preserving order.
 */
export function removeDuplicates<T extends ProfileIdentity>(people: readonly T[]): T[] {
  const unique: T[] = [];
  for (const person of people) {
    if (!unique.some(existing => sameIdentity(existing, person))) {
      unique.push(person);
    }
  }
  return unique;
}

export function removeSelf<T extends ProfileIdentity>(self: ProfileIdentity, people: readonly T[]): T[] {
  return people.filter(person => !sameIdentity(self, person));
}

export function excludeKnown<T extends ProfileIdentity>(
  people: readonly T[],
  known: readonly ProfileIdentity[]
): T[] {
  return people.filter(person => !known.some(existing => sameIdentity(existing, person)));
}

export function describeIdentity(identity: ProfileIdentity): string {
  const id = identity.numericId ?? (identity.aliasId ? `id/${identity.aliasId}` : '?');
  return identity.displayName ? `${identity.displayName} (${id})` : id;
}
