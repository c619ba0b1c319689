/**
 * Alias <-> numeric id bindings learned during one run. Bindings are never
 * invalidated: a profile's alias is assumed stable for the run's duration.
 */
export class IdentityTable {
  private aliasToNumeric = new Map<string, string>();
  // '' records a profile known to have no alias
  private numericToAlias = new Map<string, string>();

  bind(aliasId: string, numericId: string): void {
    if (aliasId === '') {
      this.markNoAlias(numericId);
      return;
    }
    if (!this.aliasToNumeric.has(aliasId)) {
      this.aliasToNumeric.set(aliasId, numericId);
    }
    if (!this.numericToAlias.get(numericId)) {
      this.numericToAlias.set(numericId, aliasId);
    }
  }

  markNoAlias(numericId: string): void {
    if (!this.numericToAlias.has(numericId)) {
      this.numericToAlias.set(numericId, '');
    }
  }

  numericFor(aliasId: string): string | undefined {
    return this.aliasToNumeric.get(aliasId);
  }

  aliasFor(numericId: string): string | undefined {
    return this.numericToAlias.get(numericId);
  }

  get size(): number {
    return this.aliasToNumeric.size;
  }
}
