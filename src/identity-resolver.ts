import { ConfigurationError, ExtractionError } from './errors';
import { FetchCache } from './fetch-cache';
import { IdentityTable } from './identity-table';
import { debug } from './logging-utils';
import { RelationshipExtractor } from './steam-profile-extractor';
import { ProfileIdentity, ResolvedProfile } from './types';

const PROFILE_URL_PATTERN = /steamcommunity\.com\/profiles\/(\d+)/;
const ALIAS_URL_PATTERN = /steamcommunity\.com\/id\/([^/?#]+)/;
const NUMERIC_ID_PATTERN = /^\d{17}$/;

/**
 * Turn a seed given on the command line into an identity. Accepts a 64-bit
 * numeric id, a profile url of either form, or a bare alias.
 */
export function parseSeedIdentity(input: string): ProfileIdentity {
  const value = input.trim();
  if (value === '') {
    throw new ConfigurationError('Seed identity cannot be empty');
  }

  const byProfileUrl = PROFILE_URL_PATTERN.exec(value);
  if (byProfileUrl) return { numericId: byProfileUrl[1], displayName: '' };

  const byAliasUrl = ALIAS_URL_PATTERN.exec(value);
  if (byAliasUrl) return { aliasId: byAliasUrl[1], displayName: '' };

  if (NUMERIC_ID_PATTERN.test(value)) return { numericId: value, displayName: '' };
  return { aliasId: value, displayName: '' };
}

/**
 * Translates between the numeric and alias addressing schemes, consulting
 * the run's identity table before fetching.
 */
export class IdentityResolver {
  constructor(
    private readonly cache: FetchCache,
    private readonly extractor: RelationshipExtractor,
    private readonly identities: IdentityTable
  ) {}

  async resolveNumeric(aliasId: string): Promise<string> {
    const known = this.identities.numericFor(aliasId);
    if (known !== undefined) return known;

    const content = await this.cache.getProfileContentByAlias(aliasId);
    const numericId = this.identities.numericFor(aliasId) ?? this.extractor.numericId(content);
    if (numericId === undefined) {
      throw new ExtractionError('numeric id', `profile page of alias '${aliasId}'`);
    }

    this.identities.bind(aliasId, numericId);
    debug(`[IdentityResolver] alias ${aliasId} -> ${numericId}`);
    return numericId;
  }

  async resolveAlias(numericId: string): Promise<string> {
    const known = this.identities.aliasFor(numericId);
    if (known !== undefined) return known;

    const content = await this.cache.getProfileContent(numericId);
    const aliasId = this.extractor.aliasId(content);
    this.identities.bind(aliasId, numericId);
    debug(`[IdentityResolver] ${numericId} -> alias '${aliasId}'`);
    return aliasId;
  }

  async resolveDisplayName(numericId: string): Promise<string> {
    const content = await this.cache.getProfileContent(numericId);
    return this.extractor.displayName(content);
  }

  async numericIdOf(identity: ProfileIdentity): Promise<string> {
    if (identity.numericId !== undefined) return identity.numericId;
    if (identity.aliasId) return this.resolveNumeric(identity.aliasId);
    throw new ExtractionError('numeric id', `identity '${identity.displayName}' without identifiers`);
  }

  async resolveProfile(identity: ProfileIdentity): Promise<ResolvedProfile> {
    const numericId = await this.numericIdOf(identity);
    const displayName = await this.resolveDisplayName(numericId);
    const aliasId = await this.resolveAlias(numericId);
    return { numericId, aliasId, displayName };
  }
}
