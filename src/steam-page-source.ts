import { HttpClient } from './http-client';
import { ProfileRef } from './types';

export const STEAM_COMMUNITY_URL = 'https://steamcommunity.com';

/**
 * Raw page access for the relationship source. Implementations do no caching;
 * FetchCache sits in front of them.
 */
export interface ProfilePageSource {
  fetchProfile(ref: ProfileRef): Promise<string>;
  fetchRelationshipList(numericId: string): Promise<string>;
  fetchAnnotationsPage(numericId: string, page: number): Promise<string>;
}

function profileBase(ref: ProfileRef): string {
  return ref.kind === 'numeric'
    ? `${STEAM_COMMUNITY_URL}/profiles/${ref.id}`
    : `${STEAM_COMMUNITY_URL}/id/${ref.id}`;
}

export const steamUrls = {
  profile: (ref: ProfileRef): string => `${profileBase(ref)}/?l=english`,
  friends: (ref: ProfileRef): string => `${profileBase(ref)}/friends/?l=english`,
  comments: (ref: ProfileRef, page: number = 1): string =>
    `${profileBase(ref)}/allcomments/?l=english&ctp=${page}`,
};

export function profileLink(numericId: string): string {
  return steamUrls.profile({ kind: 'numeric', id: numericId });
}

export class SteamPageSource implements ProfilePageSource {
  constructor(private readonly http: HttpClient) {}

  fetchProfile(ref: ProfileRef): Promise<string> {
    return this.http.getText(steamUrls.profile(ref));
  }

  fetchRelationshipList(numericId: string): Promise<string> {
    return this.http.getText(steamUrls.friends({ kind: 'numeric', id: numericId }));
  }

  fetchAnnotationsPage(numericId: string, page: number): Promise<string> {
    return this.http.getText(steamUrls.comments({ kind: 'numeric', id: numericId }, page));
  }
}
