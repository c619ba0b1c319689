import { AnnotationPage, RelationshipRecord, Visibility } from './types';

/**
 * Reads identities and relationships out of fetched profile content.
 */
export interface RelationshipExtractor {
  numericId(profileContent: string): string | undefined;
  /** '' when the profile never set an alias */
  aliasId(profileContent: string): string;
  displayName(profileContent: string): string;
  relationshipVisibility(profileContent: string): Visibility;
  annotationVisibility(profileContent: string): Visibility;
  annotationTotalCount(profileContent: string): number;
  relationships(relationshipListContent: string): RelationshipRecord[];
  annotationAuthors(annotationsPageContent: string): AnnotationPage;
}

const NUMERIC_ID_PATTERN = /,"steamid":"(.*?)",/s;
// The profile url is JSON-encoded in the page, slashes may or may not be escaped
const ALIAS_ID_PATTERN = /g_rgProfileData = \{"url":"https:\\?\/\\?\/steamcommunity\.com\\?\/id\\?\/([^"\\/]+)/;
const DISPLAY_NAME_PATTERN = /<div class="persona_name" style="font-size: 24px;">.*?<span class="actual_persona_name">(.*?)<\/span>/s;
const FRIEND_PATTERN = /data-steamid="(.+?)".*?href="https:\/\/steamcommunity\.com\/(.+?)">.*?<div class="friend_block_content">(.+?)<br>/gs;
const AUTHOR_BY_NUMERIC_PATTERN = /hoverunderline commentthread_author_link" href="https:\/\/steamcommunity\.com\/profiles\/(.*?)".*?<bdi>(.*?)<\/bdi>/gs;
const AUTHOR_BY_ALIAS_PATTERN = /hoverunderline commentthread_author_link" href="https:\/\/steamcommunity\.com\/id\/(.*?)".*?<bdi>(.*?)<\/bdi>/gs;

// Visibility markers are matched against lowercased content with all whitespace removed
const FRIENDS_PUBLIC_MARKER = '/friends/"><spanclass="count_link_label">friends</span>';
const COMMENTS_PUBLIC_MARKER = '<spanclass="commentthread_header_label">comments</span>';
const COMMENT_TOTAL_PATTERN = /<spanid="commentthread_profile_\d+_totalcount">(.*?)<\/span>/;

const squash = (content: string): string => content.replace(/\s+/g, '').toLowerCase();

export class SteamProfileExtractor implements RelationshipExtractor {
  numericId(profileContent: string): string | undefined {
    const match = NUMERIC_ID_PATTERN.exec(profileContent);
    return match && match[1] !== '' ? match[1] : undefined;
  }

  aliasId(profileContent: string): string {
    return ALIAS_ID_PATTERN.exec(profileContent)?.[1] ?? '';
  }

  displayName(profileContent: string): string {
    return DISPLAY_NAME_PATTERN.exec(profileContent)?.[1] ?? '';
  }

  relationshipVisibility(profileContent: string): Visibility {
    return squash(profileContent).includes(FRIENDS_PUBLIC_MARKER) ? 'public' : 'private';
  }

  annotationVisibility(profileContent: string): Visibility {
    return squash(profileContent).includes(COMMENTS_PUBLIC_MARKER) ? 'public' : 'private';
  }

  annotationTotalCount(profileContent: string): number {
    if (this.annotationVisibility(profileContent) === 'private') return 0;

    const match = COMMENT_TOTAL_PATTERN.exec(squash(profileContent));
    if (!match) return 0;
    const digits = match[1].replace(/[^0-9]/g, '');
    return digits === '' ? 0 : parseInt(digits, 10);
  }

  relationships(relationshipListContent: string): RelationshipRecord[] {
    const friends: RelationshipRecord[] = [];

    for (const [, numericId, path, displayName] of relationshipListContent.matchAll(FRIEND_PATTERN)) {
      friends.push({
        numericId,
        aliasId: path.startsWith('id/') ? path.slice('id/'.length) : undefined,
        displayName,
        provenance: 'relationship'
      });
    }

    return friends;
  }

  annotationAuthors(annotationsPageContent: string): AnnotationPage {
    const byNumeric = [...annotationsPageContent.matchAll(AUTHOR_BY_NUMERIC_PATTERN)];
    const byAlias = [...annotationsPageContent.matchAll(AUTHOR_BY_ALIAS_PATTERN)];
    const authors: RelationshipRecord[] = [];

    for (const [, numericId, displayName] of byNumeric) {
      if (authors.some(author => author.numericId === numericId)) continue;
      authors.push({ numericId, displayName, provenance: 'annotation' });
    }

    for (const [, aliasId, displayName] of byAlias) {
      if (authors.some(author => author.aliasId === aliasId)) continue;
      authors.push({ aliasId, displayName, provenance: 'annotation' });
    }

    return { authorsRead: byNumeric.length + byAlias.length, authors };
  }
}
