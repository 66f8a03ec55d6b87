// Raw entry as read from the feed. Every field is optional; absence is a value.
export interface RawFeedEntry {
  id?: string;        // Atom <id> / RSS guid
  link?: string;      // Alternate link to the article page
  title?: string;
  updated?: string;   // Raw Atom <updated>
  published?: string; // Raw Atom <published>
  pubDate?: string;   // RSS pubDate, or the parser's derived date
  summary?: string;   // May contain markup
  content?: string;   // May contain markup
  author?: string;
}

// Fields pulled from the article page itself
export interface ArticleDetails {
  body_text: string | null;
  organization: string | null;
}

// Canonical, storage-ready article
export interface ArticleRecord {
  id: string;
  title: string;
  link: string | null;
  summary: string | null;
  organization: string | null;
  body: string;
  published_at: Date;
  fetched_at: Date;
}

export type UpsertOutcome = 'inserted' | 'updated';

export interface UpsertSummary {
  inserted: number;
  updated: number;
}
