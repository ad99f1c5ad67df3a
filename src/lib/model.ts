/**
 * Core data models shared with the digest pipeline
 */

export type SourceType = "youtube" | "openai" | "anthropic";

/**
 * A content item picked by the curator for the email's recommendation cards
 */
export interface CuratedItem {
  sourceType: SourceType;
  title: string;
  summary: string;
  url: string;
  publishedAt: Date | null;
  provider?: string; // Channel or site name, e.g. a YouTube channel
  reason?: string; // Why the curator picked it; preferred over summary when present
  score: number;
}

/**
 * The generated digest whose markdown body is rendered into the email
 */
export interface Digest {
  title: string;
  content: string;
  digestDate: Date;
}

export interface EmailContent {
  subject: string;
  textBody: string;
  htmlBody: string;
}
