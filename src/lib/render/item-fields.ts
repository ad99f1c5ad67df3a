/**
 * Field extraction for numbered digest items
 *
 * The upstream prompt has changed its item layout over time, so a title line
 * may look like any of:
 *   **1. Title**
 *   1. **Title**
 *   1. Title
 * followed by bullets carrying "**Source:** [name](url)" and
 * "**Summary:** text".
 */

import { tokenizeInline } from "./inline";
import type { SourceLink } from "./types";

export const SOURCE_LABEL = "**Source:**";
export const SUMMARY_LABEL = "**Summary:**";

const ITEM_START_PATTERN = /^(?:\*\*)?\d+\.\s+/;

// Tried in order; the first match wins
const TITLE_PATTERNS: RegExp[] = [
  /^\*\*\d+\.\s+(.+?)\*\*$/,
  /^\d+\.\s+\*\*(.+?)\*\*$/,
  /^\d+\.\s+(.+)$/,
];

const LINK_PATTERN = /\[([^\]]+)\]\(([^)]+)\)/;

export function isItemStart(line: string): boolean {
  return ITEM_START_PATTERN.test(line.trim());
}

/**
 * Remove bold and italic markers, leaving links as written
 */
export function stripEmphasis(text: string): string {
  return tokenizeInline(text)
    .map((token) => (token.type === "link" ? `[${token.text}](${token.url})` : token.text))
    .join("");
}

/**
 * Title of a numbered item start line, or "" when no layout matches
 */
export function extractTitle(line: string): string {
  const trimmed = line.trim();

  for (const pattern of TITLE_PATTERNS) {
    const match = trimmed.match(pattern);
    if (match) {
      return stripEmphasis(match[1]).trim();
    }
  }

  return "";
}

/**
 * Bullet-prefixed (or bare "**Label:**") line carrying the given field label
 */
export function isFieldLine(line: string, label: string): boolean {
  const trimmed = line.trim();
  return (trimmed.startsWith("*") || trimmed.startsWith("-")) && trimmed.includes(label);
}

/**
 * First markdown link after the Source label
 */
export function extractSource(line: string): SourceLink | null {
  const labelIndex = line.indexOf(SOURCE_LABEL);
  if (labelIndex === -1) return null;

  const match = line.slice(labelIndex + SOURCE_LABEL.length).match(LINK_PATTERN);
  if (!match) return null;

  return { text: match[1], url: match[2] };
}

/**
 * Text after the Summary label; "" when the summary starts on the next line
 */
export function extractSummary(line: string): string {
  const labelIndex = line.indexOf(SUMMARY_LABEL);
  if (labelIndex === -1) return "";

  return line.slice(labelIndex + SUMMARY_LABEL.length).trim();
}
