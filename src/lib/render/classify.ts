/**
 * Line classification for the digest parser
 */

import {
  SOURCE_LABEL,
  SUMMARY_LABEL,
  extractSource,
  extractSummary,
  extractTitle,
  isFieldLine,
  isItemStart,
} from "./item-fields";
import type { HeaderLevel, SourceLink } from "./types";

/**
 * A classified input line. `text` is always the trimmed line with any
 * header or bullet marker removed; field lines keep `bullet` so they can
 * still become list entries outside a numbered item.
 */
export type ClassifiedLine =
  | { kind: "blank" }
  | { kind: "header"; level: HeaderLevel; text: string }
  | { kind: "item-start"; title: string }
  | { kind: "source"; link: SourceLink | null; text: string; bullet: string | null }
  | { kind: "summary"; summary: string; text: string; bullet: string | null }
  | { kind: "bullet"; text: string }
  | { kind: "text"; text: string };

export type LineKind = ClassifiedLine["kind"];

const HEADER_PATTERN = /^(#{1,3})\s+(.+)$/;
const BULLET_PATTERN = /^[-*]\s+(.*)$/;

function headerLevel(marker: string): HeaderLevel {
  if (marker.length === 1) return 1;
  if (marker.length === 2) return 2;
  return 3;
}

function bulletText(trimmed: string): string | null {
  const match = trimmed.match(BULLET_PATTERN);
  return match ? match[1].trim() : null;
}

/**
 * Classify one line; checks run in priority order
 */
export function classifyLine(line: string): ClassifiedLine {
  const trimmed = line.trim();

  if (!trimmed) {
    return { kind: "blank" };
  }

  const header = trimmed.match(HEADER_PATTERN);
  if (header) {
    return { kind: "header", level: headerLevel(header[1]), text: header[2].trim() };
  }

  if (isItemStart(trimmed)) {
    return { kind: "item-start", title: extractTitle(trimmed) };
  }

  const bullet = bulletText(trimmed);
  const text = bullet ?? trimmed;

  if (isFieldLine(trimmed, SOURCE_LABEL)) {
    return { kind: "source", link: extractSource(trimmed), text, bullet };
  }

  if (isFieldLine(trimmed, SUMMARY_LABEL)) {
    return { kind: "summary", summary: extractSummary(trimmed), text, bullet };
  }

  if (bullet !== null) {
    return { kind: "bullet", text: bullet };
  }

  return { kind: "text", text: trimmed };
}
