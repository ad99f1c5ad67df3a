/**
 * Block parser for digest markdown
 *
 * A finite-state machine over input lines. `transition` is pure: it takes the
 * current state, one line and the next non-blank line, and returns the next
 * state plus any blocks completed by that line. `parse` drives it over a
 * whole document and flushes whatever is still open at the end.
 */

import { classifyLine, type ClassifiedLine } from "./classify";
import type { Block, SourceLink } from "./types";

export interface ItemAccumulator {
  title: string;
  source: SourceLink | null;
  summary: string[];
  /** Last summary entry came from a Summary field and takes continuation lines */
  continuing: boolean;
}

export type ParserState =
  | { mode: "default" }
  | { mode: "in-list"; ordered: boolean; entries: string[] }
  | { mode: "in-numbered-item"; item: ItemAccumulator };

export type ParserMode = ParserState["mode"];

export interface Transition {
  state: ParserState;
  emitted: Block[];
}

export const INITIAL_STATE: ParserState = { mode: "default" };

function openItem(title: string): ItemAccumulator {
  return { title, source: null, summary: [], continuing: false };
}

function hasContent(item: ItemAccumulator): boolean {
  return item.source !== null || item.summary.length > 0;
}

function closeItem(item: ItemAccumulator): Block {
  return {
    type: "numbered-item",
    title: item.title,
    source: item.source,
    summary: item.summary.filter((entry) => entry.length > 0),
  };
}

/**
 * Blocks for whatever structure is open in `state`
 */
export function flush(state: ParserState): Block[] {
  switch (state.mode) {
    case "default":
      return [];
    case "in-list":
      return [{ type: "list", ordered: state.ordered, entries: state.entries }];
    case "in-numbered-item":
      return [closeItem(state.item)];
  }
}

function addFragment(item: ItemAccumulator, text: string): ItemAccumulator {
  return { ...item, summary: [...item.summary, text], continuing: false };
}

function continueSummary(item: ItemAccumulator, text: string): ItemAccumulator {
  const previous = item.summary[item.summary.length - 1] ?? "";
  const joined = previous ? `${previous} ${text}` : text;
  return { ...item, summary: [...item.summary.slice(0, -1), joined] };
}

function absorbIntoItem(item: ItemAccumulator, line: ClassifiedLine): ItemAccumulator {
  switch (line.kind) {
    case "source":
      return line.link ? { ...item, source: line.link, continuing: false } : addFragment(item, line.text);
    case "summary":
      return { ...item, summary: [...item.summary, line.summary], continuing: true };
    case "text":
      return item.continuing && item.summary.length > 0
        ? continueSummary(item, line.text)
        : addFragment(item, line.text);
    case "bullet":
      return addFragment(item, line.text);
    default:
      return item;
  }
}

function closesItemAfterBlank(lookahead: string | undefined): boolean {
  if (lookahead === undefined) return false;
  const kind = classifyLine(lookahead).kind;
  return kind === "item-start" || kind === "header";
}

function onBlank(state: ParserState, lookahead: string | undefined): Transition {
  switch (state.mode) {
    case "default":
      return { state, emitted: [{ type: "blank" }] };
    case "in-list":
      return { state: INITIAL_STATE, emitted: flush(state) };
    case "in-numbered-item":
      if (hasContent(state.item) && closesItemAfterBlank(lookahead)) {
        return { state: INITIAL_STATE, emitted: flush(state) };
      }
      return { state, emitted: [] };
  }
}

function listEntry(line: ClassifiedLine): string | null {
  switch (line.kind) {
    case "bullet":
      return line.text;
    case "source":
    case "summary":
      return line.bullet;
    default:
      return null;
  }
}

/**
 * Advance the parser by one line.
 * `lookahead` is the next non-blank line, or undefined at end of input.
 */
export function transition(state: ParserState, line: string, lookahead?: string): Transition {
  const classified = classifyLine(line);

  switch (classified.kind) {
    case "blank":
      return onBlank(state, lookahead);

    case "header":
      return {
        state: INITIAL_STATE,
        emitted: [...flush(state), { type: "header", level: classified.level, text: classified.text }],
      };

    case "item-start":
      return {
        state: { mode: "in-numbered-item", item: openItem(classified.title) },
        emitted: flush(state),
      };
  }

  if (state.mode === "in-numbered-item") {
    return { state: { ...state, item: absorbIntoItem(state.item, classified) }, emitted: [] };
  }

  const entry = listEntry(classified);
  if (entry !== null) {
    if (state.mode === "in-list") {
      return { state: { ...state, entries: [...state.entries, entry] }, emitted: [] };
    }
    return { state: { mode: "in-list", ordered: false, entries: [entry] }, emitted: [] };
  }

  return {
    state: INITIAL_STATE,
    emitted: [...flush(state), { type: "paragraph", text: classified.text }],
  };
}

function splitLines(markdown: string): string[] {
  return markdown.replace(/\r\n?/g, "\n").trim().split("\n");
}

/**
 * Parse digest markdown into blocks, in source order
 */
export function parse(markdown: string): Block[] {
  if (!markdown || !markdown.trim()) return [];

  const lines = splitLines(markdown);

  // nextNonBlank[i]: first non-blank line after index i
  const nextNonBlank: Array<string | undefined> = new Array(lines.length);
  let upcoming: string | undefined;
  for (let i = lines.length - 1; i >= 0; i--) {
    nextNonBlank[i] = upcoming;
    if (lines[i].trim()) upcoming = lines[i];
  }

  const blocks: Block[] = [];
  let state: ParserState = INITIAL_STATE;

  lines.forEach((line, i) => {
    const step = transition(state, line, nextNonBlank[i]);
    state = step.state;
    blocks.push(...step.emitted);
  });

  blocks.push(...flush(state));
  return blocks;
}
