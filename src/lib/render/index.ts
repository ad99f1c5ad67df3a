/**
 * Digest markdown renderer
 *
 * Turns the LLM-written digest body into an HTML fragment and a plain-text
 * rendering. Rendering is synchronous and depends only on the markdown and
 * the theme passed in.
 */

import { DEFAULT_THEME, type Theme } from "../../config/theme";
import { logger } from "../logger";
import { formatHtml } from "./html";
import { parse } from "./parser";
import { formatPlainText } from "./text";
import type { Block, BlockType, RenderedOutput } from "./types";

const log = logger.child("render");

function countByType(blocks: Block[]): Partial<Record<BlockType, number>> {
  const counts: Partial<Record<BlockType, number>> = {};
  for (const block of blocks) {
    counts[block.type] = (counts[block.type] ?? 0) + 1;
  }
  return counts;
}

export function renderHtml(markdown: string, theme: Theme = DEFAULT_THEME): string {
  return formatHtml(parse(markdown), theme);
}

export function renderPlainText(markdown: string): string {
  return formatPlainText(parse(markdown));
}

/**
 * Render both forms from a single parse
 */
export function render(markdown: string, theme: Theme = DEFAULT_THEME): RenderedOutput {
  const blocks = parse(markdown);
  log.debug("Rendered digest markdown", { chars: markdown.length, blocks: countByType(blocks) });

  return {
    html: formatHtml(blocks, theme),
    text: formatPlainText(blocks),
  };
}

export { parse, transition, flush, INITIAL_STATE } from "./parser";
export type { ParserState, ParserMode, Transition, ItemAccumulator } from "./parser";
export { classifyLine } from "./classify";
export type { ClassifiedLine, LineKind } from "./classify";
export { extractTitle, extractSource, extractSummary, isItemStart } from "./item-fields";
export { tokenizeInline, renderInlineHtml, renderInlinePlain } from "./inline";
export type { InlineStyles } from "./inline";
export { formatHtml } from "./html";
export { formatPlainText } from "./text";
export { sanitize, summarize } from "./sanitize";
export type { Block, BlockType, HeaderLevel, InlineToken, RenderedOutput, SourceLink } from "./types";
