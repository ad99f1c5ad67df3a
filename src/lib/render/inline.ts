/**
 * Inline markup: links, bold and italic inside a single line or field
 *
 * Text is tokenized first and every token is rendered on its own, so generated
 * tags are never passed through the escaper and link text is never scanned
 * for emphasis.
 */

import { escapeAttribute, escapeHtml, isSafeUrl } from "../utils/html-entities";
import type { InlineToken } from "./types";

// Links are split out before emphasis so "[**x**](url)" stays a link
const LINK_PATTERN = /\[([^\]]+)\]\(([^)]+)\)/g;
const BOLD_PATTERN = /\*\*([^*]+)\*\*|__([^_]+)__/g;
// A lone * or _ on each side; never the edge of a ** or __ run
const ITALIC_PATTERN = /(?<!\*)\*(?!\*)([^*]+?)(?<!\*)\*(?!\*)|(?<!_)_(?!_)([^_]+?)(?<!_)_(?!_)/g;

/**
 * Inline style attributes applied to generated tags (email clients ignore
 * stylesheets, so the HTML formatter passes theme-derived inline styles)
 */
export interface InlineStyles {
  link?: string;
  bold?: string;
  italic?: string;
}

function splitSpan(
  text: string,
  pattern: RegExp,
  build: (match: RegExpMatchArray) => InlineToken
): InlineToken[] {
  const tokens: InlineToken[] = [];
  let last = 0;

  for (const match of text.matchAll(pattern)) {
    const index = match.index ?? 0;
    if (index > last) {
      tokens.push({ type: "text", text: text.slice(last, index) });
    }
    tokens.push(build(match));
    last = index + match[0].length;
  }

  if (last < text.length) {
    tokens.push({ type: "text", text: text.slice(last) });
  }

  return tokens;
}

function splitTextTokens(
  tokens: InlineToken[],
  pattern: RegExp,
  build: (match: RegExpMatchArray) => InlineToken
): InlineToken[] {
  return tokens.flatMap((token) => (token.type === "text" ? splitSpan(token.text, pattern, build) : [token]));
}

/**
 * Split a line into text, link, bold and italic spans, in source order.
 * Unbalanced markers and brackets stay inside text spans.
 */
export function tokenizeInline(text: string): InlineToken[] {
  if (!text) return [];

  let tokens: InlineToken[] = [{ type: "text", text }];

  tokens = splitTextTokens(tokens, LINK_PATTERN, (m) => ({ type: "link", text: m[1], url: m[2] }));
  tokens = splitTextTokens(tokens, BOLD_PATTERN, (m) => ({ type: "bold", text: m[1] ?? m[2] ?? "" }));
  tokens = splitTextTokens(tokens, ITALIC_PATTERN, (m) => ({ type: "italic", text: m[1] ?? m[2] ?? "" }));

  return tokens;
}

function styleAttribute(style: string | undefined): string {
  return style ? ` style="${escapeAttribute(style)}"` : "";
}

function renderTokenHtml(token: InlineToken, styles: InlineStyles): string {
  switch (token.type) {
    case "text":
      return escapeHtml(token.text);
    case "link":
      if (!isSafeUrl(token.url)) return escapeHtml(token.text);
      return `<a href="${escapeAttribute(token.url)}"${styleAttribute(styles.link)}>${escapeHtml(token.text)}</a>`;
    case "bold":
      return `<strong${styleAttribute(styles.bold)}>${escapeHtml(token.text)}</strong>`;
    case "italic":
      return `<em${styleAttribute(styles.italic)}>${escapeHtml(token.text)}</em>`;
  }
}

function renderTokenPlain(token: InlineToken): string {
  switch (token.type) {
    case "link":
      return `${token.text} (${token.url})`;
    case "text":
    case "bold":
    case "italic":
      return token.text;
  }
}

/**
 * Render inline markdown to an HTML fragment with all source text escaped
 */
export function renderInlineHtml(text: string, styles: InlineStyles = {}): string {
  return tokenizeInline(text)
    .map((token) => renderTokenHtml(token, styles))
    .join("");
}

/**
 * Strip inline markdown; links keep their target as "text (url)"
 */
export function renderInlinePlain(text: string): string {
  return tokenizeInline(text).map(renderTokenPlain).join("");
}
