/**
 * HTML formatter for parsed digest blocks
 * Uses inline styles throughout since most email clients strip <style> tags
 */

import type { Theme } from "../../config/theme";
import { escapeAttribute, escapeHtml, isSafeUrl } from "../utils/html-entities";
import { renderInlineHtml, type InlineStyles } from "./inline";
import type { Block, HeaderLevel, SourceLink } from "./types";

interface BlockStyles {
  headers: Record<HeaderLevel, string>;
  list: string;
  listEntry: string;
  paragraph: string;
  spacer: string;
  itemTitle: string;
  sourceLabel: string;
  sourceLink: string;
  summary: string;
  inline: InlineStyles;
}

function headerStyle(margin: string, fontSize: number, theme: Theme): string {
  return `margin:${margin};font-size:${fontSize}px;font-weight:700;color:${theme.colors.text};line-height:1.4;letter-spacing:-0.01em;`;
}

function buildStyles(theme: Theme): BlockStyles {
  const { colors } = theme;

  return {
    headers: {
      1: headerStyle("32px 0 20px 0", 24, theme),
      2: headerStyle("40px 0 22px 0", 22, theme),
      3: headerStyle("36px 0 18px 0", 20, theme),
    },
    list: `margin:14px 0;padding-left:24px;color:${colors.mutedText};`,
    listEntry: `margin:10px 0;font-size:15px;line-height:1.7;color:${colors.mutedText};`,
    paragraph: `margin:14px 0;font-size:15px;line-height:1.75;color:${colors.mutedText};`,
    spacer: "margin:12px 0;",
    itemTitle: `font-size:18px;font-weight:700;color:${colors.text};margin-bottom:10px;line-height:1.5;letter-spacing:-0.01em;`,
    sourceLabel: `font-size:13px;color:${colors.mutedText};text-transform:uppercase;letter-spacing:0.05em;font-weight:600;margin-right:8px;`,
    sourceLink: `display:inline-block;padding:6px 14px;background:${colors.background};border:1px solid ${colors.border};border-radius:6px;color:${colors.primary};text-decoration:none;font-size:14px;font-weight:600;line-height:1.4;`,
    summary: `margin:0 0 14px 0;font-size:15px;line-height:1.75;color:${colors.mutedText};`,
    inline: {
      link: `color:${colors.primary};text-decoration:none;font-weight:600;`,
      bold: "font-weight:600;",
      italic: "font-style:italic;",
    },
  };
}

function formatSource(source: SourceLink, styles: BlockStyles): string {
  const link = isSafeUrl(source.url)
    ? `<a href="${escapeAttribute(source.url)}" style="${styles.sourceLink}">🔗 ${escapeHtml(source.text)}</a>`
    : escapeHtml(source.text);

  return (
    `<div style="margin-bottom:14px;">` +
    `<span style="${styles.sourceLabel}">Source:</span>` +
    link +
    `</div>`
  );
}

function formatNumberedItem(
  block: Extract<Block, { type: "numbered-item" }>,
  styles: BlockStyles
): string {
  const parts: string[] = ['<div style="margin:24px 0;">'];

  if (block.title) {
    parts.push(`<div style="${styles.itemTitle}">${renderInlineHtml(block.title, styles.inline)}</div>`);
  }

  if (block.source) {
    parts.push(formatSource(block.source, styles));
  }

  const paragraphs = block.summary.map(
    (entry) => `<p style="${styles.summary}">${renderInlineHtml(entry, styles.inline)}</p>`
  );
  if (paragraphs.length > 0) {
    parts.push(`<div style="margin-top:8px;">${paragraphs.join("")}</div>`);
  }

  parts.push("</div>");
  return parts.join("\n");
}

function formatList(block: Extract<Block, { type: "list" }>, styles: BlockStyles): string {
  const tag = block.ordered ? "ol" : "ul";
  const entries = block.entries.map(
    (entry) => `<li style="${styles.listEntry}">${renderInlineHtml(entry, styles.inline)}</li>`
  );
  return [`<${tag} style="${styles.list}">`, ...entries, `</${tag}>`].join("\n");
}

function formatBlock(block: Block, styles: BlockStyles): string {
  switch (block.type) {
    case "header": {
      const tag = `h${block.level}`;
      return `<${tag} style="${styles.headers[block.level]}">${renderInlineHtml(block.text, styles.inline)}</${tag}>`;
    }
    case "numbered-item":
      return formatNumberedItem(block, styles);
    case "list":
      return formatList(block, styles);
    case "paragraph":
      return `<p style="${styles.paragraph}">${renderInlineHtml(block.text, styles.inline)}</p>`;
    case "blank":
      return `<p style="${styles.spacer}"></p>`;
  }
}

/**
 * Render blocks as a styled HTML fragment (no <html>/<body> wrapper)
 */
export function formatHtml(blocks: Block[], theme: Theme): string {
  const styles = buildStyles(theme);
  return blocks.map((block) => formatBlock(block, styles)).join("\n");
}
