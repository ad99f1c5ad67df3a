/**
 * Plain-text formatter for parsed digest blocks
 */

import { renderInlinePlain } from "./inline";
import type { Block } from "./types";

function blockLines(block: Block): string[] {
  switch (block.type) {
    case "header": {
      const text = renderInlinePlain(block.text);
      const rule = (block.level === 3 ? "-" : "=").repeat(Array.from(text).length);
      return ["", text, rule];
    }
    case "numbered-item": {
      const lines: string[] = [];
      if (block.title) lines.push(renderInlinePlain(block.title));
      if (block.source) lines.push(`Source: ${block.source.url}`);
      lines.push(...block.summary.map(renderInlinePlain));
      lines.push("");
      return lines;
    }
    case "list":
      return [...block.entries.map((entry) => `- ${renderInlinePlain(entry)}`), ""];
    case "paragraph":
      return [renderInlinePlain(block.text)];
    case "blank":
      return [""];
  }
}

/**
 * Render blocks as plain text; consecutive empty lines collapse to one
 */
export function formatPlainText(blocks: Block[]): string {
  return blocks
    .flatMap(blockLines)
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}
