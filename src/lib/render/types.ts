/**
 * Structural model of a rendered digest
 */

export interface SourceLink {
  text: string;
  url: string;
}

export type HeaderLevel = 1 | 2 | 3;

export type Block =
  | { type: "header"; level: HeaderLevel; text: string }
  | { type: "numbered-item"; title: string; source: SourceLink | null; summary: string[] }
  | { type: "list"; ordered: boolean; entries: string[] }
  | { type: "paragraph"; text: string }
  | { type: "blank" };

export type BlockType = Block["type"];

export type InlineToken =
  | { type: "text"; text: string }
  | { type: "link"; text: string; url: string }
  | { type: "bold"; text: string }
  | { type: "italic"; text: string };

export interface RenderedOutput {
  html: string;
  text: string;
}
