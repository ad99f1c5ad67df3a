/**
 * Plain-text previews of raw digest content
 */

const DEFAULT_SUMMARY_CHARS = 320;
const ELLIPSIS = "…";

/**
 * Strip markdown headers and HTML tags, and drop whitespace that trails a line
 */
export function sanitize(text: string): string {
  if (!text) return "";

  let result = text;

  // Header markers at line starts ("## Title" -> "Title")
  result = result.replace(/^#+\s*/gm, "");

  // Tags like <p>, </div>, <br/>
  result = result.replace(/<[^>]+>/g, "");

  result = result.replace(/\s+\n/g, "\n");

  return result.trim();
}

/**
 * Sanitize and cap at maxChars, cutting on a word boundary.
 * A truncated preview ends with an ellipsis and never exceeds maxChars.
 */
export function summarize(text: string, maxChars: number = DEFAULT_SUMMARY_CHARS): string {
  const plain = sanitize(text);
  if (plain.length <= maxChars) return plain;

  const words = plain.split(/\s+/).filter(Boolean);
  const budget = maxChars - ELLIPSIS.length;
  let result = "";

  for (const word of words) {
    const candidate = result ? `${result} ${word}` : word;
    if (candidate.length > budget) break;
    result = candidate;
  }

  // An empty result means the first word alone is over budget
  return `${result}${ELLIPSIS}`;
}
