/**
 * HTML entity encoding for text and attribute contexts
 */

const TEXT_ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

const ATTRIBUTE_ENTITIES: Record<string, string> = {
  ...TEXT_ENTITIES,
  "`": "&#x60;",
};

/**
 * Encode a string for use as HTML element content.
 * Each special character is encoded exactly once; callers must not pass
 * text that has already been escaped.
 */
export function escapeHtml(text: string): string {
  if (!text) return "";
  return text.replace(/[&<>"']/g, (ch) => TEXT_ENTITIES[ch] ?? ch);
}

/**
 * Encode a string for use inside a double-quoted attribute value (href, title).
 * Control characters are dropped since no email client renders them in URLs.
 */
export function escapeAttribute(value: string): string {
  if (!value) return "";
  return value
    .replace(/[\u0000-\u001f\u007f]/g, "")
    .replace(/[&<>"'`]/g, (ch) => ATTRIBUTE_ENTITIES[ch] ?? ch);
}

const SCRIPTABLE_URL = /^(?:javascript|vbscript|data):/i;

/**
 * False for URLs that would run script when clicked; those are rendered as
 * text instead of links. Browsers ignore whitespace and control characters
 * inside a scheme, so they are removed before the check.
 */
export function isSafeUrl(url: string): boolean {
  return !SCRIPTABLE_URL.test(url.replace(/[\u0000-\u0020\u007f]/g, ""));
}
