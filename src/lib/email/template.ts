/**
 * Building blocks for the digest email template
 * Every helper takes the theme explicitly; nothing here reads global state.
 */

import type { Theme } from "../../config/theme";
import type { CuratedItem, SourceType } from "../model";
import { isItemStart } from "../render/item-fields";
import { sanitize } from "../render/sanitize";
import { escapeAttribute, escapeHtml } from "../utils/html-entities";

const CARD_TEXT_CHARS = 220;
const BULLET_LINE = /^[-*]\s+/;

const SOURCE_LABELS: Record<SourceType, string> = {
  youtube: "YouTube",
  openai: "OpenAI",
  anthropic: "Anthropic",
};

export interface DigestHeader {
  title: string;
  intro: string;
  body: string;
}

/**
 * Long-form date, e.g. "Thursday, July 18, 2024" (UTC)
 */
export function formatDigestDate(date: Date): string {
  return date.toLocaleDateString("en-US", {
    weekday: "long",
    year: "numeric",
    month: "long",
    day: "numeric",
    timeZone: "UTC",
  });
}

/**
 * Split digest content into its leading # / ## title, the intro paragraph
 * that follows it, and everything else.
 *
 * The intro ends at the first blank line after its text, or at the first
 * header, numbered item or bullet line.
 */
export function parseDigestHeader(content: string): DigestHeader {
  if (!content) return { title: "", intro: "", body: "" };

  const lines = content.replace(/\r\n?/g, "\n").split("\n");
  const titleIndex = lines.findIndex((line) => /^#{1,2}\s/.test(line.trim()));

  if (titleIndex === -1) {
    return { title: "", intro: "", body: content.trim() };
  }

  const title = lines[titleIndex].trim().replace(/^#+\s*/, "").trim();

  let introEnd = titleIndex + 1;
  let seenText = false;
  while (introEnd < lines.length) {
    const line = lines[introEnd].trim();
    if (!line) {
      if (seenText) break;
    } else if (line.startsWith("#") || isItemStart(line) || BULLET_LINE.test(line)) {
      break;
    } else {
      seenText = true;
    }
    introEnd++;
  }

  return {
    title,
    intro: lines.slice(titleIndex + 1, introEnd).join("\n").trim(),
    body: [...lines.slice(0, titleIndex), ...lines.slice(introEnd)].join("\n").trim(),
  };
}

function cardText(item: CuratedItem): string {
  return sanitize(item.reason || item.summary || "");
}

/**
 * Curated items as table rows of cards
 */
export function buildCuratedItemsHtml(items: CuratedItem[], theme: Theme): string {
  const { colors, fontStack } = theme;

  if (items.length === 0) {
    return `<p style="margin:0;color:${colors.mutedText};">No additional highlights for today.</p>`;
  }

  return items
    .map((item) => {
      const label = `${escapeHtml(SOURCE_LABELS[item.sourceType])} · ${escapeHtml(item.provider || "Source")}`;
      const excerpt = Array.from(cardText(item)).slice(0, CARD_TEXT_CHARS).join("");
      const text = escapeHtml(excerpt) || "Stay tuned for more details soon.";

      return `<tr>
  <td style="padding:16px 0;">
    <table width="100%" cellpadding="0" cellspacing="0" role="presentation" style="border-radius:12px;border:1px solid ${colors.border};background:${colors.cardBackground};">
      <tr>
        <td style="padding:18px 22px;font-family:${fontStack};">
          <div style="font-size:12px;text-transform:uppercase;letter-spacing:0.08em;color:${colors.mutedText};margin-bottom:6px;">${label}</div>
          <div style="font-size:17px;font-weight:600;color:${colors.text};margin-bottom:8px;">${escapeHtml(item.title)}</div>
          <div style="font-size:14px;line-height:1.55;color:${colors.mutedText};margin-bottom:12px;">${text}</div>
          <a href="${escapeAttribute(item.url)}" style="font-size:14px;color:${colors.primary};font-weight:600;text-decoration:none;">Read more →</a>
        </td>
      </tr>
    </table>
  </td>
</tr>`;
    })
    .join("\n");
}

/**
 * Curated items as numbered plain-text entries
 */
export function buildCuratedItemsText(items: CuratedItem[]): string {
  if (items.length === 0) return "No highlighted items for today.";

  const lines: string[] = [];
  items.forEach((item, idx) => {
    lines.push(`${idx + 1}. [${SOURCE_LABELS[item.sourceType]} · ${item.provider || "Source"}] ${item.title}`);
    const text = cardText(item);
    if (text) lines.push(`   ${text}`);
    lines.push(`   ${item.url}`);
  });

  return lines.join("\n");
}

/**
 * "Why these picks?" panel; empty when there is nothing to explain
 */
export function buildRecommendationsHtml(explanation: string | undefined, theme: Theme): string {
  if (!explanation) return "";

  const { colors, fontStack } = theme;
  return `<tr>
  <td style="padding:18px 22px;border-radius:10px;background:${colors.background};font-family:${fontStack};">
    <div style="font-size:13px;text-transform:uppercase;letter-spacing:0.08em;color:${colors.primary};margin-bottom:6px;">Why these picks?</div>
    <div style="color:${colors.text};font-size:15px;line-height:1.6;">${escapeHtml(explanation)}</div>
  </td>
</tr>`;
}

export function buildFooterHtml(theme: Theme, year: number): string {
  const { colors, fontStack } = theme;
  const brand = escapeHtml(theme.brandName);

  return `<table width="100%" cellpadding="0" cellspacing="0" role="presentation">
  <tr>
    <td style="padding:24px 32px;font-family:${fontStack};color:${colors.mutedText};font-size:13px;text-align:center;">
      <p style="margin:0 0 8px 0;">You're receiving this digest because you subscribed to ${brand}.</p>
      <p style="margin:0 0 16px 0;">Want to tailor your interests or pause emails? Reply to this message and we'll take care of it.</p>
      <a href="${escapeAttribute(theme.ctaUrl)}" style="display:inline-block;padding:10px 18px;background:${colors.primary};color:#ffffff;text-decoration:none;border-radius:999px;font-weight:600;">${escapeHtml(theme.ctaText)}</a>
      <p style="margin:18px 0 0 0;font-size:12px;color:${colors.mutedText};">© ${year} ${brand}. All rights reserved.</p>
    </td>
  </tr>
</table>`;
}
