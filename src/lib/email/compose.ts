/**
 * Digest email composition
 * Builds subject, plain-text and HTML bodies from a digest and curated items
 */

import { z } from "zod";
import { DEFAULT_THEME, type Theme } from "../../config/theme";
import { logger } from "../logger";
import type { CuratedItem, Digest, EmailContent } from "../model";
import { render, renderPlainText } from "../render";
import { sanitize, summarize } from "../render/sanitize";
import { escapeHtml } from "../utils/html-entities";
import {
  buildCuratedItemsHtml,
  buildCuratedItemsText,
  buildFooterHtml,
  buildRecommendationsHtml,
  formatDigestDate,
  parseDigestHeader,
} from "./template";

const log = logger.child("email");

const HERO_SUMMARY_CHARS = 360;
const RULE = "=".repeat(60);

export const DEFAULT_INTRO =
  "Here's your daily digest of the most interesting AI updates, hand-picked across YouTube, OpenAI, and Anthropic.";

const CuratedItemSchema = z.object({
  sourceType: z.enum(["youtube", "openai", "anthropic"]),
  title: z.string().trim().min(1),
  summary: z.string(),
  url: z
    .string()
    .url()
    .refine((url) => /^https?:/i.test(url), "must be an http(s) URL"),
  publishedAt: z.date().nullable(),
  provider: z.string().optional(),
  reason: z.string().optional(),
  score: z.number().finite(),
});

const ComposeInputSchema = z.object({
  digest: z.object({
    title: z.string().trim().min(1),
    content: z.string(),
    digestDate: z.date().refine((date) => !Number.isNaN(date.getTime()), "must be a valid date"),
  }),
  curatedItems: z.array(CuratedItemSchema),
  recommendationsExplanation: z.string().optional(),
  intro: z.string().optional(),
});

export interface ComposeInput {
  digest: Digest;
  curatedItems: CuratedItem[];
  /** Curator's explanation of why these items were picked */
  recommendationsExplanation?: string;
  /** Replaces the default intro, e.g. one written by the LLM */
  intro?: string;
}

export class EmailCompositionError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Cannot compose digest email: ${issues.join("; ")}`);
    this.name = "EmailCompositionError";
  }
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * "Daily AI News Digest - 07/18/2024"
 */
export function buildSubject(date: Date): string {
  return `Daily AI News Digest - ${pad(date.getUTCMonth() + 1)}/${pad(date.getUTCDate())}/${date.getUTCFullYear()}`;
}

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function buildIntro(explanation?: string): string {
  return explanation ? `${explanation}\n\n${DEFAULT_INTRO}` : DEFAULT_INTRO;
}

function buildTextBody(input: ComposeInput, intro: string, theme: Theme): string {
  const { digest, curatedItems, recommendationsExplanation } = input;

  const lines: string[] = [
    intro,
    "",
    RULE,
    `${digest.title} — ${isoDate(digest.digestDate)}`,
    RULE,
    renderPlainText(digest.content),
    "",
  ];

  if (recommendationsExplanation) {
    lines.push("Why these picks:", sanitize(recommendationsExplanation), "");
  }

  lines.push(
    "Top recommendations:",
    buildCuratedItemsText(curatedItems),
    "",
    `More ways to get the most out of ${theme.brandName}:`,
    "- Reply to this email to adjust your preferences.",
    "- Share an article you think we should feature.",
    "",
    "Best,",
    theme.brandName
  );

  return lines.join("\n");
}

function buildHtmlBody(input: ComposeInput, intro: string, theme: Theme): string {
  const { digest, curatedItems, recommendationsExplanation } = input;
  const { colors, fontStack } = theme;

  // The LLM usually opens with its own heading and intro; lift those into the hero
  const header = parseDigestHeader(digest.content);
  const heroTitle = header.title || digest.title;
  const heroSummary = summarize(header.intro || header.body, HERO_SUMMARY_CHARS);
  const bodyHtml = render(header.title ? header.body : digest.content, theme).html;

  const introHtml = intro.split("\n").map(escapeHtml).join("<br>");

  return `<html>
  <body style="margin:0;padding:0;background-color:${colors.background};">
    <table width="100%" cellpadding="0" cellspacing="0" role="presentation" style="background:${colors.background};padding:24px 0;">
      <tr>
        <td align="center">
          <table width="620" cellpadding="0" cellspacing="0" role="presentation" style="background:${colors.cardBackground};border-radius:18px;box-shadow:0 12px 35px rgba(15,23,42,0.08);overflow:hidden;">
            <tr>
              <td style="background:${colors.primary};padding:28px 32px;font-family:${fontStack};color:#ffffff;">
                <div style="font-size:13px;letter-spacing:0.12em;text-transform:uppercase;opacity:0.8;">${escapeHtml(theme.brandName)}</div>
                <div style="font-size:26px;font-weight:600;margin-top:6px;">Daily Digest</div>
                <div style="font-size:14px;opacity:0.85;margin-top:4px;">${formatDigestDate(digest.digestDate)}</div>
              </td>
            </tr>
            <tr>
              <td style="padding:28px 32px;font-family:${fontStack};color:${colors.text};">
                <p style="font-size:15px;line-height:1.65;margin:0 0 20px 0;color:${colors.text};">${introHtml}</p>
                <div style="background:${colors.background};border:1px solid ${colors.border};border-radius:14px;padding:20px 24px;">
                  <h2 style="margin:0 0 8px 0;font-size:19px;color:${colors.text};">${escapeHtml(heroTitle)}</h2>
                  <p style="margin:0;font-size:15px;line-height:1.7;color:${colors.mutedText};">${escapeHtml(heroSummary)}</p>
                </div>
              </td>
            </tr>
            <tr>
              <td style="padding:0 32px 10px 32px;font-family:${fontStack};">
${bodyHtml}
              </td>
            </tr>
            <tr>
              <td style="padding:0 32px 10px 32px;font-family:${fontStack};">
                <table width="100%" cellpadding="0" cellspacing="0" role="presentation">
                  <tr>
                    <td>
                      <div style="font-size:13px;text-transform:uppercase;letter-spacing:0.08em;color:${colors.accent};margin-bottom:6px;">Top recommendations</div>
                      <table width="100%" cellpadding="0" cellspacing="0" role="presentation">
${buildCuratedItemsHtml(curatedItems, theme)}
                      </table>
                    </td>
                  </tr>
${buildRecommendationsHtml(recommendationsExplanation, theme)}
                </table>
              </td>
            </tr>
            <tr>
              <td style="padding:10px 32px 32px 32px;">
${buildFooterHtml(theme, digest.digestDate.getUTCFullYear())}
              </td>
            </tr>
          </table>
        </td>
      </tr>
    </table>
  </body>
</html>
`;
}

/**
 * Compose the full digest email
 * @throws EmailCompositionError when the digest or an item is malformed
 */
export function composeDigestEmail(input: ComposeInput, theme: Theme = DEFAULT_THEME): EmailContent {
  const parsed = ComposeInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`);
    log.warn("Rejected digest email input", { issues });
    throw new EmailCompositionError(issues);
  }

  const intro = input.intro?.trim() || buildIntro(input.recommendationsExplanation);

  const email: EmailContent = {
    subject: buildSubject(input.digest.digestDate),
    textBody: buildTextBody(input, intro, theme),
    htmlBody: buildHtmlBody(input, intro, theme),
  };

  log.info("Composed digest email", {
    subject: email.subject,
    items: input.curatedItems.length,
    textChars: email.textBody.length,
    htmlChars: email.htmlBody.length,
  });

  return email;
}
