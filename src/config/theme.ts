/**
 * Theme configuration for rendered digest emails
 * Colors, fonts and footer copy used by the HTML formatter and email template
 */

import { z } from "zod";
import { logger } from "../lib/logger";

export interface ThemeColors {
  background: string;
  cardBackground: string;
  primary: string;
  accent: string;
  text: string;
  mutedText: string;
  border: string;
}

export interface Theme {
  brandName: string;
  fontStack: string;
  colors: ThemeColors;
  ctaUrl: string;
  ctaText: string;
}

export type ThemeOverrides = Partial<Omit<Theme, "colors">> & {
  colors?: Partial<ThemeColors>;
};

export const DEFAULT_THEME: Theme = {
  brandName: "AI News Daily",
  fontStack: "'Segoe UI', 'Helvetica Neue', Arial, sans-serif",
  colors: {
    background: "#f5f7fb",
    cardBackground: "#ffffff",
    primary: "#1d4ed8",
    accent: "#f97316",
    text: "#1f2937",
    mutedText: "#6b7280",
    border: "#e5e7eb",
  },
  ctaUrl: "mailto:feedback@example.com",
  ctaText: "Share feedback",
};

// Values end up inside style="" attributes, so keep them to plain hex
const hexColor = z.string().regex(/^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/, "must be a #rgb or #rrggbb color");

const ThemeSchema = z.object({
  brandName: z.string().trim().min(1).max(80),
  fontStack: z
    .string()
    .min(1)
    .regex(/^[\w\s',-]+$/, "may only contain font names, quotes, commas and hyphens"),
  colors: z.object({
    background: hexColor,
    cardBackground: hexColor,
    primary: hexColor,
    accent: hexColor,
    text: hexColor,
    mutedText: hexColor,
    border: hexColor,
  }),
  ctaUrl: z
    .string()
    .url()
    .refine((url) => /^(https?:|mailto:)/i.test(url), "must be an http(s) or mailto URL"),
  ctaText: z.string().trim().min(1).max(60),
});

export class ThemeConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid theme configuration: ${issues.join("; ")}`);
    this.name = "ThemeConfigError";
  }
}

/**
 * Merge overrides over the default theme and validate the result
 * @throws ThemeConfigError when any value fails validation
 */
export function resolveTheme(overrides: ThemeOverrides = {}, base: Theme = DEFAULT_THEME): Theme {
  const merged = {
    ...base,
    ...overrides,
    colors: { ...base.colors, ...overrides.colors },
  };

  const result = ThemeSchema.safeParse(merged);
  if (!result.success) {
    throw new ThemeConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "theme"}: ${issue.message}`)
    );
  }

  return result.data;
}

/**
 * Build a theme from DIGEST_* environment variables.
 * Falls back to the defaults (with a warning) when an override is invalid.
 */
export function loadThemeFromEnv(env: NodeJS.ProcessEnv = process.env): Theme {
  const colors: Partial<ThemeColors> = {};
  if (env.DIGEST_PRIMARY_COLOR) colors.primary = env.DIGEST_PRIMARY_COLOR;
  if (env.DIGEST_ACCENT_COLOR) colors.accent = env.DIGEST_ACCENT_COLOR;

  const overrides: ThemeOverrides = { colors };
  if (env.DIGEST_BRAND_NAME) overrides.brandName = env.DIGEST_BRAND_NAME;
  if (env.DIGEST_FONT_STACK) overrides.fontStack = env.DIGEST_FONT_STACK;
  if (env.DIGEST_CTA_URL) overrides.ctaUrl = env.DIGEST_CTA_URL;
  if (env.DIGEST_CTA_TEXT) overrides.ctaText = env.DIGEST_CTA_TEXT;

  try {
    return resolveTheme(overrides);
  } catch (error) {
    if (error instanceof ThemeConfigError) {
      logger.warn("Ignoring invalid theme overrides from environment", { issues: error.issues });
      return DEFAULT_THEME;
    }
    throw error;
  }
}
