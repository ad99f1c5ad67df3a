/**
 * digest-mail public API
 */

export * from "./lib/render";
export {
  composeDigestEmail,
  buildSubject,
  buildIntro,
  DEFAULT_INTRO,
  EmailCompositionError,
} from "./lib/email/compose";
export type { ComposeInput } from "./lib/email/compose";
export {
  formatDigestDate,
  parseDigestHeader,
  buildCuratedItemsHtml,
  buildCuratedItemsText,
  buildRecommendationsHtml,
  buildFooterHtml,
} from "./lib/email/template";
export type { DigestHeader } from "./lib/email/template";
export { DEFAULT_THEME, resolveTheme, loadThemeFromEnv, ThemeConfigError } from "./config/theme";
export type { Theme, ThemeColors, ThemeOverrides } from "./config/theme";
export type { CuratedItem, Digest, EmailContent, SourceType } from "./lib/model";
export { escapeHtml, escapeAttribute, isSafeUrl } from "./lib/utils/html-entities";
export { logger } from "./lib/logger";
export type { Logger, LogMeta } from "./lib/logger";
