/**
 * Tests for digest email composition
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  DEFAULT_INTRO,
  EmailCompositionError,
  buildSubject,
  composeDigestEmail,
  type ComposeInput,
} from "../../../src/lib/email/compose";
import type { CuratedItem } from "../../../src/lib/model";

const CONTENT = [
  "## Today in AI",
  "",
  "A quick intro from AT&T.",
  "",
  "### Stories",
  "1. **Launch**",
  "* **Source:** [Blog](https://blog.example/launch)",
  "* **Summary:** Something shipped.",
].join("\n");

function createMockItem(overrides?: Partial<CuratedItem>): CuratedItem {
  return {
    sourceType: "anthropic",
    title: "Claude update",
    summary: "Better tools.",
    url: "https://anthropic.example/news",
    publishedAt: null,
    score: 1.2,
    ...overrides,
  };
}

function createInput(overrides?: Partial<ComposeInput>): ComposeInput {
  return {
    digest: {
      title: "AI Digest",
      content: CONTENT,
      digestDate: new Date(Date.UTC(2024, 6, 18)),
    },
    curatedItems: [createMockItem()],
    ...overrides,
  };
}

function captureIssues(input: ComposeInput): string[] {
  try {
    composeDigestEmail(input);
  } catch (error) {
    if (error instanceof EmailCompositionError) return error.issues;
    throw error;
  }
  return [];
}

describe("Digest email composition", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("builds a dated subject line", () => {
    expect(buildSubject(new Date(Date.UTC(2024, 0, 5)))).toBe("Daily AI News Digest - 01/05/2024");
    expect(composeDigestEmail(createInput()).subject).toBe("Daily AI News Digest - 07/18/2024");
  });

  describe("text body", () => {
    it("opens with the intro and the digest heading", () => {
      const { textBody } = composeDigestEmail(createInput());
      const rule = "=".repeat(60);

      expect(textBody.startsWith(`${DEFAULT_INTRO}\n\n${rule}\nAI Digest — 2024-07-18\n${rule}\n`)).toBe(true);
    });

    it("includes the plain-text rendering of the digest", () => {
      const { textBody } = composeDigestEmail(createInput());

      expect(textBody).toContain("Stories\n-------\nLaunch\nSource: https://blog.example/launch\nSomething shipped.");
      expect(textBody).toContain("A quick intro from AT&T.");
    });

    it("lists recommendations and signs off with the brand", () => {
      const { textBody } = composeDigestEmail(createInput());

      expect(textBody).toContain(
        "Top recommendations:\n1. [Anthropic · Source] Claude update\n   Better tools.\n   https://anthropic.example/news"
      );
      expect(textBody.endsWith("Best,\nAI News Daily")).toBe(true);
    });

    it("explains the picks when an explanation is given", () => {
      const { textBody } = composeDigestEmail(
        createInput({ recommendationsExplanation: "Picked for your agent interests & tooling." })
      );

      expect(textBody.startsWith(`Picked for your agent interests & tooling.\n\n${DEFAULT_INTRO}`)).toBe(true);
      expect(textBody).toContain("Why these picks:\nPicked for your agent interests & tooling.\n");
    });
  });

  describe("HTML body", () => {
    it("lifts the digest heading and intro into the hero", () => {
      const { htmlBody } = composeDigestEmail(createInput());

      expect(htmlBody).toContain('<h2 style="margin:0 0 8px 0;font-size:19px;color:#1f2937;">Today in AI</h2>');
      expect(htmlBody).toContain(
        '<p style="margin:0;font-size:15px;line-height:1.7;color:#6b7280;">A quick intro from AT&amp;T.</p>'
      );
      expect(htmlBody.split("Today in AI")).toHaveLength(2);
    });

    it("renders the digest items and the footer", () => {
      const { htmlBody } = composeDigestEmail(createInput());

      expect(htmlBody).toContain('href="https://blog.example/launch"');
      expect(htmlBody).toContain(">🔗 Blog</a>");
      expect(htmlBody).toContain("Thursday, July 18, 2024");
      expect(htmlBody).toContain("© 2024 AI News Daily. All rights reserved.");
    });

    it("renders items that follow the intro without another header", () => {
      const content = [
        "## AI Daily",
        "",
        "Today was busy.",
        "",
        "1. **First Story**",
        "* **Source:** [Lab](https://lab.example/one)",
        `* **Summary:** ${"Long summary text. ".repeat(25)}`,
        "",
        "2. **Second Story**",
        "* **Summary:** Another closing note.",
      ].join("\n");
      const { htmlBody } = composeDigestEmail(
        createInput({ digest: { title: "AI Digest", content, digestDate: new Date(Date.UTC(2024, 6, 18)) } })
      );

      expect(htmlBody).toContain(
        '<p style="margin:0;font-size:15px;line-height:1.7;color:#6b7280;">Today was busy.</p>'
      );
      expect(htmlBody).toContain("letter-spacing:-0.01em;\">First Story</div>");
      expect(htmlBody).toContain("letter-spacing:-0.01em;\">Second Story</div>");
      expect(htmlBody).toContain('href="https://lab.example/one"');
      expect(htmlBody).toContain("Another closing note.");
    });

    it("uses a supplied intro with line breaks", () => {
      const email = composeDigestEmail(createInput({ intro: "Hi Sam,\nWelcome <back>." }));

      expect(email.htmlBody).toContain("Hi Sam,<br>Welcome &lt;back&gt;.");
      expect(email.textBody.startsWith("Hi Sam,\nWelcome <back>.\n\n")).toBe(true);
    });

    it("escapes the recommendations explanation", () => {
      const { htmlBody } = composeDigestEmail(
        createInput({ recommendationsExplanation: "Picked for your agent interests & tooling." })
      );

      expect(htmlBody).toContain(">Picked for your agent interests &amp; tooling.</div>");
    });
  });

  describe("validation", () => {
    it("rejects a digest without a title", () => {
      const input = createInput({
        digest: { title: " ", content: CONTENT, digestDate: new Date(Date.UTC(2024, 6, 18)) },
      });

      expect(() => composeDigestEmail(input)).toThrow(EmailCompositionError);
      expect(captureIssues(input).some((issue) => issue.startsWith("digest.title"))).toBe(true);
    });

    it("rejects items whose URL is not http(s)", () => {
      const input = createInput({ curatedItems: [createMockItem({ url: "javascript:alert(1)" })] });

      expect(captureIssues(input).some((issue) => issue.startsWith("curatedItems.0.url"))).toBe(true);
    });

    it("rejects an invalid digest date", () => {
      const input = createInput({
        digest: { title: "AI Digest", content: CONTENT, digestDate: new Date("not a date") },
      });

      expect(captureIssues(input).some((issue) => issue.startsWith("digest.digestDate"))).toBe(true);
    });
  });
});
