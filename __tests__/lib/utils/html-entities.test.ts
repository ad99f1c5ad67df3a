/**
 * Tests for HTML entity encoding
 */

import { describe, it, expect } from "vitest";
import { escapeAttribute, escapeHtml, isSafeUrl } from "../../../src/lib/utils/html-entities";

describe("escapeHtml", () => {
  it("encodes each special character once", () => {
    expect(escapeHtml(`<a href="x">Tom's & Jerry's</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom&#x27;s &amp; Jerry&#x27;s&lt;/a&gt;"
    );
  });

  it("re-encodes existing entities", () => {
    expect(escapeHtml("&amp;")).toBe("&amp;amp;");
  });

  it("returns an empty string for empty input", () => {
    expect(escapeHtml("")).toBe("");
  });
});

describe("escapeAttribute", () => {
  it("encodes quotes and backticks and keeps query strings readable", () => {
    expect(escapeAttribute('https://x.example/?q="a"&b=`c`')).toBe(
      "https://x.example/?q=&quot;a&quot;&amp;b=&#x60;c&#x60;"
    );
  });

  it("drops control characters", () => {
    expect(escapeAttribute("https://x.example/\n\tpath")).toBe("https://x.example/path");
  });
});

describe("isSafeUrl", () => {
  it("accepts web and mail links", () => {
    expect(isSafeUrl("https://anthropic.com")).toBe(true);
    expect(isSafeUrl("mailto:team@example.com")).toBe(true);
    expect(isSafeUrl("/relative/path")).toBe(true);
  });

  it("rejects scriptable schemes in any case", () => {
    expect(isSafeUrl("javascript:alert(1)")).toBe(false);
    expect(isSafeUrl("  JavaScript:alert(1)")).toBe(false);
    expect(isSafeUrl("vbscript:msgbox")).toBe(false);
    expect(isSafeUrl("data:text/html;base64,AAAA")).toBe(false);
  });

  it("rejects scriptable schemes split by tabs, newlines or control characters", () => {
    expect(isSafeUrl("java\tscript:alert(1)")).toBe(false);
    expect(isSafeUrl("java\nscript:alert(1)")).toBe(false);
    expect(isSafeUrl("\u0001javascript:alert(1)")).toBe(false);
    expect(isSafeUrl("vb script:msgbox")).toBe(false);
  });
});
