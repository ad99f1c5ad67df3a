/**
 * Tests for line classification
 */

import { describe, it, expect } from "vitest";
import { classifyLine } from "../../../src/lib/render/classify";

describe("Line classification", () => {
  it("treats whitespace-only lines as blank", () => {
    expect(classifyLine("")).toEqual({ kind: "blank" });
    expect(classifyLine("   \t")).toEqual({ kind: "blank" });
  });

  it("recognises three header levels", () => {
    expect(classifyLine("# One")).toEqual({ kind: "header", level: 1, text: "One" });
    expect(classifyLine("## Two")).toEqual({ kind: "header", level: 2, text: "Two" });
    expect(classifyLine("### Deep dive  ")).toEqual({ kind: "header", level: 3, text: "Deep dive" });
  });

  it("leaves deeper or unspaced headers as text", () => {
    expect(classifyLine("#### Four")).toEqual({ kind: "text", text: "#### Four" });
    expect(classifyLine("#Tight")).toEqual({ kind: "text", text: "#Tight" });
  });

  it("recognises item starts with their title", () => {
    expect(classifyLine("2. **Next**")).toEqual({ kind: "item-start", title: "Next" });
  });

  it("recognises source and summary fields", () => {
    expect(classifyLine("* **Source:** [A](https://a.example)")).toEqual({
      kind: "source",
      link: { text: "A", url: "https://a.example" },
      text: "**Source:** [A](https://a.example)",
      bullet: "**Source:** [A](https://a.example)",
    });
    expect(classifyLine("**Summary:** bare")).toEqual({
      kind: "summary",
      summary: "bare",
      text: "**Summary:** bare",
      bullet: null,
    });
  });

  it("recognises bullets with either marker", () => {
    expect(classifyLine("- entry")).toEqual({ kind: "bullet", text: "entry" });
    expect(classifyLine("  * nested entry")).toEqual({ kind: "bullet", text: "nested entry" });
  });

  it("does not mistake emphasis for a bullet", () => {
    expect(classifyLine("*emphasis* first")).toEqual({ kind: "text", text: "*emphasis* first" });
    expect(classifyLine("---")).toEqual({ kind: "text", text: "---" });
  });
});
