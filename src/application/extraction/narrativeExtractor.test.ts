import { describe, expect, it } from "vitest";
import { parseMarkup } from "./markupTree";
import { extractNarrativeSection, renderNarrative } from "./narrativeExtractor";

const extract = (html: string) => extractNarrativeSection(parseMarkup(html));

describe("extractNarrativeSection", () => {
  it("collects the paragraphs between the section heading and the market risk heading", () => {
    const result = extract(
      [
        "<h2>Item 7. Management's Discussion and Analysis of Financial Condition</h2>",
        "<p>P1</p><p>P2</p><p>P3</p>",
        "<h2>Item 7A. Quantitative and Qualitative Disclosures About Market Risk</h2>",
        "<p>Interest rates moved.</p>",
      ].join(""),
    );

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value).toEqual({
      startHeading:
        "Item 7. Management's Discussion and Analysis of Financial Condition",
      blocks: ["P1", "P2", "P3"],
      stopHeading:
        "Item 7A. Quantitative and Qualitative Disclosures About Market Risk",
    });
    expect(renderNarrative(result.value)).toBe("P1\n\nP2\n\nP3\n\n");
  });

  it("ignores table-of-contents links to the section", () => {
    const result = extract(
      [
        '<p><a href="#mda">Management\'s Discussion and Analysis</a></p>',
        "<p>Table of contents filler.</p>",
        "<div><b>MANAGEMENT’S DISCUSSION AND ANALYSIS</b></div>",
        "<p>Body text.</p>",
      ].join(""),
    );

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value.startHeading).toBe(
      "MANAGEMENT’S DISCUSSION AND ANALYSIS",
    );
    expect(result.value.blocks).toEqual(["Body text."]);
  });

  it("matches a heading split across lines and encoded apostrophes", () => {
    const result = extract(
      "<p>Management&#8217;s\n   Discussion and\nAnalysis</p><p>Liquidity is ample.</p>",
    );

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value.blocks).toEqual(["Liquidity is ample."]);
  });

  it("runs to the end of the document when no stop heading follows", () => {
    const result = extract(
      [
        "<h3>Management's Discussion and Analysis</h3>",
        "<p>See Quantitative and Qualitative Disclosures About Market Risk below.</p>",
        "<p>Line one<br>line two</p>",
      ].join(""),
    );

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value.blocks).toEqual([
      "See Quantitative and Qualitative Disclosures About Market Risk below.",
      "Line one line two",
    ]);
    expect(result.value.stopHeading).toBeUndefined();
  });

  it("emits nested blocks once, in document order", () => {
    const result = extract(
      "<h3>Management's Discussion and Analysis</h3><div>Overview<p>Inner detail.</p>Closing note</div>",
    );

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value.blocks).toEqual([
      "Overview",
      "Inner detail.",
      "Closing note",
    ]);
  });

  it("reports a missing header", () => {
    const result = extract(
      '<p>Risk factors.</p><p><a href="#mda">Management\'s Discussion and Analysis</a></p>',
    );

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("Expected no header");
    }

    expect(result.error.code).toBe("header_not_found");
  });

  it("reports a header followed directly by the stop heading as empty", () => {
    const result = extract(
      [
        "<h2>Management's Discussion and Analysis</h2>",
        "<p>   </p>",
        "<h2>Item 8. Financial Statements and Supplementary Data</h2>",
        "<p>Balance sheet.</p>",
      ].join(""),
    );

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("Expected an empty section");
    }

    expect(result.error).toEqual({
      code: "section_empty",
      message: "Section header was found but no text followed it.",
      startHeading: "Management's Discussion and Analysis",
    });
  });
});
