import { describe, expect, it } from "vitest";

import {
  highlighterFor,
  KeywordHighlighter,
  loadKeywordTable,
  noopHighlighter,
} from "../../packages/peer-node/src/render/highlighters.js";

describe("KeywordHighlighter", () => {
  it("colours keywords, literals and a trailing comment", () => {
    const highlighter = new KeywordHighlighter(["const"], "//");

    expect(highlighter.highlightLine('const x = "a // b"; // note')).toEqual([
      { text: "const", kind: "keyword" },
      { text: " x = ", kind: "plain" },
      { text: '"a // b"', kind: "string" },
      { text: "; ", kind: "plain" },
      { text: "// note", kind: "comment" },
    ]);
  });

  it("recognises numbers and leaves unknown words plain", () => {
    const highlighter = new KeywordHighlighter(["let"]);

    expect(highlighter.highlightLine("let n = 42 // no comments here")).toEqual([
      { text: "let", kind: "keyword" },
      { text: " n = ", kind: "plain" },
      { text: "42", kind: "number" },
      { text: " // no comments here", kind: "plain" },
    ]);
  });

  it("returns no spans for an empty line", () => {
    expect(new KeywordHighlighter(["let"]).highlightLine("")).toEqual([]);
    expect(noopHighlighter.highlightLine("")).toEqual([]);
  });
});

describe("highlighterFor", () => {
  const table = { ts: { lineComment: "//", keywords: ["return"] } };

  it("resolves aliases and file extensions", () => {
    expect(highlighterFor("TSX", table).highlightLine("return 1")).toEqual([
      { text: "return", kind: "keyword" },
      { text: " ", kind: "plain" },
      { text: "1", kind: "number" },
    ]);
    expect(highlighterFor(".ts", table)).toBeInstanceOf(KeywordHighlighter);
  });

  it("falls back to plain text", () => {
    expect(highlighterFor(undefined, table)).toBe(noopHighlighter);
    expect(highlighterFor("cobol", table)).toBe(noopHighlighter);
  });

  it("ships keyword lists for common languages", () => {
    const shipped = loadKeywordTable();

    expect(Object.keys(shipped)).toEqual(["ts", "js", "rs", "py", "go"]);
    expect(shipped["ts"]?.keywords).toContain("interface");
  });
});
