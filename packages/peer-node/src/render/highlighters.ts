import { readFileSync } from "node:fs";
import { z } from "zod";

export type TokenKind = "plain" | "keyword" | "string" | "comment" | "number";

export interface StyledSpan {
  readonly text: string;
  readonly kind: TokenKind;
}

/** Splits one line into spans whose texts concatenate back to the line */
export interface Highlighter {
  highlightLine(line: string): StyledSpan[];
}

export const noopHighlighter: Highlighter = {
  highlightLine(line: string): StyledSpan[] {
    return line.length === 0 ? [] : [{ text: line, kind: "plain" }];
  },
};

const TOKEN_PATTERN =
  /("(?:[^"\\]|\\.)*"?|'(?:[^'\\]|\\.)*'?|`(?:[^`\\]|\\.)*`?)|(\d[\d_]*(?:\.\d+)?)|([\p{L}_$][\p{L}\p{N}_$]*)|(\s+|.)/gu;

/** Keyword, literal and line-comment colouring driven by a keyword list */
export class KeywordHighlighter implements Highlighter {
  readonly #keywords: ReadonlySet<string>;
  readonly #lineComment: string | undefined;

  constructor(keywords: Iterable<string>, lineComment?: string) {
    this.#keywords = new Set(keywords);
    this.#lineComment = lineComment;
  }

  highlightLine(line: string): StyledSpan[] {
    const commentAt =
      this.#lineComment === undefined ? -1 : findComment(line, this.#lineComment);
    const code = commentAt === -1 ? line : line.slice(0, commentAt);

    const spans: StyledSpan[] = [];
    for (const match of code.matchAll(TOKEN_PATTERN)) {
      const [text, quoted, number, word] = match;
      const kind: TokenKind =
        quoted !== undefined
          ? "string"
          : number !== undefined
            ? "number"
            : word !== undefined && this.#keywords.has(word)
              ? "keyword"
              : "plain";
      pushSpan(spans, { text, kind });
    }

    if (commentAt !== -1) {
      pushSpan(spans, { text: line.slice(commentAt), kind: "comment" });
    }
    return spans;
  }
}

function pushSpan(spans: StyledSpan[], span: StyledSpan): void {
  const last = spans[spans.length - 1];
  if (last && last.kind === span.kind) {
    spans[spans.length - 1] = { text: last.text + span.text, kind: span.kind };
  } else {
    spans.push(span);
  }
}

/** Start of a line comment outside of string literals, or -1 */
function findComment(line: string, marker: string): number {
  let quote: string | undefined;
  for (let index = 0; index < line.length; index += 1) {
    const char = line[index];
    if (quote !== undefined) {
      if (char === "\\") index += 1;
      else if (char === quote) quote = undefined;
    } else if (char === '"' || char === "'" || char === "`") {
      quote = char;
    } else if (line.startsWith(marker, index)) {
      return index;
    }
  }
  return -1;
}

const LanguageSchema = z.object({
  lineComment: z.string().min(1).optional(),
  keywords: z.array(z.string().min(1)),
});

const KeywordTableSchema = z.record(LanguageSchema);

export type KeywordTable = z.infer<typeof KeywordTableSchema>;

const ALIASES: Readonly<Record<string, string>> = {
  tsx: "ts",
  mts: "ts",
  cts: "ts",
  typescript: "ts",
  jsx: "js",
  mjs: "js",
  cjs: "js",
  javascript: "js",
  rust: "rs",
  python: "py",
  golang: "go",
};

export function loadKeywordTable(
  url: URL = new URL("./keywords.json", import.meta.url),
): KeywordTable {
  return KeywordTableSchema.parse(JSON.parse(readFileSync(url, "utf8")));
}

/** Picks a highlighter for a syntax hint such as a file extension */
export function highlighterFor(
  syntax: string | undefined,
  table?: KeywordTable,
): Highlighter {
  if (syntax === undefined) return noopHighlighter;

  const normalized = syntax.toLowerCase().replace(/^\./, "");
  const language = (table ?? loadKeywordTable())[ALIASES[normalized] ?? normalized];
  return language
    ? new KeywordHighlighter(language.keywords, language.lineComment)
    : noopHighlighter;
}
