import {
  highlighterFor,
  type Highlighter,
  type KeywordTable,
  type TokenKind,
} from "./highlighters.js";

/** SGR parameters per role; an empty string leaves the text unstyled */
export interface Theme {
  readonly name: ThemeName;
  readonly typed: string;
  readonly wrong: string;
  readonly cursor: string;
  readonly opponent: string;
  readonly status: string;
  readonly tokens: Readonly<Record<TokenKind, string>>;
}

export type ThemeName = "default" | "mono";

export const THEMES: Readonly<Record<ThemeName, Theme>> = {
  default: {
    name: "default",
    typed: "32",
    wrong: "41;97",
    cursor: "7",
    opponent: "4;36",
    status: "2",
    tokens: { plain: "", keyword: "35", string: "33", comment: "2", number: "34" },
  },
  mono: {
    name: "mono",
    typed: "1",
    wrong: "9",
    cursor: "7",
    opponent: "4",
    status: "",
    tokens: { plain: "", keyword: "", string: "", comment: "", number: "" },
  },
};

/** Built once at startup and handed to the renderer */
export interface RenderConfig {
  readonly theme: Theme;
  readonly syntax: string | undefined;
  readonly highlighter: Highlighter;
  /** Text lines kept on screen around the local cursor; all when undefined */
  readonly viewportLines: number | undefined;
}

export interface RenderConfigOptions {
  readonly theme?: ThemeName;
  readonly syntax?: string;
  readonly viewportLines?: number;
  readonly keywords?: KeywordTable;
}

export function createRenderConfig(options: RenderConfigOptions = {}): RenderConfig {
  return {
    theme: THEMES[options.theme ?? "default"],
    syntax: options.syntax,
    highlighter: highlighterFor(options.syntax, options.keywords),
    viewportLines: options.viewportLines,
  };
}
