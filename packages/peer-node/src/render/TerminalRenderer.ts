import { formatStats, type RaceView, type Renderer } from "../core.js";
import type { RenderConfig } from "./RenderConfig.js";

const ESC = "\u001b[";
const ALT_SCREEN_ON = `${ESC}?1049h`;
const ALT_SCREEN_OFF = `${ESC}?1049l`;
const HIDE_CURSOR = `${ESC}?25l`;
const SHOW_CURSOR = `${ESC}?25h`;
const CLEAR = `${ESC}2J${ESC}H`;

export function style(text: string, sgr: string): string {
  return sgr === "" || text === "" ? text : `${ESC}${sgr}m${text}${ESC}0m`;
}

function visible(char: string): string {
  if (char === "\n") return "⏎";
  if (char === "\t") return "→";
  return char;
}

/**
 * Lays out one frame: a header, the text with the local progress and the
 * opponents' cursors, then the running statistics.
 */
export function renderFrame(view: RaceView, config: RenderConfig): string[] {
  const { theme, highlighter } = config;
  const { text, local } = view;
  const cursor = local?.cursor ?? 0;
  const wrong = local?.lastInput?.kind === "Wrong";

  const opponentOffsets = new Set(view.opponents.map((marker) => marker.offset));
  const lines: string[] = [];

  const header = [`[${view.phase}]`, view.participants.join(", ")];
  if (view.status) header.push(style(view.status, theme.status));
  lines.push(header.join("  "));
  lines.push("");

  const textLines = text.lines();
  const cursorLine = text.coordinateOf(Math.min(cursor, text.length)).line;
  const height = config.viewportLines ?? textLines.length;
  const first = Math.max(
    0,
    Math.min(cursorLine - Math.floor(height / 2), textLines.length - height),
  );

  let offset = 0;
  textLines.forEach((line, index) => {
    const start = offset;
    const chars = Array.from(line);
    offset += chars.length;
    if (index < first || index >= first + height) return;

    const body = line.endsWith("\n") ? line.slice(0, -1) : line;
    const kinds: string[] = [];
    for (const span of highlighter.highlightLine(body)) {
      kinds.push(...Array.from(span.text, () => theme.tokens[span.kind]));
    }

    const cells = chars.map((char, column) => {
      const position = start + column;
      let sgr = kinds[column] ?? "";
      let shown = char === "\n" ? "" : visible(char);

      if (position < cursor) {
        sgr = theme.typed;
      } else if (position === cursor && local && !local.isDone()) {
        sgr = wrong ? theme.wrong : theme.cursor;
        shown = visible(char);
      } else if (opponentOffsets.has(position)) {
        sgr = theme.opponent;
        shown = visible(char);
      }
      return { text: shown, sgr };
    });

    let rendered = "";
    let run = "";
    let runSgr = "";
    for (const cell of cells) {
      if (cell.sgr !== runSgr) {
        rendered += style(run, runSgr);
        run = "";
        runSgr = cell.sgr;
      }
      run += cell.text;
    }
    lines.push(rendered + style(run, runSgr));
  });

  lines.push("");
  lines.push(formatStats(view.stats).split("\n").join("  |  "));
  return lines;
}

export class TerminalRenderer implements Renderer {
  readonly #config: RenderConfig;
  readonly #output: NodeJS.WritableStream;
  #active = false;

  constructor(config: RenderConfig, output: NodeJS.WritableStream = process.stdout) {
    this.#config = config;
    this.#output = output;
  }

  enter(): void {
    if (this.#active) return;
    this.#active = true;
    this.#output.write(ALT_SCREEN_ON + HIDE_CURSOR);
  }

  draw(view: RaceView): void {
    if (!this.#active) return;
    this.#output.write(CLEAR + renderFrame(view, this.#config).join("\r\n"));
  }

  leave(): void {
    if (!this.#active) return;
    this.#active = false;
    this.#output.write(SHOW_CURSOR + ALT_SCREEN_OFF);
  }
}
