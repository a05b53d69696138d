import { randomUUID } from "node:crypto";
import { readFile } from "node:fs/promises";
import { userInfo } from "node:os";

import { FileRecordStore } from "./adapters/FileRecordStore.js";
import { SystemClock } from "./adapters/SystemClock.js";
import { TerminalKeys } from "./adapters/TerminalKeys.js";
import { loadPeerEnv, parseCli, resolvePeerConfig, USAGE } from "./config.js";
import type { CliCommand, PeerConfig } from "./config.js";
import {
  decodeSessionMetadata,
  OnlineRace,
  PracticeRace,
  RaceConfigError,
  SessionClient,
  SessionNotFoundError,
  TargetText,
  type GameOptions,
  type Logger,
  type NetworkService,
  type SessionResult,
} from "./core.js";
import { PeerServerError } from "./errors/PeerServerError.js";
import { createConsoleLogger } from "./logger.js";
import { createRenderConfig } from "./render/RenderConfig.js";
import { TerminalRenderer } from "./render/TerminalRenderer.js";
import { formatResult } from "./report.js";
import { startPeerServer, type PeerServer } from "./server.js";

/** Rows taken by the header, the spacing and the stats line */
const FRAME_CHROME_ROWS = 6;

type OnlineCommand = Exclude<CliCommand, { readonly command: "practice" }>;
type PracticeCommand = Extract<CliCommand, { readonly command: "practice" }>;

interface RunContext {
  readonly config: PeerConfig;
  readonly logger: Logger;
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  let config: PeerConfig;
  let run: CliCommand;
  try {
    const cli = parseCli(argv, userInfo().username);
    config = resolvePeerConfig(loadPeerEnv(), cli);
    run = cli.run;
  } catch (error) {
    if (!(error instanceof RaceConfigError)) throw error;
    process.stderr.write(`${error.message}\n\n${USAGE}\n`);
    return 2;
  }

  const logger = createConsoleLogger("keyduel", { level: config.debug ? "debug" : "warn" });
  let peer: PeerServer | undefined;

  try {
    let race: PreparedRace;
    if (run.command === "practice") {
      race = await preparePractice(run, { config, logger });
    } else {
      // practice stays offline; only online races bring the peer up
      peer = await startPeerServer({
        port: config.port,
        peers: config.peers,
        lookupTimeoutMs: config.race.recordLookupTimeoutMs,
        logger,
      });
      race = await prepareOnline(run, peer.network, { config, logger });
    }

    const result = await runRace(race);
    process.stdout.write(`${formatResult(result, run.user)}\n`);
    return result.outcome === "aborted" ? 1 : 0;
  } catch (error) {
    if (!(error instanceof SessionNotFoundError || error instanceof PeerServerError)) throw error;
    process.stderr.write(`${error.message}\n`);
    return 1;
  } finally {
    await peer?.close();
  }
}

async function runRace(race: PreparedRace): Promise<SessionResult> {
  const clock = new SystemClock();
  const keys = new TerminalKeys();
  const viewportLines = process.stdout.rows
    ? Math.max(1, process.stdout.rows - FRAME_CHROME_ROWS)
    : undefined;
  const renderer = new TerminalRenderer(
    createRenderConfig({ syntax: race.syntax, viewportLines }),
  );

  keys.start();
  try {
    return await race.start({ clock, keys: keys.events, renderer });
  } finally {
    keys.stop();
  }
}

type RaceIo = Pick<GameOptions, "clock" | "keys" | "renderer">;

interface PreparedRace {
  readonly syntax: string | undefined;
  start(io: RaceIo): Promise<SessionResult>;
}

async function prepareOnline(
  run: OnlineCommand,
  network: NetworkService,
  { config, logger }: RunContext,
): Promise<PreparedRace> {
  switch (run.command) {
    case "host": {
      const text = new TargetText(await readFile(run.file, "utf8"));
      const sessions = new SessionClient(network, logger);
      return {
        syntax: run.syntax,
        start: (io) =>
          new OnlineRace({
            ...io,
            text,
            localUser: run.user,
            config: config.race,
            logger,
            sessions,
            role: "host",
            host: run.user,
            sessionId: randomUUID(),
            syntax: run.syntax,
          }).run(),
      };
    }

    case "join": {
      const sessions = new SessionClient(network, logger);
      const data = await sessions.getHostedSessionData(run.host);
      const metadata = decodeSessionMetadata(data.metadata);
      return {
        syntax: metadata.syntax,
        start: (io) =>
          new OnlineRace({
            ...io,
            text: new TargetText(metadata.text),
            localUser: run.user,
            config: config.race,
            logger,
            sessions,
            role: "joiner",
            host: run.host,
            sessionId: data.sessionId,
          }).run(),
      };
    }
  }
}

async function preparePractice(
  run: PracticeCommand,
  { config, logger }: RunContext,
): Promise<PreparedRace> {
  const text = new TargetText(await readFile(run.file, "utf8"));
  const store = new FileRecordStore({
    directory: config.recordsDir,
    keyLength: config.race.recordKeyLength,
    logger,
  });
  const ghost = run.ghost ? await store.loadBestOrLatest(text) : undefined;
  if (run.ghost && !ghost) {
    logger.warn("No stored record for this text; practicing without a ghost");
  }
  return {
    syntax: run.syntax,
    start: (io) =>
      new PracticeRace({
        ...io,
        text,
        localUser: run.user,
        config: config.race,
        logger,
        ghost,
        store,
        savePolicy: run.save,
      }).run(),
  };
}

void main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    createConsoleLogger("keyduel").error("Peer failed", { error });
    process.exit(1);
  });
