import { homedir } from "node:os";
import { extname, join } from "node:path";
import { parseArgs } from "node:util";
import { z } from "zod";

import {
  createRaceConfig,
  JoinSession,
  RaceConfigError,
  type RaceConfig,
  type SavePolicy,
  type Username,
} from "./core.js";

const DEFAULT_PORT = 8787;

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  KEYDUEL_PEERS: z
    .string()
    .default("")
    .transform((value) =>
      value
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0),
    )
    .pipe(z.array(z.string().url())),
  KEYDUEL_RECORDS_DIR: z.string().min(1).optional(),
  KEYDUEL_LOCK_DELAY_MS: z.coerce.number().int().nonnegative().optional(),
  DEBUG: z.string().optional(),
});

export interface PeerEnv {
  readonly port: number;
  readonly peers: readonly string[];
  readonly recordsDir: string;
  readonly lockDelayMs: number | undefined;
  readonly debug: boolean;
}

export function loadPeerEnv(env: NodeJS.ProcessEnv = process.env): PeerEnv {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw RaceConfigError.because(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const { PORT, KEYDUEL_PEERS, KEYDUEL_RECORDS_DIR, KEYDUEL_LOCK_DELAY_MS, DEBUG } =
    parsed.data;
  return {
    port: PORT,
    peers: KEYDUEL_PEERS,
    recordsDir: KEYDUEL_RECORDS_DIR ?? join(homedir(), ".keyduel", "records"),
    lockDelayMs: KEYDUEL_LOCK_DELAY_MS,
    debug: Boolean(DEBUG),
  };
}

export type CliCommand =
  | {
      readonly command: "host";
      readonly user: Username;
      readonly file: string;
      readonly syntax: string | undefined;
    }
  | { readonly command: "join"; readonly user: Username; readonly host: string }
  | {
      readonly command: "practice";
      readonly user: Username;
      readonly file: string;
      readonly syntax: string | undefined;
      readonly ghost: boolean;
      readonly save: SavePolicy | undefined;
    };

export interface CliOptions {
  readonly run: CliCommand;
  readonly peers: readonly string[];
  readonly port: number | undefined;
}

export const USAGE = `Usage:
  keyduel host --file <path> [--user <name>] [--syntax <hint>]
  keyduel join <host> [--user <name>]
  keyduel practice --file <path> [--user <name>] [--syntax <hint>] [--ghost]
                   [--save best|override]

Options:
  --peer <url>   WebSocket URL of a peer to connect to (repeatable)
  --port <port>  Port this peer listens on`;

const SavePolicySchema = z.enum(["best", "override"]);
const PortSchema = z.coerce.number().int().min(0).max(65535);

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        user: { type: "string", short: "u" },
        file: { type: "string", short: "f" },
        syntax: { type: "string" },
        ghost: { type: "boolean", short: "g" },
        save: { type: "string" },
        peer: { type: "string", multiple: true },
        port: { type: "string", short: "p" },
      },
    });
  } catch (error) {
    throw RaceConfigError.because([error instanceof Error ? error.message : String(error)]);
  }
}

export function parseCli(argv: readonly string[], defaultUser: Username): CliOptions {
  const { values, positionals } = readArgs(argv);
  const [command, target] = positionals;
  const user = values.user ?? defaultUser;
  const issues: string[] = [];

  let port: number | undefined;
  if (values.port !== undefined) {
    const result = PortSchema.safeParse(values.port);
    if (result.success) {
      port = result.data;
    } else {
      issues.push(`--port must be a port number, got ${values.port}`);
    }
  }

  if (!JoinSession.isValidUsername(user)) {
    issues.push(`--user must be a name without whitespace, got "${user}"`);
  }

  let run: CliCommand | undefined;
  switch (command) {
    case "host":
      if (values.file === undefined) {
        issues.push("host needs --file");
        break;
      }
      run = {
        command,
        user,
        file: values.file,
        syntax: values.syntax ?? syntaxFromPath(values.file),
      };
      break;
    case "join":
      if (target === undefined) {
        issues.push("join needs the name of the host");
        break;
      }
      run = { command, user, host: target };
      break;
    case "practice": {
      if (values.file === undefined) {
        issues.push("practice needs --file");
        break;
      }
      const save = values.save === undefined ? undefined : SavePolicySchema.safeParse(values.save);
      if (save && !save.success) {
        issues.push(`--save must be best or override, got ${values.save}`);
        break;
      }
      run = {
        command,
        user,
        file: values.file,
        syntax: values.syntax ?? syntaxFromPath(values.file),
        ghost: values.ghost === true,
        save: save?.data,
      };
      break;
    }
    default:
      issues.push(command === undefined ? "Missing command" : `Unknown command: ${command}`);
  }

  if (issues.length > 0 || run === undefined) {
    throw RaceConfigError.because(issues);
  }

  return { run, peers: values.peer ?? [], port };
}

function syntaxFromPath(path: string): string | undefined {
  const extension = extname(path).slice(1);
  return extension.length > 0 ? extension : undefined;
}

export interface PeerConfig {
  readonly port: number;
  readonly peers: readonly string[];
  readonly recordsDir: string;
  readonly debug: boolean;
  readonly race: RaceConfig;
}

export function resolvePeerConfig(env: PeerEnv, cli: CliOptions): PeerConfig {
  return {
    port: cli.port ?? env.port,
    peers: [...new Set([...env.peers, ...cli.peers])],
    recordsDir: env.recordsDir,
    debug: env.debug,
    race: createRaceConfig(
      env.lockDelayMs === undefined ? {} : { lockDelayMs: env.lockDelayMs },
    ),
  };
}
