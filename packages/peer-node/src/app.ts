import { Hono } from "hono";
import type { Context, Next } from "hono";

import { toBase64, type Logger, type NetworkService, type PeerId } from "./core.js";

/** What the HTTP surface needs to know about the local peer */
export interface PeerStatus extends Pick<NetworkService, "peerId" | "getRecord"> {
  readonly neighbours: readonly PeerId[];
}

export interface CreatePeerAppOptions {
  readonly port: number;
  readonly network: PeerStatus;
  readonly logger: Logger;
}

export function createPeerApp({ port, network, logger }: CreatePeerAppOptions): Hono {
  const app = new Hono();

  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Headers", "Content-Type");
    c.header("Access-Control-Allow-Methods", "GET,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  app.get("/api/health", (c: Context) =>
    c.json({
      ok: true,
      timestamp: Date.now(),
      peerId: network.peerId,
      neighbours: [...network.neighbours],
      config: { port },
    }),
  );

  app.get("/api/records/:key", async (c: Context) => {
    const key = c.req.param("key");
    if (!key) {
      return c.json({ error: "Missing record key" }, 400);
    }
    try {
      const values = await network.getRecord(key);
      if (values.length === 0) {
        return c.json({ error: "Record not found" }, 404);
      }
      return c.json({ key, values: values.map(toBase64) });
    } catch (error) {
      logger.error("Failed to look up record", { key, error });
      return c.json({ error: getErrorMessage(error) }, 503);
    }
  });

  return app;
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return "Unknown error";
}
