import { serve, type ServerType } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import type { Hono } from "hono";
import type { WSContext } from "hono/ws";
import type { EventEmitter } from "node:events";
import type { AddressInfo } from "node:net";
import type { WebSocket } from "ws";

import { WebSocketMeshNetwork } from "./adapters/WebSocketMeshNetwork.js";
import { createPeerApp } from "./app.js";
import type { Logger, Millis } from "./core.js";
import { PeerServerError } from "./errors/PeerServerError.js";

export interface StartPeerServerOptions {
  /** 0 picks a free port */
  readonly port: number;
  /** WebSocket URLs of peers to dial once listening */
  readonly peers: readonly string[];
  readonly lookupTimeoutMs: Millis;
  readonly logger: Logger;
}

export interface PeerServer {
  readonly network: WebSocketMeshNetwork;
  /** The port actually bound */
  readonly port: number;
  close(): Promise<void>;
}

/**
 * Brings the local peer online: the Hono app with its `/ws` upgrade feeding
 * the mesh, then the configured peers dialed.
 *
 * A port that cannot be bound rejects with {@link PeerServerError}.
 */
export async function startPeerServer({
  port,
  peers,
  lookupTimeoutMs,
  logger,
}: StartPeerServerOptions): Promise<PeerServer> {
  const network = new WebSocketMeshNetwork({ lookupTimeoutMs, logger });
  const app = createPeerApp({ port, network, logger });
  const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app });

  app.get(
    "/ws",
    upgradeWebSocket(() => ({
      onOpen(_event: Event, ws: WSContext<WebSocket>): void {
        const rawSocket = ws.raw;
        if (!rawSocket) {
          logger.warn("WebSocket connection missing raw handle");
          return;
        }
        network.attach(rawSocket);
      },
    })),
  );

  const [server, info] = await listen(app, port).catch(async (error: unknown) => {
    await network.close();
    throw new PeerServerError(`Cannot listen on port ${port}: ${getErrorMessage(error)}`, error);
  });
  logger.info("Peer listening", info);
  injectWebSocket(server);

  const dialed = await Promise.allSettled(peers.map((url) => network.dial(url)));
  dialed.forEach((result, index) => {
    if (result.status === "rejected") {
      logger.warn("Failed to reach peer", { url: peers[index], error: result.reason });
    }
  });

  return {
    network,
    port: info.port,
    async close(): Promise<void> {
      await network.close();
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
      });
    },
  };
}

function listen(app: Hono, port: number): Promise<[ServerType, AddressInfo]> {
  return new Promise((resolve, reject) => {
    const server = serve({ fetch: app.fetch, port }, (info: AddressInfo) => {
      events.off("error", reject);
      resolve([server, info]);
    });
    const events: EventEmitter = server;
    events.once("error", reject);
  });
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return "Unknown error";
}
