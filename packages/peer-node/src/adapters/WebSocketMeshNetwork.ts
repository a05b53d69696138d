/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { randomUUID } from "node:crypto";
import { WebSocket, type RawData } from "ws";
import { z } from "zod";

import {
  Channel,
  decodeJson,
  ProtocolError,
  toBase64,
  TransportClosedError,
  type Logger,
  type NetworkMessage,
  type NetworkService,
  type PeerId,
  type Topic,
} from "../core.js";

const FrameSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("Hello"), peerId: z.string().min(1) }),
  z.object({
    type: z.literal("Publish"),
    id: z.string().min(1),
    source: z.string().min(1),
    topic: z.string().min(1),
    data: z.string(),
  }),
  z.object({
    type: z.literal("PutRecord"),
    id: z.string().min(1),
    source: z.string().min(1),
    key: z.string().min(1),
    value: z.string(),
  }),
  z.object({
    type: z.literal("RemoveRecord"),
    id: z.string().min(1),
    source: z.string().min(1),
    key: z.string().min(1),
  }),
  z.object({ type: z.literal("GetRecord"), id: z.string().min(1), key: z.string().min(1) }),
  z.object({
    type: z.literal("RecordFound"),
    id: z.string().min(1),
    key: z.string().min(1),
    values: z.array(z.string()),
  }),
]);

export type MeshFrame = z.infer<typeof FrameSchema>;
type FloodedFrame = Extract<MeshFrame, { source: string }>;

interface Lookup {
  readonly values: Uint8Array[];
  readonly awaiting: Set<WebSocket>;
  readonly resolve: (values: Uint8Array[]) => void;
  readonly timer: ReturnType<typeof setTimeout>;
}

export interface WebSocketMeshNetworkOptions {
  readonly peerId?: PeerId;
  /** How long `getRecord` waits on neighbours */
  readonly lookupTimeoutMs?: number;
  /** Number of flooded frame ids remembered for de-duplication */
  readonly maxSeenIds?: number;
  readonly logger?: Logger;
}

/**
 * Network service over a mesh of WebSocket connections.
 *
 * Publishes and record updates are flooded to every neighbour and
 * de-duplicated by frame id. Records are replicated to every peer; a lookup
 * answers from the local replica or asks the neighbours directly.
 */
export class WebSocketMeshNetwork implements NetworkService {
  readonly peerId: PeerId;
  #sockets = new Map<WebSocket, PeerId | undefined>();
  #topics = new Set<Topic>();
  #inbox = new Channel<NetworkMessage>();
  #records = new Map<string, Map<PeerId, Uint8Array>>();
  #seen = new Set<string>();
  #lookups = new Map<string, Lookup>();
  #closed = false;
  readonly #lookupTimeoutMs: number;
  readonly #maxSeenIds: number;
  readonly #logger: Logger | undefined;

  constructor(options: WebSocketMeshNetworkOptions = {}) {
    this.peerId = options.peerId ?? randomUUID();
    this.#lookupTimeoutMs = options.lookupTimeoutMs ?? 2_000;
    this.#maxSeenIds = options.maxSeenIds ?? 10_000;
    this.#logger = options.logger;
  }

  /** Peer ids announced by the connected neighbours */
  get neighbours(): PeerId[] {
    return [...this.#sockets.values()].filter((peer): peer is PeerId => peer !== undefined);
  }

  get connections(): number {
    return this.#sockets.size;
  }

  /** Opens an outbound connection and attaches it once established */
  dial(url: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const socket = new WebSocket(url);
      socket.once("open", () => {
        this.attach(socket);
        resolve();
      });
      socket.once("error", (error: Error) => {
        if (!this.#sockets.has(socket)) reject(error);
      });
    });
  }

  attach(socket: WebSocket): void {
    if (this.#closed) {
      socket.close();
      return;
    }

    this.#sockets.set(socket, undefined);
    this.#logger?.info?.("Mesh neighbour attached", { connections: this.#sockets.size });

    socket.on("message", (data: RawData) => {
      this.#receive(socket, rawToText(data));
    });

    socket.on("close", () => {
      const peer = this.#sockets.get(socket);
      this.#sockets.delete(socket);
      for (const [id, lookup] of this.#lookups) {
        lookup.awaiting.delete(socket);
        if (lookup.awaiting.size === 0) this.#settleLookup(id);
      }
      this.#logger?.info?.("Mesh neighbour disconnected", {
        peer,
        connections: this.#sockets.size,
      });
    });

    socket.on("error", (error: Error) => {
      this.#logger?.warn?.("Mesh neighbour error", { peer: this.#sockets.get(socket), error });
    });

    this.#send(socket, { type: "Hello", peerId: this.peerId });
    for (const [key, publishers] of this.#records) {
      for (const [source, value] of publishers) {
        this.#send(
          socket,
          this.#flooded({ type: "PutRecord", source, key, value: toBase64(value) }),
        );
      }
    }
  }

  messages(): AsyncIterable<NetworkMessage> {
    return this.#inbox;
  }

  async subscribe(topic: Topic): Promise<boolean> {
    this.#assertOpen("subscribe");
    if (this.#topics.has(topic)) return false;
    this.#topics.add(topic);
    return true;
  }

  async unsubscribe(topic: Topic): Promise<boolean> {
    this.#assertOpen("unsubscribe");
    return this.#topics.delete(topic);
  }

  async publish(topic: Topic, data: Uint8Array): Promise<void> {
    this.#assertOpen("publish");
    this.#broadcast(
      this.#flooded({ type: "Publish", source: this.peerId, topic, data: toBase64(data) }),
    );
  }

  async getRecord(key: string): Promise<Uint8Array[]> {
    this.#assertOpen("getRecord");

    const local = this.#localValues(key);
    if (local.length > 0 || this.#sockets.size === 0) return local;

    const id = randomUUID();
    return new Promise<Uint8Array[]>((resolve) => {
      this.#lookups.set(id, {
        values: [],
        awaiting: new Set(this.#sockets.keys()),
        resolve,
        timer: setTimeout(() => this.#settleLookup(id), this.#lookupTimeoutMs),
      });
      this.#broadcast({ type: "GetRecord", id, key });
    });
  }

  async putRecord(key: string, value: Uint8Array): Promise<void> {
    this.#assertOpen("putRecord");
    this.#storeRecord(key, this.peerId, value.slice());
    this.#broadcast(
      this.#flooded({ type: "PutRecord", source: this.peerId, key, value: toBase64(value) }),
    );
  }

  async removeRecord(key: string): Promise<void> {
    this.#assertOpen("removeRecord");
    this.#dropRecord(key, this.peerId);
    this.#broadcast(this.#flooded({ type: "RemoveRecord", source: this.peerId, key }));
  }

  async close(): Promise<void> {
    if (this.#closed) return;
    this.#closed = true;

    for (const id of [...this.#lookups.keys()]) {
      this.#settleLookup(id);
    }
    for (const socket of this.#sockets.keys()) {
      socket.close();
    }
    this.#sockets.clear();
    this.#inbox.close();
  }

  #receive(socket: WebSocket, text: string): void {
    let frame: MeshFrame;
    try {
      frame = decodeJson(Buffer.from(text, "utf8"), FrameSchema, "Mesh frame");
    } catch (error) {
      if (!(error instanceof ProtocolError)) throw error;
      this.#logger?.warn?.("Dropping malformed mesh frame", { error });
      return;
    }

    switch (frame.type) {
      case "Hello":
        this.#sockets.set(socket, frame.peerId);
        this.#logger?.debug?.("Mesh neighbour identified", { peer: frame.peerId });
        return;

      case "GetRecord":
        this.#send(socket, {
          type: "RecordFound",
          id: frame.id,
          key: frame.key,
          values: this.#localValues(frame.key).map(toBase64),
        });
        return;

      case "RecordFound": {
        const lookup = this.#lookups.get(frame.id);
        if (!lookup) return;
        lookup.values.push(...frame.values.map(fromBase64));
        lookup.awaiting.delete(socket);
        if (lookup.awaiting.size === 0) this.#settleLookup(frame.id);
        return;
      }

      case "Publish":
      case "PutRecord":
      case "RemoveRecord":
        this.#receiveFlooded(socket, frame);
        return;
    }
  }

  #receiveFlooded(socket: WebSocket, frame: FloodedFrame): void {
    if (!this.#markSeen(frame.id)) return;

    switch (frame.type) {
      case "Publish":
        if (frame.source !== this.peerId && this.#topics.has(frame.topic)) {
          this.#inbox.send({
            source: frame.source,
            topic: frame.topic,
            data: fromBase64(frame.data),
          });
        }
        break;
      case "PutRecord":
        this.#storeRecord(frame.key, frame.source, fromBase64(frame.value));
        break;
      case "RemoveRecord":
        this.#dropRecord(frame.key, frame.source);
        break;
    }

    this.#broadcast(frame, socket);
  }

  #flooded<F extends Omit<FloodedFrame, "id">>(
    frame: F,
  ): F & { readonly id: string } {
    const id = randomUUID();
    this.#markSeen(id);
    return { ...frame, id };
  }

  #markSeen(id: string): boolean {
    if (this.#seen.has(id)) return false;
    this.#seen.add(id);
    if (this.#seen.size > this.#maxSeenIds) {
      const [oldest] = this.#seen;
      if (oldest !== undefined) this.#seen.delete(oldest);
    }
    return true;
  }

  #broadcast(frame: MeshFrame, except?: WebSocket): void {
    for (const socket of this.#sockets.keys()) {
      if (socket !== except) this.#send(socket, frame);
    }
  }

  #send(socket: WebSocket, frame: MeshFrame): void {
    if (socket.readyState !== WebSocket.OPEN) return;
    try {
      socket.send(JSON.stringify(frame));
    } catch (error) {
      this.#logger?.warn?.("Failed to deliver mesh frame", {
        peer: this.#sockets.get(socket),
        type: frame.type,
        error,
      });
    }
  }

  #localValues(key: string): Uint8Array[] {
    return [...(this.#records.get(key)?.values() ?? [])].map((value) => value.slice());
  }

  #storeRecord(key: string, source: PeerId, value: Uint8Array): void {
    let publishers = this.#records.get(key);
    if (!publishers) {
      publishers = new Map<PeerId, Uint8Array>();
      this.#records.set(key, publishers);
    }
    publishers.set(source, value);
  }

  #dropRecord(key: string, source: PeerId): void {
    const publishers = this.#records.get(key);
    publishers?.delete(source);
    if (publishers?.size === 0) this.#records.delete(key);
  }

  #settleLookup(id: string): void {
    const lookup = this.#lookups.get(id);
    if (!lookup) return;
    clearTimeout(lookup.timer);
    this.#lookups.delete(id);
    lookup.resolve(lookup.values);
  }

  #assertOpen(operation: string): void {
    if (this.#closed) {
      throw new TransportClosedError(operation);
    }
  }
}

function fromBase64(value: string): Uint8Array {
  return new Uint8Array(Buffer.from(value, "base64"));
}

function rawToText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}
