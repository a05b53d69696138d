/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { TransportClosedError } from "../../domain/errors/TransportClosedError.js";
import { Channel } from "../../domain/events/Channel.js";
import type { NetworkMessage, NetworkService } from "../../domain/ports/NetworkService.js";
import type { PeerId, Topic } from "../../domain/typedefs.js";

/**
 * In-process stand-in for the peer-to-peer network: a hub every peer
 * connects to, delivering publishes synchronously to subscribed peers and
 * holding one record value per key and publisher.
 */
export class InMemoryNetwork {
  #peers = new Map<PeerId, InMemoryPeer>();
  #records = new Map<string, Map<PeerId, Uint8Array>>();

  connect(peerId: PeerId): InMemoryPeer {
    if (this.#peers.has(peerId)) {
      throw new Error(`Peer ${peerId} is already connected`);
    }
    const peer = new InMemoryPeer(peerId, this);
    this.#peers.set(peerId, peer);
    return peer;
  }

  get peers(): PeerId[] {
    return [...this.#peers.keys()];
  }

  /** @internal */
  deliver(message: NetworkMessage): void {
    for (const [peerId, peer] of this.#peers) {
      if (peerId !== message.source) {
        peer.receive(message);
      }
    }
  }

  /** @internal */
  detach(peerId: PeerId): void {
    this.#peers.delete(peerId);
  }

  /** @internal */
  records(key: string): Uint8Array[] {
    return [...(this.#records.get(key)?.values() ?? [])].map((value) => value.slice());
  }

  /** @internal */
  storeRecord(key: string, publisher: PeerId, value: Uint8Array): void {
    let values = this.#records.get(key);
    if (!values) {
      values = new Map<PeerId, Uint8Array>();
      this.#records.set(key, values);
    }
    values.set(publisher, value.slice());
  }

  /** @internal */
  dropRecord(key: string, publisher: PeerId): void {
    const values = this.#records.get(key);
    values?.delete(publisher);
    if (values?.size === 0) {
      this.#records.delete(key);
    }
  }
}

export class InMemoryPeer implements NetworkService {
  readonly #hub: InMemoryNetwork;
  readonly #inbox = new Channel<NetworkMessage>();
  #topics = new Set<Topic>();
  #closed = false;

  /** Every message this peer published, in order */
  readonly published: NetworkMessage[] = [];

  constructor(
    readonly peerId: PeerId,
    hub: InMemoryNetwork,
  ) {
    this.#hub = hub;
  }

  get topics(): Topic[] {
    return [...this.#topics];
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
    const message: NetworkMessage = { source: this.peerId, topic, data: data.slice() };
    this.published.push(message);
    this.#hub.deliver(message);
  }

  async getRecord(key: string): Promise<Uint8Array[]> {
    this.#assertOpen("getRecord");
    return this.#hub.records(key);
  }

  async putRecord(key: string, value: Uint8Array): Promise<void> {
    this.#assertOpen("putRecord");
    this.#hub.storeRecord(key, this.peerId, value);
  }

  async removeRecord(key: string): Promise<void> {
    this.#assertOpen("removeRecord");
    this.#hub.dropRecord(key, this.peerId);
  }

  async close(): Promise<void> {
    if (this.#closed) return;
    this.#closed = true;
    this.#hub.detach(this.peerId);
    this.#inbox.close();
  }

  /** Simulates the transport going away underneath the peer */
  disconnect(): void {
    if (this.#closed) return;
    this.#closed = true;
    this.#hub.detach(this.peerId);
    this.#inbox.fail(new TransportClosedError("receive"));
  }

  /** @internal */
  receive(message: NetworkMessage): void {
    if (this.#topics.has(message.topic)) {
      this.#inbox.send(message);
    }
  }

  #assertOpen(operation: string): void {
    if (this.#closed) {
      throw new TransportClosedError(operation);
    }
  }
}
