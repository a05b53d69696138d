import type { PeerId, Topic } from "../typedefs.js";

export interface NetworkMessage {
  /** Peer that published the message */
  readonly source: PeerId;
  readonly topic: Topic;
  readonly data: Uint8Array;
}

/**
 * Opaque publish/subscribe and key/value record service the session layer
 * runs on.
 *
 * Every operation rejects with `TransportClosedError` once the underlying
 * channel is gone. Messages a peer publishes are not delivered back to it.
 */
export interface NetworkService {
  readonly peerId: PeerId;

  /** Inbound messages for every subscribed topic; meant for one consumer */
  messages(): AsyncIterable<NetworkMessage>;

  /** Resolves `false` when already subscribed */
  subscribe(topic: Topic): Promise<boolean>;
  /** Resolves `false` when not subscribed */
  unsubscribe(topic: Topic): Promise<boolean>;
  publish(topic: Topic, data: Uint8Array): Promise<void>;

  getRecord(key: string): Promise<Uint8Array[]>;
  putRecord(key: string, value: Uint8Array): Promise<void>;
  removeRecord(key: string): Promise<void>;

  close(): Promise<void>;
}
