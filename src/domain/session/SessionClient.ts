import { SessionNotFoundError } from "../errors/SessionNotFoundError.js";
import { SessionNotJoinedError } from "../errors/SessionNotJoinedError.js";
import { ProtocolError } from "../errors/ProtocolError.js";
import type { Logger } from "../ports/Logger.js";
import type { NetworkMessage, NetworkService } from "../ports/NetworkService.js";
import {
  decodeSessionCommand,
  encodeSessionCommand,
  type SessionCommand,
} from "../protocol/SessionCommand.js";
import {
  decodeSessionData,
  encodeSessionData,
  sessionRecordKey,
  sessionTopic,
  type SessionData,
} from "../protocol/SessionData.js";
import type { PeerId, SessionId, Topic } from "../typedefs.js";

/** A session command together with the peer that published it */
export interface InboundCommand {
  readonly source: PeerId;
  readonly command: SessionCommand;
}

/**
 * Session-level view over the network service: discovery records, the
 * session topic and command encoding.
 */
export class SessionClient {
  readonly #network: NetworkService;
  readonly #logger: Logger | undefined;
  #sessionId: SessionId | undefined;

  constructor(network: NetworkService, logger?: Logger) {
    this.#network = network;
    this.#logger = logger;
  }

  get peerId(): PeerId {
    return this.#network.peerId;
  }

  get sessionId(): SessionId | undefined {
    return this.#sessionId;
  }

  get topic(): Topic | undefined {
    return this.#sessionId === undefined ? undefined : sessionTopic(this.#sessionId);
  }

  messages(): AsyncIterable<NetworkMessage> {
    return this.#network.messages();
  }

  async hostSession(host: string, data: SessionData): Promise<void> {
    await this.joinSession(data.sessionId);
    await this.#network.putRecord(sessionRecordKey(host), encodeSessionData(data));
    this.#logger?.info?.("Hosting session", { host, sessionId: data.sessionId });
  }

  async getHostedSessionData(host: string): Promise<SessionData> {
    const records = await this.#network.getRecord(sessionRecordKey(host));
    if (records.length === 0) {
      throw new SessionNotFoundError(host);
    }

    const issues: string[] = [];
    for (const bytes of records) {
      try {
        return decodeSessionData(bytes);
      } catch (error) {
        if (!(error instanceof ProtocolError)) throw error;
        issues.push(...error.issues);
      }
    }
    throw new SessionNotFoundError(host, issues.join("; "));
  }

  async stopHostingSession(host: string): Promise<void> {
    await this.leaveSession();
    await this.#network.removeRecord(sessionRecordKey(host));
    this.#logger?.info?.("Stopped hosting session", { host });
  }

  async joinSession(sessionId: SessionId): Promise<void> {
    if (this.#sessionId !== undefined && this.#sessionId !== sessionId) {
      await this.leaveSession();
    }
    await this.#network.subscribe(sessionTopic(sessionId));
    this.#sessionId = sessionId;
  }

  async leaveSession(): Promise<void> {
    const sessionId = this.#sessionId;
    if (sessionId === undefined) return;

    this.#sessionId = undefined;
    await this.#network.unsubscribe(sessionTopic(sessionId));
  }

  async publish(command: SessionCommand): Promise<void> {
    const topic = this.topic;
    if (topic === undefined) {
      throw new SessionNotJoinedError();
    }
    await this.#network.publish(topic, encodeSessionCommand(command));
  }

  /**
   * Decodes a message of the current session. Resolves `undefined` for other
   * topics; throws `ProtocolError` for undecodable payloads.
   */
  decode(message: NetworkMessage): InboundCommand | undefined {
    if (message.topic !== this.topic) return undefined;
    return { source: message.source, command: decodeSessionCommand(message.data) };
  }
}
