import { vi, type Mock } from "vitest";

import type { CommandContext } from "../../src/domain/commands/Command.js";
import { Channel } from "../../src/domain/events/Channel.js";
import type { Logger } from "../../src/domain/ports/Logger.js";
import type { NetworkMessage, NetworkService } from "../../src/domain/ports/NetworkService.js";
import type { Renderer } from "../../src/domain/ports/Renderer.js";
import { SessionClient } from "../../src/domain/session/SessionClient.js";
import type { PeerId } from "../../src/domain/typedefs.js";

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type Fn<T extends (...args: any[]) => unknown> = Mock<T>;

// eslint-disable-next-line @typescript-eslint/no-explicit-any
function createMock<T extends (...args: any[]) => unknown>(): Fn<T> {
  return vi.fn<T>();
}

export interface NetworkServiceMock extends NetworkService {
  /** Backs `messages()`; send into it to simulate inbound traffic */
  readonly inbox: Channel<NetworkMessage>;
  readonly subscribe: Fn<NetworkService["subscribe"]>;
  readonly unsubscribe: Fn<NetworkService["unsubscribe"]>;
  readonly publish: Fn<NetworkService["publish"]>;
  readonly getRecord: Fn<NetworkService["getRecord"]>;
  readonly putRecord: Fn<NetworkService["putRecord"]>;
  readonly removeRecord: Fn<NetworkService["removeRecord"]>;
  readonly close: Fn<NetworkService["close"]>;
}

export function createNetworkServiceMock(peerId: PeerId = "peer-local"): NetworkServiceMock {
  const inbox = new Channel<NetworkMessage>();
  const mock = {
    peerId,
    inbox,
    messages: (): AsyncIterable<NetworkMessage> => inbox,
    subscribe: createMock<NetworkService["subscribe"]>().mockResolvedValue(true),
    unsubscribe: createMock<NetworkService["unsubscribe"]>().mockResolvedValue(true),
    publish: createMock<NetworkService["publish"]>().mockResolvedValue(undefined),
    getRecord: createMock<NetworkService["getRecord"]>().mockResolvedValue([]),
    putRecord: createMock<NetworkService["putRecord"]>().mockResolvedValue(undefined),
    removeRecord: createMock<NetworkService["removeRecord"]>().mockResolvedValue(undefined),
    close: createMock<NetworkService["close"]>().mockResolvedValue(undefined),
  } satisfies NetworkServiceMock;

  return mock;
}

export function createLoggerMock(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  } satisfies Logger;
}

export interface RendererMock extends Renderer {
  readonly enter: Fn<Renderer["enter"]>;
  readonly draw: Fn<Renderer["draw"]>;
  readonly leave: Fn<Renderer["leave"]>;
}

export function createRendererMock(): RendererMock {
  return {
    enter: createMock<Renderer["enter"]>(),
    draw: createMock<Renderer["draw"]>(),
    leave: createMock<Renderer["leave"]>(),
  };
}

export interface CommandContextOverrides {
  readonly network?: NetworkServiceMock;
  readonly logger?: Logger;
}

export interface CommandContextMock extends CommandContext {
  readonly network: NetworkServiceMock;
  readonly logger: Logger;
}

export function createCommandContext(
  overrides: CommandContextOverrides = {},
): CommandContextMock {
  const network = overrides.network ?? createNetworkServiceMock();
  const logger = overrides.logger ?? createLoggerMock();

  return {
    network,
    logger,
    sessions: new SessionClient(network, logger),
  } satisfies CommandContextMock;
}

export function decodeText(bytes: Uint8Array): string {
  return new TextDecoder().decode(bytes);
}
