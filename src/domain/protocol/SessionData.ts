import { z } from "zod";

import type { SessionId } from "../typedefs.js";
import { base64Bytes, decodeJson, encodeJson, toBase64 } from "./wire.js";

/** Discovery record a host publishes under its advertised name */
export interface SessionData {
  readonly sessionId: SessionId;
  readonly metadata: Uint8Array;
}

/** Application metadata carried by {@link SessionData} */
export interface SessionMetadata {
  readonly text: string;
  /** Syntax hint for highlighting, such as a file extension */
  readonly syntax?: string;
}

const SessionDataSchema = z.object({
  sessionId: z.string().min(1),
  metadata: base64Bytes,
});

const SessionMetadataSchema = z.object({
  text: z.string(),
  syntax: z.string().optional(),
});

export function encodeSessionData(data: SessionData): Uint8Array {
  return encodeJson({ sessionId: data.sessionId, metadata: toBase64(data.metadata) });
}

export function decodeSessionData(bytes: Uint8Array): SessionData {
  return decodeJson(bytes, SessionDataSchema, "Session data");
}

export function encodeSessionMetadata(metadata: SessionMetadata): Uint8Array {
  return encodeJson(metadata);
}

export function decodeSessionMetadata(bytes: Uint8Array): SessionMetadata {
  return decodeJson(bytes, SessionMetadataSchema, "Session metadata");
}

export function sessionTopic(sessionId: SessionId): string {
  return `keyduel/session/${sessionId}`;
}

export function sessionRecordKey(host: string): string {
  return `keyduel/host/${host}`;
}
