import { z } from "zod";

import type { PeerId, Username } from "../typedefs.js";
import { base64Bytes, decodeJson, encodeJson, toBase64 } from "./wire.js";

/** Control messages exchanged on a session topic */
export type SessionCommand =
  | { readonly type: "Register"; readonly user: Username }
  | {
      readonly type: "LockSession";
      readonly registeredUsers: Readonly<Record<PeerId, Username>>;
      /** ISO-8601 instant at which every peer starts racing */
      readonly sessionStart: string;
    }
  | { readonly type: "Push"; readonly payload: Uint8Array }
  | { readonly type: "EndSession" };

const SessionCommandSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("Register"), user: z.string().min(1) }),
  z.object({
    type: z.literal("LockSession"),
    registeredUsers: z.record(z.string().min(1)),
    sessionStart: z.string().datetime({ offset: true }),
  }),
  z.object({ type: z.literal("Push"), payload: base64Bytes }),
  z.object({ type: z.literal("EndSession") }),
]);

export function encodeSessionCommand(command: SessionCommand): Uint8Array {
  if (command.type === "Push") {
    return encodeJson({ type: command.type, payload: toBase64(command.payload) });
  }
  return encodeJson(command);
}

export function decodeSessionCommand(bytes: Uint8Array): SessionCommand {
  return decodeJson(bytes, SessionCommandSchema, "Session command");
}
