import { z } from "zod";

import { decodeJson, encodeJson, singleChar } from "./wire.js";

/** Race-level payload carried inside a `Push` session command */
export type RaceMessage =
  | { readonly type: "Input"; readonly char: string }
  | { readonly type: "Forfeit" };

const RaceMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("Input"), char: singleChar }),
  z.object({ type: z.literal("Forfeit") }),
]);

export function encodeRaceMessage(message: RaceMessage): Uint8Array {
  return encodeJson(message);
}

export function decodeRaceMessage(bytes: Uint8Array): RaceMessage {
  return decodeJson(bytes, RaceMessageSchema, "Race message");
}
