import { z, type ZodError } from "zod";

import { ProtocolError } from "../errors/ProtocolError.js";

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export const base64Bytes = z
  .string()
  .regex(BASE64_PATTERN, "must be base64")
  .transform((value) => new Uint8Array(Buffer.from(value, "base64")));

export const singleChar = z
  .string()
  .refine((value) => Array.from(value).length === 1, "must be exactly one character");

export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}

export function encodeJson(value: unknown): Uint8Array {
  return new Uint8Array(Buffer.from(JSON.stringify(value), "utf8"));
}

export function describeIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

/** Parses JSON bytes against `schema`, throwing `ProtocolError` on any mismatch */
export function decodeJson<Schema extends z.ZodTypeAny>(
  bytes: Uint8Array,
  schema: Schema,
  what: string,
): z.output<Schema> {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(bytes).toString("utf8"));
  } catch {
    throw ProtocolError.because([`${what} is not valid JSON`]);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw ProtocolError.because(describeIssues(parsed.error).map((issue) => `${what}: ${issue}`));
  }
  return parsed.data;
}
