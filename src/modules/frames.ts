import { z } from "zod";

const KeepAliveSchema = z.object({ type: z.enum(["heartbeat", "pong"]) }).passthrough();

const ErrorFrameSchema = z
  .object({
    type: z.literal("error"),
    message: z.unknown().optional(),
    msg: z.unknown().optional()
  })
  .passthrough();

export type DecodedFrame =
  | { kind: "payload"; data: unknown }
  | { kind: "heartbeat" }
  | { kind: "error"; message: string }
  | { kind: "invalid"; error: string };

const CONTROL_CHARS = /[\x00-\x1F]+/g;

function parseJson(text: string): { ok: true; data: unknown } | { ok: false; error: string } {
  try {
    const data: unknown = JSON.parse(text);
    return { ok: true, data };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Decodes one text frame or HTTP body. Vendors occasionally embed raw control
 * characters inside string literals; those are stripped and the parse retried.
 */
export function decodeFrame(text: string): DecodedFrame {
  let parsed = parseJson(text);
  if (!parsed.ok) {
    parsed = parseJson(text.replace(CONTROL_CHARS, ""));
  }
  if (!parsed.ok) return { kind: "invalid", error: parsed.error };

  if (KeepAliveSchema.safeParse(parsed.data).success) return { kind: "heartbeat" };

  const errorFrame = ErrorFrameSchema.safeParse(parsed.data);
  if (errorFrame.success) {
    const { message, msg } = errorFrame.data;
    const detail = typeof message === "string" ? message : typeof msg === "string" ? msg : "unspecified";
    return { kind: "error", message: detail };
  }

  return { kind: "payload", data: parsed.data };
}
