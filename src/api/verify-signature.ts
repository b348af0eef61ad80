import crypto from "node:crypto";
import type { SignatureError } from "../types/contracts.js";

export const DEFAULT_SIGNATURE_HEADER = "x-helpdesk-signature";

export function computeSignature(rawBody: Buffer, secret: string): string {
  return crypto.createHmac("sha256", secret).update(rawBody).digest("hex");
}

/**
 * Checks the helpdesk HMAC-SHA256 signature against the raw request bytes.
 * Accepts a bare hex digest or one prefixed with "sha256=".
 */
export function verifyHelpdeskSignature(
  rawBody: Buffer,
  claimed: string | undefined,
  secret: string
): { ok: true } | { ok: false; error: SignatureError } {
  let sig = (claimed || "").trim();
  if (!sig) return { ok: false, error: { kind: "unauthenticated" } };
  if (sig.startsWith("sha256=")) sig = sig.slice("sha256=".length);

  const a = Buffer.from(computeSignature(rawBody, secret));
  const b = Buffer.from(sig);
  if (a.length !== b.length) return { ok: false, error: { kind: "forbidden" } };

  return crypto.timingSafeEqual(a, b) ? { ok: true } : { ok: false, error: { kind: "forbidden" } };
}
