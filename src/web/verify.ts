/**
 * http-interactions — src/web/verify.ts
 * WHAT: Ed25519 request verification for the interactions endpoint.
 * WHY: Discord rejects an endpoint that accepts unsigned or badly signed requests when it is registered.
 * FLOWS: signatureHeaders(req.headers) → verifyRequest(body, headers, publicKey) → ok | { status, error }
 * DOCS:
 *  - Security and authorization: https://discord.com/developers/docs/interactions/overview#setting-up-an-endpoint-validating-security-request-headers
 *  - discord-interactions verifyKey: https://github.com/discord/discord-interactions-js
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { IncomingHttpHeaders } from "node:http";
import { verifyKey } from "discord-interactions";

export type SignatureHeaders = {
  signature?: string;
  timestamp?: string;
};

export type VerifyResult =
  | { ok: true }
  | { ok: false; status: 400 | 401; error: string };

const SIGNATURE_RE = /^[0-9a-fA-F]{128}$/;

function single(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function signatureHeaders(headers: IncomingHttpHeaders): SignatureHeaders {
  return {
    signature: single(headers["x-signature-ed25519"]),
    timestamp: single(headers["x-signature-timestamp"]),
  };
}

/**
 * Checks the signature over `timestamp + body`. The body must be the exact
 * bytes Discord sent: re-serialized JSON won't verify.
 */
export async function verifyRequest(
  body: Buffer,
  headers: SignatureHeaders,
  publicKey: string | null | undefined
): Promise<VerifyResult> {
  if (!publicKey) {
    return { ok: false, status: 401, error: "invalid public key" };
  }

  const { signature, timestamp } = headers;
  if (!signature || !timestamp || !SIGNATURE_RE.test(signature)) {
    return { ok: false, status: 400, error: "invalid request body" };
  }

  let valid: boolean;
  try {
    valid = await verifyKey(body, signature, timestamp, publicKey);
  } catch {
    // malformed key material: not something the caller can fix by re-signing
    return { ok: false, status: 400, error: "invalid request body" };
  }

  if (!valid) {
    return { ok: false, status: 401, error: "invalid request signature" };
  }
  return { ok: true };
}
