// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { createPublicKey, generateKeyPairSync, KeyObject, randomUUID, sign, verify } from "node:crypto";
import { sha256Hex } from "../common/crypto-utils.js";
import type { Identity } from "../common/types.js";

export interface IdentityKeys {
  identity: Identity;
  /** base64 of the DER-encoded SPKI ed25519 public key. */
  publicKey: string;
  privateKeyPem: string;
}

export interface SignRequestParams {
  method: string;
  path: string;
  bodyHash: string;
  privateKeyPem: string;
  publicKey: string;
  timestampMs?: number;
  nonce?: string;
}

export interface SignedHeaders {
  "x-identity-key": string;
  "x-timestamp-ms": string;
  "x-nonce": string;
  "x-body-sha256": string;
  "x-signature": string;
}

export interface VerifyParams {
  method: string;
  path: string;
  headers: SignedHeaders;
  maxSkewMs: number;
  nowMs?: number;
}

export interface VerifyResult {
  valid: boolean;
  identity?: Identity;
  nonce?: string;
  timestampMs?: number;
  reason?: "missing_headers" | "timestamp_skew" | "invalid_key" | "invalid_signature";
}

/** Self-certifying identity: the key fingerprint is the address. */
export function identityFromPublicKey(publicKey: string): Identity {
  return `id:${sha256Hex(Buffer.from(publicKey, "base64")).slice(0, 40)}`;
}

export function createIdentityKeys(): IdentityKeys {
  const keys = generateKeyPairSync("ed25519");
  const publicKey = keys.publicKey.export({ type: "spki", format: "der" }).toString("base64");
  const privateKeyPem = keys.privateKey.export({ type: "pkcs8", format: "pem" }).toString();
  return { identity: identityFromPublicKey(publicKey), publicKey, privateKeyPem };
}

/** Hash of the JSON text a client sends for `body`; absent bodies hash as "". */
export function hashBody(body: unknown): string {
  return hashRawBody(body === undefined ? undefined : JSON.stringify(body));
}

/** Servers hash the bytes exactly as received, so any JSON formatting verifies. */
export function hashRawBody(raw: string | undefined): string {
  return sha256Hex(raw ?? "");
}

function canonicalize(
  timestampMs: string,
  nonce: string,
  method: string,
  path: string,
  bodyHash: string
): string {
  return `${timestampMs}\n${nonce}\n${method.toUpperCase()}\n${path}\n${bodyHash}`;
}

export function signRequest(params: SignRequestParams): SignedHeaders {
  const timestampMs = String(params.timestampMs ?? Date.now());
  const nonce = params.nonce ?? randomUUID();
  const payload = canonicalize(timestampMs, nonce, params.method, params.path, params.bodyHash);
  const signature = sign(null, Buffer.from(payload, "utf8"), params.privateKeyPem).toString("base64");

  return {
    "x-identity-key": params.publicKey,
    "x-timestamp-ms": timestampMs,
    "x-nonce": nonce,
    "x-body-sha256": params.bodyHash,
    "x-signature": signature
  };
}

export function verifySignedRequest(params: VerifyParams): VerifyResult {
  const { method, path, headers, maxSkewMs } = params;
  const timestampMs = headers["x-timestamp-ms"];
  const nonce = headers["x-nonce"];
  const bodyHash = headers["x-body-sha256"];
  const signature = headers["x-signature"];
  const publicKey = headers["x-identity-key"];

  if (!timestampMs || !nonce || !bodyHash || !signature || !publicKey) {
    return { valid: false, reason: "missing_headers" };
  }

  const skew = Math.abs((params.nowMs ?? Date.now()) - Number(timestampMs));
  if (!Number.isFinite(skew) || skew > maxSkewMs) {
    return { valid: false, reason: "timestamp_skew" };
  }

  let key: KeyObject;
  try {
    key = createPublicKey({ key: Buffer.from(publicKey, "base64"), format: "der", type: "spki" });
  } catch {
    return { valid: false, reason: "invalid_key" };
  }

  const payload = canonicalize(timestampMs, nonce, method, path, bodyHash);
  let ok = false;
  try {
    ok = verify(null, Buffer.from(payload, "utf8"), key, Buffer.from(signature, "base64"));
  } catch {
    ok = false;
  }
  if (!ok) {
    return { valid: false, reason: "invalid_signature" };
  }

  return { valid: true, identity: identityFromPublicKey(publicKey), nonce, timestampMs: Number(timestampMs) };
}
