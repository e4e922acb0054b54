/**
 * App assertion signing
 *
 * Produces a compact JWT (RS256 for RSA keys, ES256 for P-256 keys) whose
 * claims identify the App. The key file is read per call and never kept.
 */

import * as crypto from "crypto";
import * as fs from "fs";
import { CredentialError } from "./errors.js";
import { runWithDeadline, systemClock } from "./retry.js";
import type {
  AssertionAlgorithm,
  AssertionClaims,
  Clock,
  Identity,
  SignedAssertion,
  Signer,
} from "./types.js";

/** GitHub rejects App JWTs that live longer than 10 minutes */
export const MAX_ASSERTION_TTL_SECONDS = 600;

const DEFAULT_KEY_READ_TIMEOUT_MS = 5_000;

function base64Url(input: Buffer | string): string {
  const buf = Buffer.isBuffer(input) ? input : Buffer.from(input);
  return buf.toString("base64url");
}

function algorithmFor(key: crypto.KeyObject): AssertionAlgorithm {
  if (key.asymmetricKeyType === "rsa") return "RS256";
  if (key.asymmetricKeyType === "ec" && key.asymmetricKeyDetails?.namedCurve === "prime256v1") {
    return "ES256";
  }
  throw new CredentialError(
    "SigningFailure",
    `unsupported key type: ${key.asymmetricKeyType ?? "unknown"}`,
    { stage: "signing" }
  );
}

function signWith(
  algorithm: AssertionAlgorithm,
  key: crypto.KeyObject,
  signingInput: string
): Buffer {
  if (algorithm === "ES256") {
    return crypto.sign("sha256", Buffer.from(signingInput), { key, dsaEncoding: "ieee-p1363" });
  }
  return crypto.sign("sha256", Buffer.from(signingInput), key);
}

export interface KeyFileSignerOptions {
  clock?: Clock;
  keyReadTimeoutMs?: number;
}

export class KeyFileSigner implements Signer {
  private clock: Clock;
  private keyReadTimeoutMs: number;

  constructor(options: KeyFileSignerOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.keyReadTimeoutMs = options.keyReadTimeoutMs ?? DEFAULT_KEY_READ_TIMEOUT_MS;
  }

  /**
   * Sign a fresh assertion for the identity
   *
   * @param ttlSeconds - Lifetime, 1..600 seconds
   */
  async sign(identity: Identity, ttlSeconds: number, signal?: AbortSignal): Promise<SignedAssertion> {
    if (!Number.isInteger(ttlSeconds) || ttlSeconds < 1 || ttlSeconds > MAX_ASSERTION_TTL_SECONDS) {
      throw new CredentialError(
        "InvalidConfiguration",
        `assertion TTL must be between 1 and ${MAX_ASSERTION_TTL_SECONDS} seconds, got ${ttlSeconds}`,
        { stage: "signing" }
      );
    }

    const key = await this.loadKey(identity.privateKeyPath, signal);
    const algorithm = algorithmFor(key);

    const iat = Math.floor(this.clock.now() / 1000);
    const payload: AssertionClaims = {
      iss: identity.issuer,
      ...(identity.audience ? { aud: identity.audience } : {}),
      iat,
      exp: iat + ttlSeconds,
      jti: crypto.randomUUID(),
    };

    const header = { alg: algorithm, typ: "JWT" };
    const signingInput = `${base64Url(JSON.stringify(header))}.${base64Url(JSON.stringify(payload))}`;

    let signature: string;
    try {
      signature = base64Url(signWith(algorithm, key, signingInput));
    } catch (error) {
      throw new CredentialError(
        "SigningFailure",
        `signing failed: ${error instanceof Error ? error.message : String(error)}`,
        { stage: "signing", cause: error }
      );
    }

    return {
      encoded: `${signingInput}.${signature}`,
      payload,
      signature,
      algorithm,
    };
  }

  private async loadKey(keyPath: string, signal?: AbortSignal): Promise<crypto.KeyObject> {
    const pem = await runWithDeadline(this.keyReadTimeoutMs, signal, "signing", async (deadline) => {
      try {
        return await fs.promises.readFile(keyPath, { encoding: "utf-8", signal: deadline });
      } catch (error) {
        if (deadline.aborted) throw error;
        const code = error instanceof Error && "code" in error ? String(error.code) : "unknown";
        throw new CredentialError("KeyUnavailable", `cannot read private key ${keyPath} (${code})`, {
          stage: "signing",
          cause: error,
        });
      }
    });

    try {
      return crypto.createPrivateKey(pem);
    } catch (error) {
      throw new CredentialError(
        "KeyUnavailable",
        `cannot decode private key ${keyPath}: ${error instanceof Error ? error.message : String(error)}`,
        { stage: "signing", cause: error }
      );
    }
  }
}

/** Parse a compact assertion's payload without verifying it */
export function decodeAssertion(encoded: string): AssertionClaims | null {
  const parts = encoded.split(".");
  if (parts.length !== 3) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(parts[1], "base64url").toString("utf-8"));
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null) return null;

  const claims: Record<string, unknown> = { ...parsed };
  const { iss, aud, iat, exp, jti } = claims;
  if (typeof iss !== "string" || typeof jti !== "string") return null;
  if (typeof iat !== "number" || typeof exp !== "number") return null;
  if (aud !== undefined && typeof aud !== "string") return null;

  return { iss, iat, exp, jti, ...(aud !== undefined ? { aud } : {}) };
}

/** Verify an assertion's signature against a public key */
export function verifyAssertion(encoded: string, publicKey: crypto.KeyObject): boolean {
  const parts = encoded.split(".");
  if (parts.length !== 3) return false;
  const signingInput = `${parts[0]}.${parts[1]}`;
  const signature = Buffer.from(parts[2], "base64url");
  const options =
    publicKey.asymmetricKeyType === "ec"
      ? { key: publicKey, dsaEncoding: "ieee-p1363" as const }
      : publicKey;
  try {
    return crypto.verify("sha256", Buffer.from(signingInput), options, signature);
  } catch {
    return false;
  }
}
