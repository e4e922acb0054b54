/**
 * In-memory platform for tests and offline runs
 *
 * Plays both platform endpoints: accepts any well-formed, unexpired,
 * never-seen assertion (optionally checking its signature), tracks issued
 * access tokens and JIT configurations, and models single-use redemption.
 */

import * as crypto from "crypto";
import { CredentialError } from "../errors.js";
import { systemClock } from "../retry.js";
import { decodeAssertion, verifyAssertion } from "../signer.js";
import {
  assertAssertionUsable,
  assertCredentialCovers,
  clampExpiry,
  JIT_TOKEN_TTL_MS,
} from "./checks.js";
import type {
  Clock,
  InstallationScope,
  RunnerRegistrationToken,
  RunnerSpec,
  RunnerTokenRequester,
  ScopedAccessCredential,
  SignedAssertion,
  TargetScope,
  TokenExchanger,
} from "../types.js";

export type StubOperation = "exchange" | "jit";

/** Scripted outcome for the next call to an operation */
export type StubFailure = CredentialError | "hang";

/** Outcome of a runner presenting its JIT configuration */
export type RedemptionResult =
  | { status: "registered"; runnerName: string; runnerId: number }
  | { status: "consumed" }
  | { status: "expired" }
  | { status: "unknown" };

export interface StubPlatformConfig {
  clock?: Clock;
  /** When set, assertion signatures are verified against this key */
  publicKey?: crypto.KeyObject;
  /** Required assertion audience (default: any, or none) */
  audience?: string;
  /** Accepted App IDs (default: any) */
  appIds?: string[];
  /** Installation ID -> the account it is installed on (default: any) */
  installations?: Map<number, TargetScope>;
  /** Lifetime of issued access tokens (default: 1 hour) */
  accessTokenTtlMs?: number;
}

interface IssuedAccessToken {
  expiresAt: Date;
  scope: InstallationScope;
}

interface IssuedJitConfig {
  runnerName: string;
  runnerId: number;
  expiresAt: Date;
  consumed: boolean;
}

function opaque(prefix: string): string {
  return `${prefix}_${crypto.randomBytes(24).toString("base64url")}`;
}

export class StubPlatform implements TokenExchanger, RunnerTokenRequester {
  private clock: Clock;
  private config: StubPlatformConfig;
  private seenNonces: Set<string> = new Set();
  private accessTokens: Map<string, IssuedAccessToken> = new Map();
  private jitConfigs: Map<string, IssuedJitConfig> = new Map();
  private activeRunners: Set<string> = new Set();
  private failures: Record<StubOperation, StubFailure[]> = { exchange: [], jit: [] };
  private nextRunnerId = 1;

  /** Calls received per operation, including failed ones */
  readonly calls: Record<StubOperation, number> = { exchange: 0, jit: 0 };

  constructor(config: StubPlatformConfig = {}) {
    this.config = config;
    this.clock = config.clock ?? systemClock;
  }

  // ─────────────────────────────────────────────────────────────────
  // SCRIPTING
  // ─────────────────────────────────────────────────────────────────

  /** Make the next call to `operation` fail (calls queue in order) */
  failNext(operation: StubOperation, failure: StubFailure, times: number = 1): void {
    for (let i = 0; i < times; i++) {
      this.failures[operation].push(failure);
    }
  }

  /** Register a runner as online, so its name conflicts */
  markRunnerActive(name: string): void {
    this.activeRunners.add(name.toLowerCase());
  }

  isRunnerActive(name: string): boolean {
    return this.activeRunners.has(name.toLowerCase());
  }

  // ─────────────────────────────────────────────────────────────────
  // ENDPOINTS
  // ─────────────────────────────────────────────────────────────────

  async exchange(
    assertion: SignedAssertion,
    scope: InstallationScope,
    signal?: AbortSignal
  ): Promise<ScopedAccessCredential> {
    this.calls.exchange++;
    await this.scripted("exchange", signal);

    const now = this.clock.now();
    const claims = decodeAssertion(assertion.encoded);
    if (!claims) {
      throw new CredentialError("AuthenticationRejected", "malformed assertion", {
        stage: "exchange",
        status: 401,
      });
    }
    assertAssertionUsable({ ...assertion, payload: claims }, now);

    if (this.config.publicKey && !verifyAssertion(assertion.encoded, this.config.publicKey)) {
      throw new CredentialError("AuthenticationRejected", "assertion signature does not verify", {
        stage: "exchange",
        status: 401,
      });
    }
    if (this.config.audience !== undefined && claims.aud !== this.config.audience) {
      throw new CredentialError("AuthenticationRejected", `assertion audience is not ${this.config.audience}`, {
        stage: "exchange",
        status: 401,
      });
    }
    if (this.config.appIds && !this.config.appIds.includes(claims.iss)) {
      throw new CredentialError("AuthenticationRejected", `unknown App ${claims.iss}`, {
        stage: "exchange",
        status: 401,
      });
    }
    if (this.seenNonces.has(claims.jti)) {
      throw new CredentialError("AuthenticationRejected", "assertion has already been used", {
        stage: "exchange",
        status: 401,
      });
    }
    this.seenNonces.add(claims.jti);

    let target = scope.target;
    if (this.config.installations) {
      const installed = this.config.installations.get(scope.installationId);
      if (!installed) {
        throw new CredentialError(
          "AuthenticationRejected",
          `installation ${scope.installationId} not found`,
          { stage: "exchange", status: 404 }
        );
      }
      target = installed;
    }

    const token = opaque("ghs");
    const ttl = this.config.accessTokenTtlMs ?? 60 * 60 * 1000;
    const expiresAt = clampExpiry(new Date(now + ttl), new Date(claims.exp * 1000));
    const granted: InstallationScope = { installationId: scope.installationId, target };
    this.accessTokens.set(token, { expiresAt, scope: granted });

    return {
      token,
      expiresAt,
      scope: granted,
      permissions:
        target.kind === "organization"
          ? { organization_self_hosted_runners: "write" }
          : { administration: "write" },
    };
  }

  async requestJitToken(
    credential: ScopedAccessCredential,
    spec: RunnerSpec,
    signal?: AbortSignal
  ): Promise<RunnerRegistrationToken> {
    this.calls.jit++;
    await this.scripted("jit", signal);

    const now = this.clock.now();
    const issued = this.accessTokens.get(credential.token);
    if (!issued) {
      throw new CredentialError("AuthenticationRejected", "bad credentials", {
        stage: "jit",
        status: 401,
      });
    }
    // trust the platform's record, not the caller's copy
    assertCredentialCovers({ ...credential, ...issued }, spec.scope, now);

    if (this.isRunnerActive(spec.name)) {
      throw new CredentialError(
        "RunnerNameConflict",
        `a runner named "${spec.name}" already exists; remove the stale runner or choose another name`,
        { stage: "jit", status: 409 }
      );
    }

    const value = opaque("jit");
    const runnerId = this.nextRunnerId++;
    const expiresAt = clampExpiry(new Date(now + JIT_TOKEN_TTL_MS), issued.expiresAt);
    this.jitConfigs.set(value, { runnerName: spec.name, runnerId, expiresAt, consumed: false });

    return {
      value,
      expiresAt,
      runnerName: spec.name,
      labels: [...spec.labels],
      runnerId,
      scope: spec.scope,
    };
  }

  /** A runner starting with its JIT configuration */
  redeem(value: string): RedemptionResult {
    const config = this.jitConfigs.get(value);
    if (!config) return { status: "unknown" };
    if (config.consumed) return { status: "consumed" };
    if (config.expiresAt.getTime() <= this.clock.now()) return { status: "expired" };

    config.consumed = true;
    this.markRunnerActive(config.runnerName);
    return { status: "registered", runnerName: config.runnerName, runnerId: config.runnerId };
  }

  private async scripted(operation: StubOperation, signal?: AbortSignal): Promise<void> {
    const failure = this.failures[operation].shift();
    if (failure === undefined) return;
    if (failure !== "hang") throw failure;

    await new Promise<never>((_, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }
      signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
    });
  }
}
