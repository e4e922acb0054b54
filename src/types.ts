/**
 * Core types for the runner credential pipeline
 *
 * Every credential in the chain carries an absolute expiry. A credential
 * never outlives the one that produced it.
 */

// ============================================================================
// Identity & Assertions
// ============================================================================

/** GitHub App identity used to sign assertions */
export interface Identity {
  /** Path to the App's PEM private key */
  readonly privateKeyPath: string;
  /** App ID (JWT `iss`) */
  readonly issuer: string;
  /** Optional audience (JWT `aud`) */
  readonly audience?: string;
}

/** Claims carried by a signed assertion (seconds since epoch) */
export interface AssertionClaims {
  iss: string;
  aud?: string;
  iat: number;
  exp: number;
  /** Random nonce, unique per assertion */
  jti: string;
}

export type AssertionAlgorithm = "RS256" | "ES256";

/** A compact JWT plus its decoded parts */
export interface SignedAssertion {
  /** `header.payload.signature` */
  encoded: string;
  payload: AssertionClaims;
  signature: string;
  algorithm: AssertionAlgorithm;
}

// ============================================================================
// Scopes
// ============================================================================

/** Where a runner registers */
export type TargetScope =
  | { kind: "organization"; org: string }
  | { kind: "repository"; owner: string; repo: string };

/** The installation an access token is requested for */
export interface InstallationScope {
  installationId: number;
  target: TargetScope;
}

// ============================================================================
// Credentials
// ============================================================================

/** Installation access token */
export interface ScopedAccessCredential {
  /** Opaque bearer value */
  token: string;
  expiresAt: Date;
  scope: InstallationScope;
  /** Permissions granted by the platform */
  permissions: Record<string, string>;
}

/** Runner to register */
export interface RunnerSpec {
  /** Unique per fleet */
  name: string;
  /** Ordered, de-duplicated */
  labels: string[];
  scope: TargetScope;
  runnerGroupId: number;
  workFolder?: string;
}

/** One-time JIT registration configuration */
export interface RunnerRegistrationToken {
  /** Encoded JIT config, opaque */
  value: string;
  expiresAt: Date;
  runnerName: string;
  labels: string[];
  runnerId?: number;
  scope: TargetScope;
}

// ============================================================================
// Capability interfaces
// ============================================================================

export interface Signer {
  sign(identity: Identity, ttlSeconds: number, signal?: AbortSignal): Promise<SignedAssertion>;
}

export interface TokenExchanger {
  exchange(
    assertion: SignedAssertion,
    scope: InstallationScope,
    signal?: AbortSignal
  ): Promise<ScopedAccessCredential>;
}

export interface RunnerTokenRequester {
  requestJitToken(
    credential: ScopedAccessCredential,
    spec: RunnerSpec,
    signal?: AbortSignal
  ): Promise<RunnerRegistrationToken>;
}

// ============================================================================
// Delivery
// ============================================================================

export type Destination =
  | { kind: "stdout" }
  | { kind: "file"; path: string; mode?: number }
  | { kind: "exec"; command: string; args: string[] };

// ============================================================================
// Configuration
// ============================================================================

/** Stage profile stored in config.json */
export interface StageProfile {
  /** GitHub App ID */
  appId: string;
  /** Installation ID */
  installationId: number;
  /** Path to the App's PEM private key (can be given per run instead) */
  privateKeyPath?: string;
  /** Target scope, e.g. "org/my-org" or "owner/repo" */
  scope: string;
  /** Runner group (default: 1) */
  runnerGroupId?: number;
  /** REST API base URL (default: https://api.github.com) */
  apiBaseUrl?: string;
}

/** Contents of config.json */
export interface CredentialToolConfig {
  stages: Record<string, StageProfile>;
}

/** Retry settings for platform calls */
export interface RetryPolicy {
  /** Total attempts including the first */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the delay added as random jitter (0..1) */
  jitterRatio: number;
}

/** Everything one pipeline run needs, built once */
export interface PipelineConfig {
  readonly identity: Identity;
  readonly assertionTtlSeconds: number;
  readonly installation: InstallationScope;
  readonly runner: RunnerSpec;
  readonly destination: Destination;
  readonly apiBaseUrl: string;
  readonly requestTimeoutMs: number;
  readonly keyReadTimeoutMs: number;
  readonly retry: RetryPolicy;
}

/** Wall clock in milliseconds since epoch */
export interface Clock {
  now(): number;
}
