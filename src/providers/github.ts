/**
 * GitHub REST implementations of the exchanger and the JIT requester
 *
 * All knowledge of GitHub's request and response shapes lives here.
 */

import { Octokit } from "@octokit/rest";
import { RequestError } from "@octokit/request-error";
import { CredentialError, type ErrorKind, type ErrorStage } from "../errors.js";
import { systemClock } from "../retry.js";
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

export const DEFAULT_API_BASE_URL = "https://api.github.com";

const USER_AGENT = "fpga-runner-credentials";

/** Installation permissions needed to register a runner in a scope */
export function permissionsFor(
  target: TargetScope
): { organization_self_hosted_runners?: "write"; administration?: "write" } {
  return target.kind === "organization"
    ? { organization_self_hosted_runners: "write" }
    : { administration: "write" };
}

function headerValue(headers: Record<string, unknown> | undefined, name: string): string | undefined {
  const value = headers?.[name];
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

/** Wait requested by rate-limit headers, if any */
export function retryAfterFrom(
  headers: Record<string, unknown> | undefined,
  now: number
): number | undefined {
  const retryAfter = headerValue(headers, "retry-after");
  if (retryAfter !== undefined) {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
    const date = Date.parse(retryAfter);
    if (!Number.isNaN(date)) return Math.max(0, date - now);
  }

  if (headerValue(headers, "x-ratelimit-remaining") === "0") {
    const reset = Number(headerValue(headers, "x-ratelimit-reset"));
    if (Number.isFinite(reset)) return Math.max(0, reset * 1000 - now);
  }
  return undefined;
}

export interface StatusMapping {
  statuses: Partial<Record<number, ErrorKind>>;
  /** Kind for any other 4xx */
  clientError: ErrorKind;
}

// RequestError by class, or by the shape Octokit gives it
function isRequestError(error: unknown): error is RequestError {
  if (error instanceof RequestError) return true;
  return (
    error instanceof Error &&
    error.name === "HttpError" &&
    "status" in error &&
    typeof error.status === "number"
  );
}

const EXCHANGE_STATUS: StatusMapping = {
  statuses: {},
  clientError: "AuthenticationRejected",
};

const JIT_STATUS: StatusMapping = {
  statuses: {
    401: "AuthenticationRejected",
    403: "ScopeInsufficient",
    404: "ScopeInsufficient",
    409: "RunnerNameConflict",
  },
  clientError: "InvalidConfiguration",
};

/** Translate an Octokit failure into the error taxonomy */
export function mapRequestError(
  error: unknown,
  stage: ErrorStage,
  mapping: StatusMapping,
  now: number
): CredentialError {
  if (!isRequestError(error)) {
    if (error instanceof Error && error.name === "AbortError") {
      return new CredentialError("Cancelled", "request aborted", { stage, cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new CredentialError("TransportFailure", message, { stage, cause: error });
  }

  const status = error.status;
  const headers = error.response?.headers;
  const retryAfterMs = retryAfterFrom(headers, now);
  const message = responseMessage(error);

  if (status === 429 || (status === 403 && retryAfterMs !== undefined)) {
    return new CredentialError("RateLimited", message, { stage, status, retryAfterMs, cause: error });
  }

  const kind = mapping.statuses[status] ?? (status >= 400 && status < 500 ? mapping.clientError : undefined);
  if (kind) {
    return new CredentialError(kind, message, { stage, status, cause: error });
  }
  return new CredentialError("TransportFailure", message, { stage, status, cause: error });
}

function responseMessage(error: RequestError): string {
  const data = error.response?.data;
  if (typeof data === "object" && data !== null && "message" in data && typeof data.message === "string") {
    return data.message;
  }
  return error.message;
}

export interface GitHubClientOptions {
  baseUrl?: string;
  clock?: Clock;
}

export class GitHubTokenExchanger implements TokenExchanger {
  private baseUrl: string;
  private clock: Clock;

  constructor(options: GitHubClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_API_BASE_URL;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Exchange an App assertion for an installation access token limited to
   * the permission the target scope needs
   */
  async exchange(
    assertion: SignedAssertion,
    scope: InstallationScope,
    signal?: AbortSignal
  ): Promise<ScopedAccessCredential> {
    assertAssertionUsable(assertion, this.clock.now());

    const octokit = new Octokit({
      auth: assertion.encoded,
      baseUrl: this.baseUrl,
      userAgent: USER_AGENT,
    });

    const { data } = await octokit.rest.apps
      .createInstallationAccessToken({
        installation_id: scope.installationId,
        permissions: permissionsFor(scope.target),
        ...(scope.target.kind === "repository" ? { repositories: [scope.target.repo] } : {}),
        request: { signal },
      })
      .catch((error: unknown) => {
        throw mapRequestError(error, "exchange", EXCHANGE_STATUS, this.clock.now());
      });

    const now = this.clock.now();
    const expiresAt = Date.parse(data.expires_at);
    if (!data.token || Number.isNaN(expiresAt) || expiresAt <= now) {
      throw new CredentialError(
        "AuthenticationRejected",
        "platform returned an unusable access token (missing value or expiry not in the future)",
        { stage: "exchange" }
      );
    }

    const permissions: Record<string, string> = {};
    for (const [name, level] of Object.entries(data.permissions ?? {})) {
      if (typeof level === "string") permissions[name] = level;
    }

    return {
      token: data.token,
      expiresAt: clampExpiry(new Date(expiresAt), new Date(assertion.payload.exp * 1000)),
      scope,
      permissions,
    };
  }
}

export class GitHubRunnerTokenRequester implements RunnerTokenRequester {
  private baseUrl: string;
  private clock: Clock;

  constructor(options: GitHubClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_API_BASE_URL;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Generate a JIT runner configuration. Every call allocates a new runner
   * server-side; nothing is cached.
   */
  async requestJitToken(
    credential: ScopedAccessCredential,
    spec: RunnerSpec,
    signal?: AbortSignal
  ): Promise<RunnerRegistrationToken> {
    assertCredentialCovers(credential, spec.scope, this.clock.now());

    const octokit = new Octokit({
      auth: credential.token,
      baseUrl: this.baseUrl,
      userAgent: USER_AGENT,
    });

    const body = {
      name: spec.name,
      runner_group_id: spec.runnerGroupId,
      labels: spec.labels,
      ...(spec.workFolder ? { work_folder: spec.workFolder } : {}),
      request: { signal },
    };

    const request: Promise<{ data: { runner: { id: number }; encoded_jit_config: string } }> =
      spec.scope.kind === "organization"
        ? octokit.rest.actions.generateRunnerJitconfigForOrg({ org: spec.scope.org, ...body })
        : octokit.rest.actions.generateRunnerJitconfigForRepo({
            owner: spec.scope.owner,
            repo: spec.scope.repo,
            ...body,
          });

    const { data } = await request.catch((error: unknown) => {
      const mapped = mapRequestError(error, "jit", JIT_STATUS, this.clock.now());
      if (mapped.kind === "RunnerNameConflict") {
        throw mapped.withMessage(
          `a runner named "${spec.name}" already exists (${mapped.message}); remove the stale runner or choose another name`
        );
      }
      throw mapped;
    });

    if (!data.encoded_jit_config) {
      throw new CredentialError("TransportFailure", "platform returned an empty JIT configuration", {
        stage: "jit",
      });
    }

    return {
      value: data.encoded_jit_config,
      expiresAt: clampExpiry(new Date(this.clock.now() + JIT_TOKEN_TTL_MS), credential.expiresAt),
      runnerName: spec.name,
      labels: [...spec.labels],
      runnerId: data.runner.id,
      scope: spec.scope,
    };
  }
}
