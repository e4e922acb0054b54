/**
 * Checks shared by every exchanger and requester implementation
 */

import { CredentialError } from "../errors.js";
import type { ScopedAccessCredential, SignedAssertion, TargetScope } from "../types.js";

/** Upper bound on a JIT configuration's lifetime */
export const JIT_TOKEN_TTL_MS = 60 * 60 * 1000;

/** A credential may never outlive the one it was derived from */
export function clampExpiry(expiresAt: Date, parentExpiresAt: Date): Date {
  return expiresAt.getTime() > parentExpiresAt.getTime() ? new Date(parentExpiresAt) : expiresAt;
}

export function formatScope(scope: TargetScope): string {
  return scope.kind === "organization" ? `org/${scope.org}` : `repo/${scope.owner}/${scope.repo}`;
}

/** True if a credential for `granted` may act on `requested` */
export function scopeCovers(granted: TargetScope, requested: TargetScope): boolean {
  // names are case-insensitive on the platform
  if (granted.kind === "organization") {
    return requested.kind === "organization" && requested.org.toLowerCase() === granted.org.toLowerCase();
  }
  return (
    requested.kind === "repository" &&
    requested.owner.toLowerCase() === granted.owner.toLowerCase() &&
    requested.repo.toLowerCase() === granted.repo.toLowerCase()
  );
}

export function assertAssertionUsable(assertion: SignedAssertion, now: number): void {
  if (assertion.payload.exp * 1000 <= now) {
    throw new CredentialError("AuthenticationRejected", "assertion has expired", { stage: "exchange" });
  }
}

export function assertCredentialCovers(
  credential: ScopedAccessCredential,
  requested: TargetScope,
  now: number
): void {
  if (credential.expiresAt.getTime() <= now) {
    throw new CredentialError("AuthenticationRejected", "access token has expired", { stage: "jit" });
  }
  if (!scopeCovers(credential.scope.target, requested)) {
    throw new CredentialError(
      "ScopeInsufficient",
      `access token for ${formatScope(credential.scope.target)} cannot register runners in ${formatScope(requested)}`,
      { stage: "jit" }
    );
  }
}
