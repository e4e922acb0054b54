/**
 * Platform implementations
 */

export {
  GitHubTokenExchanger,
  GitHubRunnerTokenRequester,
  DEFAULT_API_BASE_URL,
  permissionsFor,
} from "./github.js";
export type { GitHubClientOptions } from "./github.js";
export { StubPlatform } from "./stub.js";
export type { StubPlatformConfig, StubFailure, StubOperation, RedemptionResult } from "./stub.js";
export { clampExpiry, scopeCovers, formatScope, JIT_TOKEN_TTL_MS } from "./checks.js";
