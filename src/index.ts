/**
 * FPGA runner credentials
 *
 * Mints single-use GitHub Actions JIT runner configurations:
 * - Signs a short-lived App assertion from a private key file
 * - Exchanges it for an installation token scoped to one account
 * - Requests a JIT configuration for a named, labelled runner
 * - Delivers it to stdout, a file, or a runner process
 */

export { RegistrationPipeline, PipelineState } from "./pipeline.js";
export type {
  PipelineResult,
  PipelineDependencies,
  TokenDelivery,
  Transition,
} from "./pipeline.js";

export { KeyFileSigner, decodeAssertion, verifyAssertion, MAX_ASSERTION_TTL_SECONDS } from "./signer.js";

export { CredentialDelivery, DEFAULT_FILE_MODE, JIT_CONFIG_ARG } from "./delivery.js";
export type { DeliveryReceipt, FileOps } from "./delivery.js";

export {
  ConfigService,
  resolvePipelineConfig,
  parseScope,
  parseDestination,
  validateRunnerSpec,
  normalizeLabels,
} from "./config.js";
export type { TokenOptions } from "./config.js";

export { FPGA_TARGETS, parseFpgaTarget, labelsFor, runnerName } from "./fpga.js";
export type { FpgaTarget } from "./fpga.js";

export {
  withRetry,
  backoffDelay,
  createDeadline,
  runWithDeadline,
  systemClock,
  systemSleep,
  DEFAULT_RETRY_POLICY,
} from "./retry.js";
export type { Sleeper, RetryEvent } from "./retry.js";

export {
  CredentialError,
  EXIT_CODES,
  isRetryable,
  isRetryableBySupervisor,
  redactSecrets,
} from "./errors.js";
export type { ErrorKind, ErrorStage } from "./errors.js";

export {
  GitHubTokenExchanger,
  GitHubRunnerTokenRequester,
  StubPlatform,
  clampExpiry,
  scopeCovers,
} from "./providers/index.js";
export type { RedemptionResult, StubFailure } from "./providers/index.js";

export type {
  Identity,
  SignedAssertion,
  AssertionClaims,
  ScopedAccessCredential,
  RunnerRegistrationToken,
  RunnerSpec,
  TargetScope,
  InstallationScope,
  Destination,
  PipelineConfig,
  RetryPolicy,
  StageProfile,
  CredentialToolConfig,
  Signer,
  TokenExchanger,
  RunnerTokenRequester,
  Clock,
} from "./types.js";
