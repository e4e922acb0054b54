/**
 * Registration pipeline: sign -> exchange -> request JIT config -> deliver
 *
 * Runs once. Each stage's output is the next stage's only input, retries
 * stay inside a stage, and the outcome is a terminal state plus exit code.
 */

import { CredentialDelivery, type DeliveryReceipt } from "./delivery.js";
import {
  CredentialError,
  EXIT_CODES,
  EXIT_SUCCESS,
  redactSecrets,
  toCredentialError,
  type ErrorKind,
  type ErrorStage,
} from "./errors.js";
import { GitHubRunnerTokenRequester, GitHubTokenExchanger } from "./providers/github.js";
import {
  runWithDeadline,
  systemClock,
  throwIfCancelled,
  withRetry,
  type RetryEvent,
  type Sleeper,
} from "./retry.js";
import { KeyFileSigner } from "./signer.js";
import type {
  Clock,
  Destination,
  PipelineConfig,
  RunnerRegistrationToken,
  RunnerTokenRequester,
  Signer,
  TokenExchanger,
} from "./types.js";

/** Pipeline state */
export enum PipelineState {
  IDLE = "Idle",
  SIGNING = "Signing",
  EXCHANGING = "Exchanging",
  REQUESTING_TOKEN = "RequestingToken",
  DELIVERING = "Delivering",
  DONE = "Done",
  FAILED = "Failed",
}

const STAGE_OF: Partial<Record<PipelineState, ErrorStage>> = {
  [PipelineState.SIGNING]: "signing",
  [PipelineState.EXCHANGING]: "exchange",
  [PipelineState.REQUESTING_TOKEN]: "jit",
  [PipelineState.DELIVERING]: "delivery",
};

/** Anything that can deliver a token */
export interface TokenDelivery {
  deliver(token: RunnerRegistrationToken, destination: Destination): Promise<DeliveryReceipt>;
}

export interface Transition {
  from: PipelineState;
  to: PipelineState;
  at: number;
}

export interface PipelineResult {
  state: PipelineState.DONE | PipelineState.FAILED;
  /** Set when state is Done */
  token?: RunnerRegistrationToken;
  receipt?: DeliveryReceipt;
  /** Set when state is Failed; message is free of secrets */
  error?: CredentialError;
  exitCode: number;
  /** Attempts made per state */
  attempts: Partial<Record<PipelineState, number>>;
}

export interface PipelineDependencies {
  signer?: Signer;
  exchanger?: TokenExchanger;
  requester?: RunnerTokenRequester;
  delivery?: TokenDelivery;
  clock?: Clock;
  sleep?: Sleeper;
  random?: () => number;
  /** Called on every state change */
  onTransition?: (transition: Transition) => void;
  /** Called before each retry wait */
  onRetry?: (state: PipelineState, event: RetryEvent) => void;
}

export class RegistrationPipeline {
  private config: PipelineConfig;
  private signer: Signer;
  private exchanger: TokenExchanger;
  private requester: RunnerTokenRequester;
  private delivery: TokenDelivery;
  private deps: PipelineDependencies;
  private clock: Clock;

  private state: PipelineState = PipelineState.IDLE;
  private failure: ErrorKind | null = null;
  private history: Transition[] = [];
  private attempts: Partial<Record<PipelineState, number>> = {};
  /** Values scrubbed from every reported error */
  private secrets: Set<string> = new Set();
  private started = false;

  constructor(config: PipelineConfig, deps: PipelineDependencies = {}) {
    this.config = config;
    this.deps = deps;
    this.clock = deps.clock ?? systemClock;
    this.signer =
      deps.signer ??
      new KeyFileSigner({ clock: this.clock, keyReadTimeoutMs: config.keyReadTimeoutMs });
    this.exchanger =
      deps.exchanger ?? new GitHubTokenExchanger({ baseUrl: config.apiBaseUrl, clock: this.clock });
    this.requester =
      deps.requester ??
      new GitHubRunnerTokenRequester({ baseUrl: config.apiBaseUrl, clock: this.clock });
    this.delivery = deps.delivery ?? new CredentialDelivery();
  }

  getState(): PipelineState {
    return this.state;
  }

  /** Error kind when Failed, else null */
  getFailure(): ErrorKind | null {
    return this.failure;
  }

  getHistory(): Transition[] {
    return [...this.history];
  }

  /**
   * Run the pipeline. Never throws; failures end in the Failed state.
   */
  async run(signal?: AbortSignal): Promise<PipelineResult> {
    if (this.started) {
      // the first run's state and history stay as they were
      const error = new CredentialError("InvalidConfiguration", "pipeline has already run and cannot be restarted", {
        stage: "config",
      });
      return {
        state: PipelineState.FAILED,
        error,
        exitCode: EXIT_CODES[error.kind],
        attempts: { ...this.attempts },
      };
    }
    this.started = true;

    const { config } = this;

    try {
      this.transition(PipelineState.SIGNING);
      const assertion = await this.attempt(PipelineState.SIGNING, signal, (s) =>
        this.signer.sign(config.identity, config.assertionTtlSeconds, s)
      );
      this.secrets.add(assertion.encoded);

      this.transition(PipelineState.EXCHANGING);
      const credential = await this.retrying(PipelineState.EXCHANGING, signal, (s) =>
        this.exchanger.exchange(assertion, config.installation, s)
      );
      this.secrets.add(credential.token);

      this.transition(PipelineState.REQUESTING_TOKEN);
      const token = await this.retrying(PipelineState.REQUESTING_TOKEN, signal, (s) =>
        this.requester.requestJitToken(credential, config.runner, s)
      );
      this.secrets.add(token.value);

      this.transition(PipelineState.DELIVERING);
      throwIfCancelled(signal, "delivery");
      this.countAttempt(PipelineState.DELIVERING);
      const receipt = await this.delivery.deliver(token, config.destination).catch((error: unknown) => {
        if (error instanceof CredentialError) throw error;
        throw new CredentialError(
          "DeliveryFailure",
          error instanceof Error ? error.message : String(error),
          { stage: "delivery", cause: error }
        );
      });

      this.transition(PipelineState.DONE);
      return {
        state: PipelineState.DONE,
        token,
        receipt,
        exitCode: EXIT_SUCCESS,
        attempts: { ...this.attempts },
      };
    } catch (thrown) {
      const stage = STAGE_OF[this.state] ?? "config";
      const error = toCredentialError(thrown, stage);
      const safe = error.withMessage(redactSecrets(error.message, this.secrets));

      this.failure = safe.kind;
      this.transition(PipelineState.FAILED);
      return {
        state: PipelineState.FAILED,
        error: safe,
        exitCode: EXIT_CODES[safe.kind],
        attempts: { ...this.attempts },
      };
    }
  }

  /** One attempt under the request deadline */
  private attempt<T>(
    state: PipelineState,
    signal: AbortSignal | undefined,
    operation: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    const stage = STAGE_OF[state] ?? "config";
    const timeoutMs =
      state === PipelineState.SIGNING ? this.config.keyReadTimeoutMs : this.config.requestTimeoutMs;

    throwIfCancelled(signal, stage);
    this.countAttempt(state);
    return runWithDeadline(timeoutMs, signal, stage, operation);
  }

  /** Bounded retries of RateLimited and TransportFailure; state does not change */
  private retrying<T>(
    state: PipelineState,
    signal: AbortSignal | undefined,
    operation: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    return withRetry(() => this.attempt(state, signal, operation), this.config.retry, {
      stage: STAGE_OF[state] ?? "config",
      signal,
      sleep: this.deps.sleep,
      random: this.deps.random,
      onRetry: (event) => this.deps.onRetry?.(state, event),
    });
  }

  private countAttempt(state: PipelineState): void {
    this.attempts[state] = (this.attempts[state] ?? 0) + 1;
  }

  private transition(to: PipelineState): void {
    const entry: Transition = { from: this.state, to, at: this.clock.now() };
    this.state = to;
    this.history.push(entry);
    this.deps.onTransition?.(entry);
  }
}
