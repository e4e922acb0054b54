/**
 * Tests for the registration pipeline
 */

import { test, describe, before, after } from "node:test";
import * as assert from "node:assert";
import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { PipelineState, RegistrationPipeline, type TokenDelivery } from "./pipeline.js";
import { CredentialError } from "./errors.js";
import { StubPlatform } from "./providers/stub.js";
import type { DeliveryReceipt } from "./delivery.js";
import type {
  Destination,
  PipelineConfig,
  RunnerRegistrationToken,
  ScopedAccessCredential,
  SignedAssertion,
  TargetScope,
  TokenExchanger,
} from "./types.js";

// ─────────────────────────────────────────────────────────────────
// TEST UTILITIES
// ─────────────────────────────────────────────────────────────────

class RecordingDelivery implements TokenDelivery {
  delivered: RunnerRegistrationToken[] = [];

  async deliver(token: RunnerRegistrationToken, _destination: Destination): Promise<DeliveryReceipt> {
    this.delivered.push(token);
    return { kind: "stdout" };
  }
}

/** Passes through to the platform, keeping what it saw */
function recordingExchanger(platform: StubPlatform) {
  const assertions: SignedAssertion[] = [];
  const credentials: ScopedAccessCredential[] = [];
  const exchanger: TokenExchanger = {
    async exchange(assertion, scope, signal) {
      assertions.push(assertion);
      const credential = await platform.exchange(assertion, scope, signal);
      credentials.push(credential);
      return credential;
    },
  };
  return { exchanger, assertions, credentials };
}

function recordingSleep() {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

let tempDir: string;
let keyPath: string;

before(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "fpga-jit-pipeline-test-"));
  const { privateKey } = crypto.generateKeyPairSync("rsa", { modulusLength: 2048 });
  keyPath = path.join(tempDir, "app.pem");
  fs.writeFileSync(keyPath, privateKey.export({ type: "pkcs8", format: "pem" }), { mode: 0o600 });
});

after(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

function pipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    identity: { privateKeyPath: keyPath, issuer: "app-123" },
    assertionTtlSeconds: 300,
    installation: { installationId: 42, target: { kind: "organization", org: "caliptra-sw" } },
    runner: {
      name: "fpga-runner-07",
      labels: ["fpga", "caliptra"],
      scope: { kind: "organization", org: "caliptra-sw" },
      runnerGroupId: 1,
    },
    destination: { kind: "stdout" },
    apiBaseUrl: "http://127.0.0.1:9",
    requestTimeoutMs: 1000,
    keyReadTimeoutMs: 1000,
    retry: { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000, jitterRatio: 0.25 },
    ...overrides,
  };
}

// ─────────────────────────────────────────────────────────────────
// SUCCESS
// ─────────────────────────────────────────────────────────────────

describe("RegistrationPipeline", () => {
  test("mints and delivers a JIT configuration", async () => {
    const platform = new StubPlatform();
    const delivery = new RecordingDelivery();
    const pipeline = new RegistrationPipeline(pipelineConfig(), {
      exchanger: platform,
      requester: platform,
      delivery,
    });

    assert.strictEqual(pipeline.getState(), PipelineState.IDLE);
    const result = await pipeline.run();

    assert.strictEqual(result.state, PipelineState.DONE);
    assert.strictEqual(result.exitCode, 0);
    assert.strictEqual(result.error, undefined);
    assert.strictEqual(pipeline.getFailure(), null);
    assert.strictEqual(result.token?.runnerName, "fpga-runner-07");
    assert.deepStrictEqual(result.token?.labels, ["fpga", "caliptra"]);
    assert.deepStrictEqual(result.receipt, { kind: "stdout" });

    assert.strictEqual(delivery.delivered.length, 1);
    assert.strictEqual(delivery.delivered[0].value, result.token?.value);
    assert.deepStrictEqual(
      pipeline.getHistory().map((t) => t.to),
      [
        PipelineState.SIGNING,
        PipelineState.EXCHANGING,
        PipelineState.REQUESTING_TOKEN,
        PipelineState.DELIVERING,
        PipelineState.DONE,
      ]
    );
    assert.deepStrictEqual(result.attempts, {
      [PipelineState.SIGNING]: 1,
      [PipelineState.EXCHANGING]: 1,
      [PipelineState.REQUESTING_TOKEN]: 1,
      [PipelineState.DELIVERING]: 1,
    });

    assert.deepStrictEqual(platform.redeem(delivery.delivered[0].value), {
      status: "registered",
      runnerName: "fpga-runner-07",
      runnerId: 1,
    });
  });

  test("each credential expires no later than the one it came from", async () => {
    const platform = new StubPlatform();
    const { exchanger, assertions, credentials } = recordingExchanger(platform);

    const result = await new RegistrationPipeline(pipelineConfig(), {
      exchanger,
      requester: platform,
      delivery: new RecordingDelivery(),
    }).run();

    assert.strictEqual(result.state, PipelineState.DONE);
    const assertionExpiry = assertions[0].payload.exp * 1000;
    const credentialExpiry = credentials[0].expiresAt.getTime();
    assert.ok(credentialExpiry <= assertionExpiry);
    assert.ok((result.token?.expiresAt.getTime() ?? Infinity) <= credentialExpiry);
  });

  test("retries transport failures within the same state", async () => {
    const platform = new StubPlatform();
    platform.failNext("exchange", new CredentialError("TransportFailure", "connection reset"), 2);
    const { delays, sleep } = recordingSleep();
    const retried: PipelineState[] = [];

    const pipeline = new RegistrationPipeline(pipelineConfig(), {
      exchanger: platform,
      requester: platform,
      delivery: new RecordingDelivery(),
      sleep,
      random: () => 0,
      onRetry: (state) => retried.push(state),
    });
    const result = await pipeline.run();

    assert.strictEqual(result.state, PipelineState.DONE);
    assert.strictEqual(platform.calls.exchange, 3);
    assert.strictEqual(result.attempts[PipelineState.EXCHANGING], 3);
    assert.deepStrictEqual(delays, [100, 200]);
    assert.deepStrictEqual(retried, [PipelineState.EXCHANGING, PipelineState.EXCHANGING]);
    // retries never show up as transitions
    assert.strictEqual(pipeline.getHistory().filter((t) => t.to === PipelineState.EXCHANGING).length, 1);
  });

  // ─────────────────────────────────────────────────────────────────
  // FAILURES
  // ─────────────────────────────────────────────────────────────────

  test("a taken runner name fails with RunnerNameConflict and no secrets", async () => {
    const platform = new StubPlatform();
    platform.markRunnerActive("fpga-runner-07");
    const { exchanger, credentials } = recordingExchanger(platform);
    const delivery = new RecordingDelivery();

    const pipeline = new RegistrationPipeline(pipelineConfig(), {
      exchanger,
      requester: platform,
      delivery,
    });
    const result = await pipeline.run();

    assert.strictEqual(result.state, PipelineState.FAILED);
    assert.strictEqual(pipeline.getState(), PipelineState.FAILED);
    assert.strictEqual(result.exitCode, 22);
    assert.strictEqual(result.error?.kind, "RunnerNameConflict");
    assert.strictEqual(pipeline.getFailure(), "RunnerNameConflict");
    assert.strictEqual(result.attempts[PipelineState.REQUESTING_TOKEN], 1);
    assert.strictEqual(delivery.delivered.length, 0);

    const message = result.error?.message ?? "";
    assert.ok(message.includes("fpga-runner-07"));
    assert.ok(!message.includes("PRIVATE KEY"));
    assert.ok(!message.includes(credentials[0].token));
  });

  test("secrets in error messages are redacted", async () => {
    const platform = new StubPlatform();
    const pipeline = new RegistrationPipeline(pipelineConfig(), {
      exchanger: platform,
      requester: {
        async requestJitToken(credential) {
          throw new CredentialError("ScopeInsufficient", `token ${credential.token} lacks permission`, {
            stage: "jit",
            status: 403,
          });
        },
      },
      delivery: new RecordingDelivery(),
    });

    const result = await pipeline.run();
    assert.strictEqual(result.error?.message, "token ***REDACTED*** lacks permission");
    assert.strictEqual(result.error?.status, 403);
    assert.strictEqual(result.exitCode, 21);
  });

  test("rate limiting is retried with non-decreasing waits, then surfaces", async () => {
    const platform = new StubPlatform();
    platform.failNext(
      "jit",
      new CredentialError("RateLimited", "slow down", { status: 429, retryAfterMs: 200 }),
      3
    );
    const { delays, sleep } = recordingSleep();

    const result = await new RegistrationPipeline(pipelineConfig(), {
      exchanger: platform,
      requester: platform,
      delivery: new RecordingDelivery(),
      sleep,
      random: () => 0,
    }).run();

    assert.strictEqual(result.state, PipelineState.FAILED);
    assert.strictEqual(result.exitCode, 30);
    assert.strictEqual(platform.calls.jit, 3);
    assert.deepStrictEqual(delays, [200, 200]);
  });

  test("a hung request times out as TransportFailure", async () => {
    const platform = new StubPlatform();
    platform.failNext("exchange", "hang", 3);
    const { sleep } = recordingSleep();

    const result = await new RegistrationPipeline(pipelineConfig({ requestTimeoutMs: 20 }), {
      exchanger: platform,
      requester: platform,
      delivery: new RecordingDelivery(),
      sleep,
    }).run();

    assert.strictEqual(result.exitCode, 31);
    assert.strictEqual(result.error?.kind, "TransportFailure");
    assert.strictEqual(result.error?.message, "timed out after 20ms");
    assert.strictEqual(result.attempts[PipelineState.EXCHANGING], 3);
    assert.strictEqual(platform.calls.jit, 0);
  });

  test("cancellation during a request ends in Failed(Cancelled)", async () => {
    const platform = new StubPlatform();
    platform.failNext("exchange", "hang");
    const controller = new AbortController();
    const delivery = new RecordingDelivery();

    const result = await new RegistrationPipeline(pipelineConfig(), {
      exchanger: platform,
      requester: platform,
      delivery,
      onTransition: ({ to }) => {
        if (to === PipelineState.EXCHANGING) setTimeout(() => controller.abort(), 10);
      },
    }).run(controller.signal);

    assert.strictEqual(result.state, PipelineState.FAILED);
    assert.strictEqual(result.exitCode, 50);
    assert.strictEqual(result.error?.kind, "Cancelled");
    assert.strictEqual(result.error?.stage, "exchange");
    assert.strictEqual(platform.calls.exchange, 1);
    assert.strictEqual(platform.calls.jit, 0);
    assert.strictEqual(delivery.delivered.length, 0);
  });

  test("an already-cancelled run never signs", async () => {
    const controller = new AbortController();
    controller.abort();
    const platform = new StubPlatform();

    const pipeline = new RegistrationPipeline(pipelineConfig(), {
      exchanger: platform,
      requester: platform,
      delivery: new RecordingDelivery(),
    });
    const result = await pipeline.run(controller.signal);

    assert.strictEqual(result.exitCode, 50);
    assert.strictEqual(result.error?.stage, "signing");
    assert.deepStrictEqual(
      pipeline.getHistory().map((t) => [t.from, t.to]),
      [
        [PipelineState.IDLE, PipelineState.SIGNING],
        [PipelineState.SIGNING, PipelineState.FAILED],
      ]
    );
    assert.strictEqual(platform.calls.exchange, 0);
  });

  test("a missing key fails with KeyUnavailable before any request", async () => {
    const platform = new StubPlatform();
    const config = pipelineConfig({
      identity: { privateKeyPath: path.join(tempDir, "missing.pem"), issuer: "app-123" },
    });

    const result = await new RegistrationPipeline(config, {
      exchanger: platform,
      requester: platform,
      delivery: new RecordingDelivery(),
    }).run();

    assert.strictEqual(result.exitCode, 10);
    assert.strictEqual(result.error?.kind, "KeyUnavailable");
    assert.strictEqual(result.attempts[PipelineState.SIGNING], 1);
    assert.strictEqual(platform.calls.exchange, 0);
  });

  test("a rejected assertion is not retried", async () => {
    const platform = new StubPlatform({ appIds: ["app-999"] });

    const result = await new RegistrationPipeline(pipelineConfig(), {
      exchanger: platform,
      requester: platform,
      delivery: new RecordingDelivery(),
    }).run();

    assert.strictEqual(result.exitCode, 20);
    assert.strictEqual(platform.calls.exchange, 1);
  });

  test("an installation on another account is ScopeInsufficient", async () => {
    const platform = new StubPlatform({
      installations: new Map<number, TargetScope>([[42, { kind: "organization", org: "other-org" }]]),
    });

    const result = await new RegistrationPipeline(pipelineConfig(), {
      exchanger: platform,
      requester: platform,
      delivery: new RecordingDelivery(),
    }).run();

    assert.strictEqual(result.exitCode, 21);
    assert.strictEqual(result.error?.kind, "ScopeInsufficient");
    assert.strictEqual(platform.calls.jit, 1);
  });

  test("an unexpected delivery error is DeliveryFailure", async () => {
    const platform = new StubPlatform();

    const result = await new RegistrationPipeline(pipelineConfig(), {
      exchanger: platform,
      requester: platform,
      delivery: {
        async deliver() {
          throw new Error("disk full");
        },
      },
    }).run();

    assert.strictEqual(result.exitCode, 40);
    assert.strictEqual(result.error?.kind, "DeliveryFailure");
    assert.strictEqual(result.error?.message, "disk full");
    assert.strictEqual(result.error?.stage, "delivery");
  });

  test("a second run reports Failed and leaves the first run intact", async () => {
    const platform = new StubPlatform();
    const pipeline = new RegistrationPipeline(pipelineConfig(), {
      exchanger: platform,
      requester: platform,
      delivery: new RecordingDelivery(),
    });

    await pipeline.run();
    const second = await pipeline.run();

    assert.strictEqual(second.state, PipelineState.FAILED);
    assert.strictEqual(second.error?.kind, "InvalidConfiguration");
    assert.strictEqual(second.error?.message, "pipeline has already run and cannot be restarted");
    assert.strictEqual(second.exitCode, 2);
    assert.strictEqual(platform.calls.exchange, 1);
    assert.strictEqual(pipeline.getState(), PipelineState.DONE);
  });
});
