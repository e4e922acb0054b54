#!/usr/bin/env node
/**
 * CLI interface for minting FPGA runner JIT configurations
 */

import { Command } from "commander";
import { ConfigService, resolvePipelineConfig, type TokenOptions } from "./config.js";
import {
  CredentialError,
  ERROR_KINDS,
  EXIT_CODES,
  EXIT_UNEXPECTED,
  formatError,
  isRetryableBySupervisor,
  toCredentialError,
} from "./errors.js";
import { RegistrationPipeline } from "./pipeline.js";
import { formatScope } from "./providers/checks.js";
import type { PipelineConfig } from "./types.js";

interface TokenCommandOptions extends TokenOptions {
  stage?: string;
  configDir?: string;
  verbose?: boolean;
}

interface InitCommandOptions {
  appId: string;
  installationId: string;
  scope: string;
  privateKey?: string;
  runnerGroup?: string;
  apiUrl?: string;
  configDir?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function fail(error: unknown): never {
  if (error instanceof CredentialError) {
    console.error(`Error: ${formatError(error)}`);
    process.exit(error.exitCode);
  }
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(EXIT_UNEXPECTED);
}

const program = new Command();

program
  .name("fpga-jit")
  .description("Mint single-use GitHub Actions JIT runner configurations for FPGA runners")
  .version("0.1.0");

// ─────────────────────────────────────────────────────────────────
// TOKEN COMMAND
// ─────────────────────────────────────────────────────────────────

program
  .command("token")
  .description("Mint a JIT configuration and deliver it")
  .option("-s, --stage <stage>", "Stage profile from the config file (e.g. carl, staging, prod)")
  .option("--config-dir <dir>", "Config directory")
  .option("--app-id <appId>", "GitHub App ID")
  .option("--installation-id <installationId>", "GitHub Installation ID")
  .option("--scope <scope>", "Target scope: org/<org>, repo/<owner>/<repo> or <owner>/<repo>")
  .option("-k, --key-path <path>", "Path to the App's private key")
  .option("--audience <audience>", "Audience claim for the App assertion")
  .option("-f, --fpga-target <target>", "FPGA target: zcu104, zcu104-nightly or vck190")
  .option("-i, --fpga-identifier <id>", "Board identifier within the lab")
  .option("-l, --location <location>", "Physical location of the board")
  .option("--name <name>", "Runner name (overrides the name derived from the board)")
  .option("--label <label>", "Extra runner label (repeatable)", collect, [])
  .option("-d, --dry-run", "Use staging labels so production jobs do not land on this runner")
  .option("--unique-suffix", "Append a random postfix and the date to the runner name")
  .option("--runner-group <id>", "Runner group ID")
  .option("--work-folder <path>", "Runner work folder")
  .option("-o, --output <kind>", "Where to deliver: stdout, file or exec", "stdout")
  .option("--output-file <path>", "Destination file for --output file")
  .option("--file-mode <mode>", "Octal mode for --output file", "600")
  .option("--runner-command <path>", "Runner start script for --output exec (e.g. ./run.sh)")
  .option("--runner-arg <arg>", "Argument passed before --jitconfig (repeatable)", collect, [])
  .option("--ttl <seconds>", "App assertion lifetime in seconds")
  .option("--timeout <ms>", "Timeout per platform request in milliseconds")
  .option("--max-attempts <n>", "Attempts per platform call (3-5)")
  .option("--api-url <url>", "GitHub REST API base URL")
  .option("-v, --verbose", "Log each pipeline step to stderr")
  .action(async (options: TokenCommandOptions) => {
    let config: PipelineConfig;
    try {
      const profile = options.stage
        ? new ConfigService(options.configDir).requireStage(options.stage)
        : undefined;
      config = resolvePipelineConfig(options, profile);
    } catch (error) {
      fail(toCredentialError(error, "config"));
    }

    if (options.stage) {
      console.error(`Running for stage: ${options.stage}`);
    }
    console.error(
      `Requesting JIT configuration for runner ${config.runner.name} in ${formatScope(config.runner.scope)}`
    );

    const controller = new AbortController();
    const onSignal = () => controller.abort();
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);

    const pipeline = new RegistrationPipeline(config, {
      onTransition: ({ from, to }) => {
        if (options.verbose) console.error(`[${from} -> ${to}]`);
      },
      onRetry: (state, { attempt, delayMs, error }) => {
        console.warn(
          `${state}: attempt ${attempt} failed (${error.kind}), retrying in ${delayMs}ms`
        );
      },
    });

    const result = await pipeline.run(controller.signal);
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);

    if (result.error) {
      const hint = isRetryableBySupervisor(result.error.kind) ? "retryable" : "not retryable";
      console.error(`Failed to create runner config (${hint})`);
      fail(result.error);
    }

    if (result.receipt?.kind === "file") {
      console.error(`Wrote JIT configuration to ${result.receipt.path}`);
    }
    if (result.receipt?.kind === "exec") {
      process.exitCode = await result.receipt.exited;
    }
  });

// ─────────────────────────────────────────────────────────────────
// CONFIG COMMANDS
// ─────────────────────────────────────────────────────────────────

const configCmd = program.command("config").description("Manage stage profiles");

configCmd
  .command("show")
  .description("Show configured stage profiles")
  .option("--config-dir <dir>", "Config directory")
  .action((options: { configDir?: string }) => {
    try {
      const config = new ConfigService(options.configDir).showConfig();
      console.log(JSON.stringify(config, null, 2));
    } catch (error) {
      fail(error);
    }
  });

configCmd
  .command("init <stage>")
  .description("Create or replace a stage profile")
  .requiredOption("--app-id <appId>", "GitHub App ID")
  .requiredOption("--installation-id <installationId>", "GitHub Installation ID")
  .requiredOption("--scope <scope>", "Target scope, e.g. org/my-org")
  .option("--private-key <path>", "Path to private key file")
  .option("--runner-group <id>", "Runner group ID")
  .option("--api-url <url>", "GitHub REST API base URL")
  .option("--config-dir <dir>", "Config directory")
  .action((stage: string, options: InitCommandOptions) => {
    try {
      new ConfigService(options.configDir).initStage(stage, {
        appId: options.appId,
        installationId: Number(options.installationId),
        scope: options.scope,
        ...(options.privateKey ? { privateKeyPath: options.privateKey } : {}),
        ...(options.runnerGroup ? { runnerGroupId: Number(options.runnerGroup) } : {}),
        ...(options.apiUrl ? { apiBaseUrl: options.apiUrl } : {}),
      });
      console.log(`Stage "${stage}" configured successfully`);
    } catch (error) {
      fail(error);
    }
  });

// ─────────────────────────────────────────────────────────────────
// EXIT CODES COMMAND
// ─────────────────────────────────────────────────────────────────

program
  .command("exit-codes")
  .description("List exit codes and whether a supervisor may retry them")
  .action(() => {
    const table = ERROR_KINDS.map((kind) => ({
      kind,
      code: EXIT_CODES[kind],
      retryable: isRetryableBySupervisor(kind),
    }));
    console.log(JSON.stringify(table, null, 2));
  });

await program.parseAsync(process.argv);
