/**
 * Configuration management with JSON file storage, and resolution of a
 * single immutable PipelineConfig from stage profile plus CLI options
 */

import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { CredentialError } from "./errors.js";
import { labelsFor, parseFpgaTarget, runnerName } from "./fpga.js";
import { DEFAULT_API_BASE_URL } from "./providers/github.js";
import { DEFAULT_RETRY_POLICY } from "./retry.js";
import { MAX_ASSERTION_TTL_SECONDS } from "./signer.js";
import type {
  CredentialToolConfig,
  Destination,
  PipelineConfig,
  RunnerSpec,
  StageProfile,
  TargetScope,
} from "./types.js";

/** Default config directory */
export const DEFAULT_CONFIG_DIR = path.join(os.homedir(), ".fpga-runner-credentials");

/** Config file name */
const CONFIG_FILE = "config.json";

export const DEFAULT_ASSERTION_TTL_SECONDS = 540;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_KEY_READ_TIMEOUT_MS = 5_000;
export const DEFAULT_RUNNER_GROUP_ID = 1;

const RUNNER_NAME_PATTERN = /^[A-Za-z0-9._-]{1,64}$/;
const ACCOUNT_PATTERN = /^[A-Za-z0-9_.-]+$/;

function invalid(message: string): CredentialError {
  return new CredentialError("InvalidConfiguration", message, { stage: "config" });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseStageProfile(name: string, value: unknown): StageProfile {
  if (!isRecord(value)) {
    throw invalid(`stage "${name}" must be an object`);
  }
  const { appId, installationId, privateKeyPath, scope, runnerGroupId, apiBaseUrl } = value;

  if (typeof appId !== "string" || appId.length === 0) {
    throw invalid(`stage "${name}": appId must be a non-empty string`);
  }
  if (typeof installationId !== "number" || !Number.isInteger(installationId) || installationId <= 0) {
    throw invalid(`stage "${name}": installationId must be a positive integer`);
  }
  if (typeof scope !== "string") {
    throw invalid(`stage "${name}": scope must be a string`);
  }
  parseScope(scope);
  if (privateKeyPath !== undefined && typeof privateKeyPath !== "string") {
    throw invalid(`stage "${name}": privateKeyPath must be a string`);
  }
  if (
    runnerGroupId !== undefined &&
    (typeof runnerGroupId !== "number" || !Number.isInteger(runnerGroupId) || runnerGroupId <= 0)
  ) {
    throw invalid(`stage "${name}": runnerGroupId must be a positive integer`);
  }
  if (apiBaseUrl !== undefined && typeof apiBaseUrl !== "string") {
    throw invalid(`stage "${name}": apiBaseUrl must be a string`);
  }

  return {
    appId,
    installationId,
    scope,
    ...(privateKeyPath !== undefined ? { privateKeyPath } : {}),
    ...(runnerGroupId !== undefined ? { runnerGroupId } : {}),
    ...(apiBaseUrl !== undefined ? { apiBaseUrl } : {}),
  };
}

export type ShownStage = StageProfile & { privateKeyExists?: boolean };

export interface ShownConfig {
  configDir: string;
  stages: Record<string, ShownStage>;
}

export class ConfigService {
  private configDir: string;
  private configPath: string;

  constructor(configDir: string = DEFAULT_CONFIG_DIR) {
    this.configDir = configDir;
    this.configPath = path.join(configDir, CONFIG_FILE);
  }

  /** Ensure config directory exists with proper permissions */
  ensureConfigDir(): void {
    if (!fs.existsSync(this.configDir)) {
      fs.mkdirSync(this.configDir, { recursive: true, mode: 0o700 });
    }
  }

  /** Load and validate config file */
  loadConfig(): CredentialToolConfig {
    if (!fs.existsSync(this.configPath)) {
      return { stages: {} };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configPath, "utf-8"));
    } catch (error) {
      throw invalid(
        `cannot parse ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (!isRecord(parsed) || !isRecord(parsed.stages)) {
      throw invalid(`${this.configPath} must contain a "stages" object`);
    }

    const stages: Record<string, StageProfile> = {};
    for (const [name, profile] of Object.entries(parsed.stages)) {
      stages[name] = parseStageProfile(name, profile);
    }
    return { stages };
  }

  /** Save config file */
  saveConfig(config: CredentialToolConfig): void {
    this.ensureConfigDir();
    fs.writeFileSync(this.configPath, JSON.stringify(config, null, 2), { mode: 0o600 });
  }

  /** Get a stage profile */
  getStage(stage: string): StageProfile | undefined {
    return this.loadConfig().stages[stage.toLowerCase()];
  }

  /** Get a stage profile, failing if it is not configured */
  requireStage(stage: string): StageProfile {
    const profile = this.getStage(stage);
    if (!profile) {
      const known = this.listStages();
      throw invalid(
        `stage "${stage}" is not configured` +
          (known.length > 0 ? ` (configured: ${known.join(", ")})` : ` (run "config init ${stage}")`)
      );
    }
    return profile;
  }

  /** Validate and store a stage profile */
  initStage(stage: string, profile: StageProfile): void {
    const validated = parseStageProfile(stage, profile);

    if (validated.privateKeyPath !== undefined) {
      const keyPath = path.isAbsolute(validated.privateKeyPath)
        ? validated.privateKeyPath
        : path.join(this.configDir, validated.privateKeyPath);

      if (!fs.existsSync(keyPath)) {
        throw invalid(`Private key not found: ${keyPath}`);
      }
      validated.privateKeyPath = keyPath;
    }

    const config = this.loadConfig();
    config.stages[stage.toLowerCase()] = validated;
    this.saveConfig(config);
  }

  /** List configured stages */
  listStages(): string[] {
    return Object.keys(this.loadConfig().stages);
  }

  /** Get the config directory path */
  getConfigDir(): string {
    return this.configDir;
  }

  /** Show config, reporting whether each key file exists */
  showConfig(): ShownConfig {
    const config = this.loadConfig();
    const stages: Record<string, ShownStage> = {};

    for (const [name, profile] of Object.entries(config.stages)) {
      stages[name] = {
        ...profile,
        ...(profile.privateKeyPath !== undefined
          ? { privateKeyExists: fs.existsSync(profile.privateKeyPath) }
          : {}),
      };
    }

    return { configDir: this.configDir, stages };
  }
}

// ─────────────────────────────────────────────────────────────────
// PARSING
// ─────────────────────────────────────────────────────────────────

/**
 * Parse a target scope:
 * `org/<org>`, `repo/<owner>/<repo>`, `<owner>/<repo>` or `<org>`
 */
export function parseScope(value: string): TargetScope {
  const parts = value.trim().split("/");
  if (parts.some((p) => !ACCOUNT_PATTERN.test(p))) {
    throw invalid(`cannot resolve scope "${value}"`);
  }

  if (parts[0] === "org" && parts.length === 2) {
    return { kind: "organization", org: parts[1] };
  }
  if (parts[0] === "repo" && parts.length === 3) {
    return { kind: "repository", owner: parts[1], repo: parts[2] };
  }
  if (parts.length === 2) {
    return { kind: "repository", owner: parts[0], repo: parts[1] };
  }
  if (parts.length === 1) {
    return { kind: "organization", org: parts[0] };
  }
  throw invalid(`cannot resolve scope "${value}"`);
}

/** Ordered label set: trimmed, empties dropped, first occurrence kept */
export function normalizeLabels(labels: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of labels) {
    const label = raw.trim();
    if (label.length === 0 || seen.has(label.toLowerCase())) continue;
    seen.add(label.toLowerCase());
    result.push(label);
  }
  return result;
}

/** Validate a runner spec before it is used */
export function validateRunnerSpec(spec: RunnerSpec): RunnerSpec {
  if (!RUNNER_NAME_PATTERN.test(spec.name)) {
    throw invalid(
      `runner name "${spec.name}" must be 1-64 characters of letters, digits, '.', '_' or '-'`
    );
  }
  const labels = normalizeLabels(spec.labels);
  if (labels.length === 0) {
    throw invalid("at least one runner label is required");
  }
  if (!Number.isInteger(spec.runnerGroupId) || spec.runnerGroupId <= 0) {
    throw invalid(`runner group must be a positive integer, got ${spec.runnerGroupId}`);
  }
  return { ...spec, labels };
}

function parseInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw invalid(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function parseFileMode(value: string): number {
  if (!/^0?[0-7]{3}$/.test(value)) {
    throw invalid(`file mode must be octal like 600, got "${value}"`);
  }
  return parseInt(value, 8);
}

/** Options accepted by the token command (all strings, as parsed) */
export interface TokenOptions {
  appId?: string;
  installationId?: string;
  scope?: string;
  keyPath?: string;
  audience?: string;
  fpgaTarget?: string;
  fpgaIdentifier?: string;
  location?: string;
  name?: string;
  label?: string[];
  dryRun?: boolean;
  uniqueSuffix?: boolean;
  runnerGroup?: string;
  workFolder?: string;
  output?: string;
  outputFile?: string;
  fileMode?: string;
  runnerCommand?: string;
  runnerArg?: string[];
  ttl?: string;
  timeout?: string;
  maxAttempts?: string;
  apiUrl?: string;
}

export function parseDestination(options: TokenOptions): Destination {
  const output = options.output ?? "stdout";
  switch (output) {
    case "stdout":
      return { kind: "stdout" };
    case "file":
      if (!options.outputFile) throw invalid("--output file requires --output-file <path>");
      return {
        kind: "file",
        path: path.resolve(options.outputFile),
        ...(options.fileMode !== undefined ? { mode: parseFileMode(options.fileMode) } : {}),
      };
    case "exec":
      if (!options.runnerCommand) throw invalid("--output exec requires --runner-command <path>");
      return { kind: "exec", command: options.runnerCommand, args: options.runnerArg ?? [] };
    default:
      throw invalid(`Invalid output: '${output}'. Must be one of 'stdout', 'file' or 'exec'.`);
  }
}

function resolveRunner(options: TokenOptions, scope: TargetScope, runnerGroupId: number): RunnerSpec {
  const target = options.fpgaTarget !== undefined ? parseFpgaTarget(options.fpgaTarget) : undefined;
  const labels = [...(target ? labelsFor(target, options.dryRun ?? false) : []), ...(options.label ?? [])];

  let name = options.name;
  if (name === undefined) {
    if (!target || !options.fpgaIdentifier || !options.location) {
      throw invalid("give --name, or --fpga-target with --fpga-identifier and --location");
    }
    name = runnerName({
      target,
      identifier: options.fpgaIdentifier,
      location: options.location,
      uniqueSuffix: options.uniqueSuffix ?? false,
    });
  }

  return validateRunnerSpec({
    name,
    labels,
    scope,
    runnerGroupId,
    ...(options.workFolder ? { workFolder: options.workFolder } : {}),
  });
}

/**
 * Merge CLI options over a stage profile into the config for one run
 */
export function resolvePipelineConfig(options: TokenOptions, profile?: StageProfile): PipelineConfig {
  const appId = options.appId ?? profile?.appId;
  if (!appId) throw invalid("App ID is required (--app-id or a stage profile)");

  const installationId =
    options.installationId !== undefined
      ? parseInteger("installation ID", options.installationId, 0)
      : profile?.installationId;
  if (installationId === undefined) {
    throw invalid("installation ID is required (--installation-id or a stage profile)");
  }

  const scopeText = options.scope ?? profile?.scope;
  if (!scopeText) throw invalid("scope is required (--scope or a stage profile)");
  const scope = parseScope(scopeText);

  const privateKeyPath = options.keyPath ?? profile?.privateKeyPath;
  if (!privateKeyPath) throw invalid("private key path is required (--key-path or a stage profile)");

  const assertionTtlSeconds = parseInteger("TTL", options.ttl, DEFAULT_ASSERTION_TTL_SECONDS);
  if (assertionTtlSeconds > MAX_ASSERTION_TTL_SECONDS) {
    throw invalid(`TTL must be at most ${MAX_ASSERTION_TTL_SECONDS} seconds`);
  }

  const maxAttempts = parseInteger("max attempts", options.maxAttempts, DEFAULT_RETRY_POLICY.maxAttempts);
  if (maxAttempts < 3 || maxAttempts > 5) throw invalid("max attempts must be between 3 and 5");

  const runnerGroupId = parseInteger(
    "runner group",
    options.runnerGroup,
    profile?.runnerGroupId ?? DEFAULT_RUNNER_GROUP_ID
  );

  const config: PipelineConfig = {
    identity: {
      privateKeyPath: path.resolve(privateKeyPath),
      issuer: appId,
      ...(options.audience ? { audience: options.audience } : {}),
    },
    assertionTtlSeconds,
    installation: { installationId, target: scope },
    runner: resolveRunner(options, scope, runnerGroupId),
    destination: parseDestination(options),
    apiBaseUrl: options.apiUrl ?? profile?.apiBaseUrl ?? DEFAULT_API_BASE_URL,
    requestTimeoutMs: parseInteger("timeout", options.timeout, DEFAULT_REQUEST_TIMEOUT_MS),
    keyReadTimeoutMs: DEFAULT_KEY_READ_TIMEOUT_MS,
    retry: { ...DEFAULT_RETRY_POLICY, maxAttempts },
  };
  return Object.freeze(config);
}
