/**
 * Hands the JIT configuration to its destination
 */

import * as fs from "fs";
import * as path from "path";
import * as crypto from "crypto";
import { spawn, type ChildProcess } from "child_process";
import type { Writable } from "stream";
import { CredentialError } from "./errors.js";
import type { Destination, RunnerRegistrationToken } from "./types.js";

/** Owner read/write only */
export const DEFAULT_FILE_MODE = 0o600;

/** Argument the runner's run.sh takes the JIT configuration with */
export const JIT_CONFIG_ARG = "--jitconfig";

/** File operations used for atomic writes (swappable in tests) */
export interface FileOps {
  writeFile(file: string, data: string, options: { mode: number; flag: string }): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  unlink(file: string): Promise<void>;
}

const nodeFileOps: FileOps = {
  async writeFile(file, data, options) {
    const handle = await fs.promises.open(file, options.flag, options.mode);
    try {
      await handle.writeFile(data, "utf-8");
      await handle.sync();
    } finally {
      await handle.close();
    }
  },
  rename: (from, to) => fs.promises.rename(from, to),
  unlink: (file) => fs.promises.unlink(file),
};

export type DeliveryReceipt =
  | { kind: "stdout" }
  | { kind: "file"; path: string }
  | { kind: "exec"; pid: number | undefined; exited: Promise<number> };

export interface CredentialDeliveryOptions {
  stdout?: Writable;
  fileOps?: FileOps;
  /** Spawn function for exec delivery */
  spawnProcess?: (command: string, args: string[]) => ChildProcess;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class CredentialDelivery {
  private stdout: Writable;
  private fileOps: FileOps;
  private spawnProcess: (command: string, args: string[]) => ChildProcess;

  constructor(options: CredentialDeliveryOptions = {}) {
    this.stdout = options.stdout ?? process.stdout;
    this.fileOps = options.fileOps ?? nodeFileOps;
    this.spawnProcess =
      options.spawnProcess ?? ((command, args) => spawn(command, args, { stdio: "inherit" }));
  }

  /**
   * Deliver the token value. Either the whole value reaches the
   * destination or nothing does.
   */
  async deliver(token: RunnerRegistrationToken, destination: Destination): Promise<DeliveryReceipt> {
    if (!token.value) {
      throw new CredentialError("DeliveryFailure", "refusing to deliver an empty token", {
        stage: "delivery",
      });
    }

    switch (destination.kind) {
      case "stdout":
        await this.writeStdout(token.value);
        return { kind: "stdout" };
      case "file":
        await this.writeFileAtomic(destination.path, token.value, destination.mode ?? DEFAULT_FILE_MODE);
        return { kind: "file", path: destination.path };
      case "exec":
        return this.launch(destination.command, destination.args, token.value);
    }
  }

  /**
   * A failed write also emits `error` on the stream (EPIPE on a closed
   * pipe); the listener stays until that event arrives.
   */
  private writeStdout(value: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const fail = (error: Error) => {
        reject(
          new CredentialError("DeliveryFailure", `cannot write to stdout: ${error.message}`, {
            stage: "delivery",
            cause: error,
          })
        );
      };
      this.stdout.once("error", fail);
      this.stdout.write(`${value}\n`, (error) => {
        if (error) {
          fail(error);
        } else {
          this.stdout.off("error", fail);
          resolve();
        }
      });
    });
  }

  /**
   * Write to a temp file beside the target, then rename over it. The temp
   * file is created exclusively with the requested mode.
   */
  private async writeFileAtomic(target: string, value: string, mode: number): Promise<void> {
    const dir = path.dirname(target);
    const temp = path.join(dir, `.${path.basename(target)}.${crypto.randomBytes(6).toString("hex")}.tmp`);

    try {
      await this.fileOps.writeFile(temp, `${value}\n`, { mode, flag: "wx" });
      await this.fileOps.rename(temp, target);
    } catch (error) {
      await this.fileOps.unlink(temp).catch((cleanupError: unknown) => {
        if (!(cleanupError instanceof Error && "code" in cleanupError && cleanupError.code === "ENOENT")) {
          console.error(`Warning: could not remove temporary file ${temp}: ${describe(cleanupError)}`);
        }
      });
      throw new CredentialError("DeliveryFailure", `cannot write ${target}: ${describe(error)}`, {
        stage: "delivery",
        cause: error,
      });
    }
  }

  /** Start the runner with the JIT configuration; resolves once it has spawned */
  private launch(command: string, args: string[], value: string): Promise<DeliveryReceipt> {
    return new Promise((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = this.spawnProcess(command, [...args, JIT_CONFIG_ARG, value]);
      } catch (error) {
        reject(
          new CredentialError("DeliveryFailure", `cannot start ${command}: ${describe(error)}`, {
            stage: "delivery",
            cause: error,
          })
        );
        return;
      }

      const exited = new Promise<number>((resolveExit) => {
        child.once("exit", (code, signal) => resolveExit(code ?? (signal ? 128 : 1)));
      });

      child.once("error", (error) => {
        reject(
          new CredentialError("DeliveryFailure", `cannot start ${command}: ${error.message}`, {
            stage: "delivery",
            cause: error,
          })
        );
      });
      child.once("spawn", () => resolve({ kind: "exec", pid: child.pid, exited }));
    });
  }
}
