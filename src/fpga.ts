/**
 * FPGA board targets, their runner labels and runner naming
 */

import * as crypto from "crypto";
import { CredentialError } from "./errors.js";

export const FPGA_TARGETS = ["zcu104", "zcu104-nightly", "vck190"] as const;

export type FpgaTarget = (typeof FPGA_TARGETS)[number];

export function parseFpgaTarget(value: string): FpgaTarget {
  const normalized = value.toLowerCase();
  const target = FPGA_TARGETS.find((t) => t === normalized);
  if (!target) {
    throw new CredentialError(
      "InvalidConfiguration",
      `Invalid fpga target: '${value}'. Must be one of ${FPGA_TARGETS.map((t) => `'${t}'`).join(", ")}.`,
      { stage: "config" }
    );
  }
  return target;
}

/** Board family prefix used in runner names */
export function boardType(target: FpgaTarget): string {
  return target === "vck190" ? "vck190" : "caliptra-fpga";
}

/**
 * Labels workflows route jobs by. Staging only changes the vck190 label;
 * zcu104 boards share one label in every stage.
 */
export function labelsFor(target: FpgaTarget, staging: boolean): string[] {
  switch (target) {
    case "zcu104":
      return ["caliptra-fpga"];
    case "zcu104-nightly":
      return ["caliptra-fpga", "caliptra-fpga-nightly"];
    case "vck190":
      return [staging ? "vck190-staging" : "vck190"];
  }
}

export interface RunnerNameParams {
  target: FpgaTarget;
  /** Board number within the lab */
  identifier: string;
  /** Physical location, e.g. "kir" */
  location: string;
  /** Append a random hex postfix and the date */
  uniqueSuffix?: boolean;
  now?: Date;
  random?: () => number;
}

function formatDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * `<board>-<location>-<identifier>`, stable for a physical board. With
 * `uniqueSuffix`, `-<16 hex>-<YYYY-MM-DD>` is added so a board whose old
 * runner was never cleaned up can still register.
 */
export function runnerName(params: RunnerNameParams): string {
  const base = `${boardType(params.target)}-${params.location}-${params.identifier}`;
  if (!params.uniqueSuffix) return base;

  const random = params.random ?? (() => crypto.randomInt(16) / 16);
  let postfix = "";
  for (let i = 0; i < 16; i++) {
    postfix += Math.floor(random() * 16).toString(16).toUpperCase();
  }
  return `${base}-${postfix}-${formatDate(params.now ?? new Date())}`;
}
