import { createHash } from "node:crypto";

import { Inject, Injectable, Logger } from "@nestjs/common";

import { LedgerClient } from "../clients/ledger.client.js";
import { describeError } from "../errors.js";
import type { LedgerOutcome } from "../types.js";

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => (item === undefined ? null : sortKeys(item)));
  }
  if (value !== null && typeof value === "object" && !(value instanceof Date)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const member: unknown = Reflect.get(value, key);
      if (member !== undefined) {
        sorted[key] = sortKeys(member);
      }
    }
    return sorted;
  }
  return value;
}

/** JSON with object keys sorted at every depth and no whitespace. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value)) ?? "null";
}

export function computeProofHash(value: unknown): string {
  return createHash("sha256").update(canonicalJson(value), "utf8").digest("hex");
}

export interface StampResult {
  proofHash: string;
  receipt: LedgerOutcome;
}

@Injectable()
export class IntegrityStamper {
  private readonly logger = new Logger(IntegrityStamper.name);

  constructor(@Inject(LedgerClient) private readonly ledger: LedgerClient) {}

  /** The hash is always produced; the ledger receipt is best effort. */
  async stamp(bundle: object): Promise<StampResult> {
    const proofHash = computeProofHash(bundle);
    try {
      const receipt = await this.ledger.logProofHash(`0x${proofHash}`);
      return { proofHash, receipt };
    } catch (error) {
      this.logger.error(`Ledger logging failed for ${proofHash}: ${describeError(error)}`);
      return { proofHash, receipt: { error: describeError(error) } };
    }
  }
}
