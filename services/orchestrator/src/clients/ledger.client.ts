import { Inject, Injectable, Logger } from "@nestjs/common";
import { z } from "zod";

import type { AppConfig } from "../config.js";
import type { LedgerReceipt } from "../types.js";
import { APP_CONFIG } from "../tokens.js";
import { callProvider, joinUrl, readJson } from "./http.js";

const receiptSchema = z.object({
  txHash: z.string().min(1),
  chainId: z.union([z.string(), z.number()]),
});

const PROVIDER = "ledger";

export const STUB_CHAIN_ID = "STUB_TESTNET";

@Injectable()
export class LedgerClient {
  private readonly logger = new Logger(LedgerClient.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  /**
   * Records a `0x`-prefixed proof hash. Without a configured gateway a stub
   * receipt is returned so reports still carry a receipt shape.
   */
  async logProofHash(proofHash: string): Promise<LedgerReceipt> {
    const settings = this.config.ledger;
    if (!settings.url) {
      this.logger.log(`Ledger not configured; stub receipt for ${proofHash}`);
      return {
        txHash: `mock_tx_${proofHash.slice(0, 18)}`,
        chainId: STUB_CHAIN_ID,
        proofHash,
      };
    }

    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (settings.apiKey) {
      headers.Authorization = `Bearer ${settings.apiKey}`;
    }

    const body = await callProvider(
      joinUrl(settings.url, "proofs"),
      { method: "POST", headers, body: JSON.stringify({ proofHash }) },
      { provider: PROVIDER, timeoutMs: settings.timeoutMs },
      (response) => readJson(PROVIDER, response),
    );
    const receipt = receiptSchema.parse(body);
    return {
      txHash: receipt.txHash,
      chainId: receipt.chainId,
      proofHash,
      success: true,
    };
  }
}
