import { Inject, Injectable, Logger } from "@nestjs/common";
import pLimit from "p-limit";

import type { AdapterRegistry, AnalysisAdapter } from "../adapters/adapter.js";
import type { AppConfig } from "../config.js";
import { AdapterTimeoutError, describeError } from "../errors.js";
import type {
  FileBuckets,
  FileResult,
  FileResultOf,
  MediaCategory,
  PriorityOrder,
  SourceFile,
} from "../types.js";
import { ADAPTER_REGISTRY, APP_CONFIG } from "../tokens.js";

export type DispatchSettings = Pick<AppConfig, "maxConcurrency" | "adapterTimeoutMs">;

export function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new AdapterTimeoutError(label, timeoutMs)), timeoutMs);
  });
  return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
}

/**
 * Starts `start` with a fresh abort signal and bounds it by `timeoutMs`. On
 * timeout the signal fires and the returned promise rejects with the
 * `AdapterTimeoutError` only after the started work has settled, so a caller
 * holding a concurrency slot keeps it until the work has really stopped.
 */
export async function runWithDeadline<T>(
  start: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  const work = start(controller.signal);
  try {
    return await withTimeout(work, timeoutMs, label);
  } catch (error) {
    if (error instanceof AdapterTimeoutError) {
      controller.abort();
      await Promise.allSettled([work]);
    }
    throw error;
  }
}

@Injectable()
export class DispatchScheduler {
  private readonly logger = new Logger(DispatchScheduler.name);

  constructor(
    @Inject(ADAPTER_REGISTRY) private readonly adapters: AdapterRegistry,
    @Inject(APP_CONFIG) private readonly settings: DispatchSettings,
  ) {}

  /**
   * Runs every bucketed file through its adapter. Calls share one concurrency
   * limit; each call owns one slot of the returned array, so the output is in
   * priority-then-input order whatever order the calls finish in.
   */
  async dispatch(buckets: FileBuckets, priorityOrder: PriorityOrder): Promise<FileResult[]> {
    const limit = pLimit(this.settings.maxConcurrency);
    const queue = priorityOrder.flatMap((category) => buckets[category]);
    this.logger.log(
      `Dispatching ${queue.length} file(s) in order ${priorityOrder.join(" > ")}`,
    );
    return Promise.all(queue.map((file) => limit(() => this.runFile(file))));
  }

  runFile(file: SourceFile): Promise<FileResult> {
    switch (file.category) {
      case "image":
        return this.invoke(this.adapters.image, file);
      case "audio":
        return this.invoke(this.adapters.audio, file);
      case "video":
        return this.invoke(this.adapters.video, file);
      case "document":
        return this.invoke(this.adapters.document, file);
    }
  }

  private async invoke<C extends MediaCategory>(
    adapter: AnalysisAdapter<C>,
    file: SourceFile,
  ): Promise<FileResultOf<C>> {
    const base = { fileName: file.displayName, category: adapter.category };
    try {
      const outcome = await runWithDeadline(
        (signal) => adapter.analyze(file, signal),
        this.settings.adapterTimeoutMs,
        `${adapter.category} analysis of ${file.displayName}`,
      );
      if (!outcome.ok) {
        this.logger.warn(`${file.displayName} failed: ${outcome.error}`);
        return { ...base, error: outcome.error };
      }
      const result: FileResultOf<C> = { ...base, report: outcome.report };
      if (outcome.evidenceText !== undefined) {
        result.rawEvidenceText = outcome.evidenceText;
      }
      return result;
    } catch (error) {
      this.logger.error(`Pipeline failed for ${file.displayName}: ${describeError(error)}`);
      return { ...base, error: describeError(error) };
    }
  }
}
