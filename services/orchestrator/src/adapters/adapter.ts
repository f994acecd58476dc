import type { MediaCategory, ReportByCategory, SourceFile } from "../types.js";
import { describeError } from "../errors.js";

export type AnalysisOutcome<C extends MediaCategory> =
  | { ok: true; report: ReportByCategory[C]; evidenceText?: string }
  | { ok: false; error: string };

export interface AnalysisAdapter<C extends MediaCategory> {
  readonly category: C;
  /** `signal` fires when the caller stops waiting; remote calls should stop with it. */
  analyze(file: SourceFile, signal?: AbortSignal): Promise<AnalysisOutcome<C>>;
}

export type AdapterRegistry = {
  [C in MediaCategory]: AnalysisAdapter<C>;
};

export function succeeded<C extends MediaCategory>(
  report: ReportByCategory[C],
  evidenceText?: string,
): AnalysisOutcome<C> {
  return evidenceText === undefined ? { ok: true, report } : { ok: true, report, evidenceText };
}

export function failed<C extends MediaCategory>(error: unknown): AnalysisOutcome<C> {
  return { ok: false, error: describeError(error) };
}
