import { randomUUID } from "node:crypto";

import { Inject, Injectable, Logger } from "@nestjs/common";

import type { AdapterRegistry, AnalysisAdapter, AnalysisOutcome } from "../adapters/adapter.js";
import type { AppConfig } from "../config.js";
import { aggregateEvidence } from "../engine/aggregator.js";
import { bucketFiles, classify, toSourceFiles } from "../engine/classifier.js";
import { IntegrityStamper } from "../engine/integrity.js";
import { MetaSynthesizer } from "../engine/meta-synthesizer.js";
import { parsePriorityOrder } from "../engine/priority.js";
import { DispatchScheduler, runWithDeadline } from "../engine/scheduler.js";
import {
  AdapterTimeoutError,
  describeError,
  ProviderError,
  UnsupportedMediaError,
} from "../errors.js";
import type { CaseFile, CaseRecord, CaseRepository } from "../repository/case.repository.js";
import type { StorageService } from "../storage/storage.service.js";
import type {
  FinalBundle,
  MediaCategory,
  ReportByCategory,
  SourceFile,
  StampableBundle,
  VerificationDetails,
  VerificationReport,
} from "../types.js";
import { ADAPTER_REGISTRY, APP_CONFIG, CASE_REPOSITORY, STORAGE_SERVICE } from "../tokens.js";

export interface UploadedEvidence {
  path: string;
  displayName: string;
}

export interface SessionRequest {
  files: UploadedEvidence[];
  instructions?: string;
  sessionId?: string;
}

interface Assessment {
  verdict: string;
  authenticityScore: number;
  details: VerificationDetails;
}

@Injectable()
export class VerificationService {
  private readonly logger = new Logger(VerificationService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(ADAPTER_REGISTRY) private readonly adapters: AdapterRegistry,
    @Inject(DispatchScheduler) private readonly scheduler: DispatchScheduler,
    @Inject(MetaSynthesizer) private readonly synthesizer: MetaSynthesizer,
    @Inject(IntegrityStamper) private readonly stamper: IntegrityStamper,
    @Inject(STORAGE_SERVICE) private readonly storage: StorageService,
    @Inject(CASE_REPOSITORY) private readonly repository: CaseRepository,
  ) {}

  /**
   * Multi-file session: classify, dispatch, aggregate, synthesize, stamp.
   * Storage and persistence happen afterwards and never fail the session.
   */
  async runSession(request: SessionRequest): Promise<FinalBundle> {
    const sessionId = request.sessionId ?? randomUUID();
    const instructions = request.instructions ?? "";
    this.logger.log(`Session ${sessionId} started with ${request.files.length} file(s)`);

    const sources = toSourceFiles(request.files);
    const skipped = request.files.length - sources.length;
    if (skipped > 0) {
      this.logger.log(`Session ${sessionId}: ${skipped} unsupported file(s) skipped`);
    }

    const priorityOrder = parsePriorityOrder(instructions);
    const results = await this.scheduler.dispatch(bucketFiles(sources), priorityOrder);
    const evidence = aggregateEvidence(sessionId, results);
    const meta = await this.synthesizer.synthesize(
      evidence.aggregateText,
      instructions,
      evidence.fileSummaries,
    );

    const merged: StampableBundle = { ...evidence, ...meta };
    const { proofHash, receipt } = await this.stamper.stamp(merged);
    const bundle: FinalBundle = { ...merged, proofHash, blockchainTx: receipt };

    const files = await this.storeFiles(sessionId, request.files);
    await this.persist({
      caseId: sessionId,
      status: "completed",
      files,
      output: bundle,
      createdAt: new Date(),
    });

    this.logger.log(`Session ${sessionId} completed (proof ${proofHash})`);
    return bundle;
  }

  /** Single-file verification; provider failures surface as errors instead of inline entries. */
  async verifyFile(upload: UploadedEvidence): Promise<VerificationReport> {
    const category = classify(upload.displayName);
    if (category === "unsupported") {
      throw new UnsupportedMediaError(upload.displayName);
    }
    const file: SourceFile = { path: upload.path, displayName: upload.displayName, category };
    const caseId = randomUUID();

    const assessment = await this.assess(file);
    const content = { fileName: file.displayName, category, ...assessment };
    const { proofHash, receipt } = await this.stamper.stamp(content);

    const [stored] = await this.storeFiles(caseId, [upload]);
    const report: VerificationReport = { caseId, ...content, proofHash, blockchainTx: receipt };
    if (stored?.storageLocation) {
      report.storageLocation = stored.storageLocation;
    }

    await this.persist({
      caseId,
      status: "completed",
      files: stored ? [stored] : [],
      output: report,
      createdAt: new Date(),
    });
    return report;
  }

  async getCase(caseId: string): Promise<CaseRecord | undefined> {
    return this.repository.find(caseId);
  }

  private async assess(file: SourceFile): Promise<Assessment> {
    this.logger.log(`Running ${file.category} pipeline: ${file.displayName}`);
    switch (file.category) {
      case "image": {
        const report = await this.analyzeOne(this.adapters.image, file);
        return {
          verdict: report.verdict,
          authenticityScore: report.authenticityScore,
          details: { fileType: "Image", fullAnalysis: report },
        };
      }
      case "audio": {
        const report = await this.analyzeOne(this.adapters.audio, file);
        return {
          verdict: "Audio Processed",
          authenticityScore: 0,
          details: {
            fileType: "Audio",
            transcriptId: report.transcriptId,
            fullTranscript: report.text,
          },
        };
      }
      case "video": {
        const report = await this.analyzeOne(this.adapters.video, file);
        return {
          verdict: report.verdict,
          authenticityScore: report.authenticityScore,
          details: { fileType: "Video", analysis: report.frameAnalysis, metadata: report.metadata },
        };
      }
      case "document": {
        const report = await this.analyzeOne(this.adapters.document, file);
        const danger = report.misinformationAnalysis.dangerScore;
        return {
          verdict: `Danger Score: ${danger}/100`,
          authenticityScore: (100 - danger) / 100,
          details: { fileType: "Document", analysis: report },
        };
      }
    }
  }

  private async analyzeOne<C extends MediaCategory>(
    adapter: AnalysisAdapter<C>,
    file: SourceFile,
  ): Promise<ReportByCategory[C]> {
    const label = `${adapter.category} analysis of ${file.displayName}`;
    let outcome: AnalysisOutcome<C>;
    try {
      outcome = await runWithDeadline(
        (signal) => adapter.analyze(file, signal),
        this.config.adapterTimeoutMs,
        label,
      );
    } catch (error) {
      if (error instanceof AdapterTimeoutError) {
        throw new ProviderError(adapter.category, error.message);
      }
      throw error;
    }
    if (!outcome.ok) {
      throw new ProviderError(adapter.category, outcome.error);
    }
    return outcome.report;
  }

  private async storeFiles(folder: string, uploads: readonly UploadedEvidence[]): Promise<CaseFile[]> {
    const files: CaseFile[] = [];
    for (const upload of uploads) {
      try {
        const stored = await this.storage.store(upload.path, upload.displayName, folder);
        files.push({ fileName: upload.displayName, storageLocation: stored.location });
      } catch (error) {
        this.logger.warn(`Storing ${upload.displayName} failed: ${describeError(error)}`);
        files.push({ fileName: upload.displayName });
      }
    }
    return files;
  }

  private async persist(record: CaseRecord): Promise<void> {
    try {
      await this.repository.save(record);
    } catch (error) {
      this.logger.error(`Persisting case ${record.caseId} failed: ${describeError(error)}`);
    }
  }
}
