export type MediaCategory = "image" | "audio" | "video" | "document";

export type Classification = MediaCategory | "unsupported";

export interface SourceFile {
  readonly path: string;
  readonly displayName: string;
  readonly category: MediaCategory;
}

export type PriorityOrder = readonly MediaCategory[];

export type FileBuckets = Record<MediaCategory, SourceFile[]>;

export interface ImageReport {
  verdict: string;
  authenticityScore: number;
  tamperingPercentage: number;
  explanation: string;
}

export interface TranscriptUtterance {
  speaker: string;
  text: string;
  start?: number;
  end?: number;
}

export interface SentimentResult {
  text: string;
  sentiment: string;
  confidence?: number;
}

export interface AudioReport {
  transcriptId: string;
  text: string;
  utterances: TranscriptUtterance[];
  sentiment: SentimentResult[];
}

export interface FrameAnalysis {
  framesAnalyzed: number;
  fakeFramesCount: number;
  fakeRatioPercent: number;
  maxFakeScore: number;
  strategy: string;
}

export interface VideoMetadata {
  durationSec: number;
  fps: number;
  totalFrames: number;
  resolution: string;
}

export interface VideoReport {
  verdict: "Tampering Detected" | "Likely Original";
  authenticityScore: number;
  frameAnalysis: FrameAnalysis;
  metadata: VideoMetadata;
}

export interface RiskFlag {
  claim: string;
  reasoning: string;
}

export interface DocumentRiskReport {
  misinformationAnalysis: {
    dangerScore: number;
    flags: RiskFlag[];
    explanation: string;
  };
  summary: string;
  toneAnalysis?: { detectedTone: string };
  contentAnalysis?: {
    sensitiveInfo: Array<{ type: string; text: string }>;
    inappropriateContent: string[];
  };
  keywordDetection?: {
    keywordsFound: Array<{ keyword: string; context: string }>;
  };
  factChecking?: {
    claims: Array<{ claim: string; verification: string; source: string }>;
  };
  finalReport: {
    findings: string;
    recommendations: string;
  };
}

export interface ReportByCategory {
  image: ImageReport;
  audio: AudioReport;
  video: VideoReport;
  document: DocumentRiskReport;
}

export interface FileResultOf<C extends MediaCategory> {
  fileName: string;
  category: C;
  report?: ReportByCategory[C];
  error?: string;
  rawEvidenceText?: string;
}

export type FileResult = {
  [C in MediaCategory]: FileResultOf<C>;
}[MediaCategory];

export interface EvidenceBundle {
  sessionId: string;
  results: FileResult[];
  aggregateText: string;
  fileSummaries: string[];
}

export interface MetaReport {
  finalSummary: string;
  entities: unknown[];
  relations: unknown[];
}

export interface LedgerReceipt {
  txHash: string;
  chainId: string | number;
  proofHash: string;
  success?: boolean;
}

export type LedgerOutcome = LedgerReceipt | { error: string };

export type StampableBundle = EvidenceBundle & MetaReport;

export interface FinalBundle extends StampableBundle {
  proofHash: string;
  blockchainTx?: LedgerOutcome;
}

export interface VerificationDetails {
  fileType: "Image" | "Audio" | "Video" | "Document";
  [key: string]: unknown;
}

export interface VerificationReport {
  caseId: string;
  fileName: string;
  category: MediaCategory;
  verdict: string;
  authenticityScore: number;
  details: VerificationDetails;
  proofHash: string;
  blockchainTx: LedgerOutcome;
  storageLocation?: string;
}
