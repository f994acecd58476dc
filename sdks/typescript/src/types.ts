export type MediaCategory = 'image' | 'audio' | 'video' | 'document';

export interface UploadFile {
  name: string;
  data: Blob | Uint8Array;
  contentType?: string;
}

export interface LedgerReceipt {
  txHash: string;
  chainId: string | number;
  proofHash: string;
  success?: boolean;
}

export type LedgerOutcome = LedgerReceipt | { error: string };

export interface VerificationReport {
  caseId: string;
  fileName: string;
  category: MediaCategory;
  verdict: string;
  authenticityScore: number;
  details: { fileType: string; [key: string]: unknown };
  proofHash: string;
  blockchainTx: LedgerOutcome;
  storageLocation?: string;
}

export interface FileResult {
  fileName: string;
  category: MediaCategory;
  report?: Record<string, unknown>;
  error?: string;
  rawEvidenceText?: string;
}

export interface FinalBundle {
  sessionId: string;
  results: FileResult[];
  aggregateText: string;
  fileSummaries: string[];
  finalSummary: string;
  entities: unknown[];
  relations: unknown[];
  proofHash: string;
  blockchainTx?: LedgerOutcome;
}

export interface SessionResponse {
  status: 'success';
  metaReport: FinalBundle;
}

export interface CaseRecord {
  caseId: string;
  status: 'completed';
  files: Array<{ fileName: string; storageLocation?: string }>;
  output: FinalBundle | VerificationReport;
  createdAt: string;
}
