import type { FinalBundle, VerificationReport } from "../types.js";

export interface CaseFile {
  fileName: string;
  storageLocation?: string;
}

export interface CaseRecord {
  caseId: string;
  status: "completed";
  files: CaseFile[];
  output: FinalBundle | VerificationReport;
  createdAt: Date;
}

export interface CaseRepository {
  save(record: CaseRecord): Promise<void>;
  find(caseId: string): Promise<CaseRecord | undefined>;
}
