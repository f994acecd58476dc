import { Injectable } from "@nestjs/common";

import type { CaseRecord, CaseRepository } from "./case.repository.js";

@Injectable()
export class InMemoryCaseRepository implements CaseRepository {
  private readonly store = new Map<string, CaseRecord>();

  async save(record: CaseRecord): Promise<void> {
    this.store.set(record.caseId, structuredClone(record));
  }

  async find(caseId: string): Promise<CaseRecord | undefined> {
    const value = this.store.get(caseId);
    return value ? structuredClone(value) : undefined;
  }
}
