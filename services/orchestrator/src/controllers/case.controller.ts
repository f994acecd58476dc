import { Controller, Get, Inject, NotFoundException, Param } from "@nestjs/common";

import type { CaseRecord } from "../repository/case.repository.js";
import { VerificationService } from "../services/verification.service.js";

export interface CaseResponse extends Omit<CaseRecord, "createdAt"> {
  createdAt: string;
}

@Controller("cases")
export class CaseController {
  constructor(
    @Inject(VerificationService)
    private readonly verificationService: VerificationService,
  ) {}

  @Get(":caseId")
  async getCase(@Param("caseId") caseId: string): Promise<CaseResponse> {
    const record = await this.verificationService.getCase(caseId);
    if (!record) {
      throw new NotFoundException(`case not found: ${caseId}`);
    }
    return { ...record, createdAt: record.createdAt.toISOString() };
  }
}
