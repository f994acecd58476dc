import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Inject,
  Post,
  UploadedFile,
  UploadedFiles,
  UseFilters,
  UseInterceptors,
  ValidationPipe,
} from "@nestjs/common";
import { FileInterceptor, FilesInterceptor } from "@nestjs/platform-express";

import { SessionResponseDto } from "../dto/verification-response.dto.js";
import { VerifySessionDto } from "../dto/verify-session.dto.js";
import { DomainErrorFilter } from "../http/domain-error.filter.js";
import { sanitizeFileName } from "../http/upload-options.js";
import { VerificationService, type UploadedEvidence } from "../services/verification.service.js";
import type { VerificationReport } from "../types.js";

function toEvidence(file: Express.Multer.File): UploadedEvidence {
  return { path: file.path, displayName: sanitizeFileName(file.originalname) };
}

@Controller("verify")
@UseFilters(DomainErrorFilter)
export class VerifyController {
  constructor(
    @Inject(VerificationService)
    private readonly verificationService: VerificationService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor("file"))
  async verify(@UploadedFile() file: Express.Multer.File | undefined): Promise<VerificationReport> {
    if (!file) {
      throw new BadRequestException("No file uploaded");
    }
    return this.verificationService.verifyFile(toEvidence(file));
  }

  @Post("session")
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FilesInterceptor("files"))
  async verifySession(
    @UploadedFiles() files: Express.Multer.File[] | undefined,
    @Body(new ValidationPipe({ expectedType: VerifySessionDto, whitelist: true }))
    body: VerifySessionDto,
  ): Promise<SessionResponseDto> {
    if (!files || files.length === 0) {
      throw new BadRequestException("No files uploaded");
    }
    const metaReport = await this.verificationService.runSession({
      files: files.map(toEvidence),
      instructions: body.instructions,
    });
    return { status: "success", metaReport };
  }
}
