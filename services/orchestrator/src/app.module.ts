import { Module } from "@nestjs/common";
import { MulterModule } from "@nestjs/platform-express";

import type { AdapterRegistry } from "./adapters/adapter.js";
import { AudioAdapter } from "./adapters/audio.adapter.js";
import { DocumentAdapter } from "./adapters/document.adapter.js";
import { ImageAdapter } from "./adapters/image.adapter.js";
import { VideoAdapter } from "./adapters/video.adapter.js";
import { LedgerClient } from "./clients/ledger.client.js";
import { GeminiLlmClient } from "./clients/llm.client.js";
import { TamperDetectionClient } from "./clients/tamper.client.js";
import { TranscriptionClient } from "./clients/transcription.client.js";
import type { AppConfig } from "./config.js";
import { ConfigModule } from "./config.module.js";
import { CaseController } from "./controllers/case.controller.js";
import { HealthController } from "./controllers/health.controller.js";
import { VerifyController } from "./controllers/verify.controller.js";
import { IntegrityStamper } from "./engine/integrity.js";
import { MetaSynthesizer } from "./engine/meta-synthesizer.js";
import { DispatchScheduler } from "./engine/scheduler.js";
import { buildMulterOptions } from "./http/upload-options.js";
import { FfmpegFrameSource } from "./media/video-frames.js";
import { InMemoryCaseRepository } from "./repository/memory.repository.js";
import { PostgresCaseRepository } from "./repository/postgres.repository.js";
import { ImageTamperService } from "./services/image-tamper.service.js";
import { VerificationService } from "./services/verification.service.js";
import { InMemoryStorageService } from "./storage/memory.storage.js";
import { S3StorageService } from "./storage/s3.storage.js";
import {
  ADAPTER_REGISTRY,
  APP_CONFIG,
  CASE_REPOSITORY,
  FRAME_SOURCE,
  LLM_CLIENT,
  STORAGE_SERVICE,
} from "./tokens.js";

const storageProvider = {
  provide: STORAGE_SERVICE,
  inject: [APP_CONFIG],
  useFactory: (config: AppConfig) => {
    if (config.objectStorage.bucket) {
      return new S3StorageService(config.objectStorage);
    }
    return new InMemoryStorageService();
  },
};

const repositoryProvider = {
  provide: CASE_REPOSITORY,
  inject: [APP_CONFIG],
  useFactory: async (config: AppConfig) => {
    if (config.database.url) {
      const repo = new PostgresCaseRepository(config.database.url);
      await repo.init();
      return repo;
    }
    return new InMemoryCaseRepository();
  },
};

const adapterRegistryProvider = {
  provide: ADAPTER_REGISTRY,
  inject: [ImageAdapter, AudioAdapter, VideoAdapter, DocumentAdapter],
  useFactory: (
    image: ImageAdapter,
    audio: AudioAdapter,
    video: VideoAdapter,
    document: DocumentAdapter,
  ): AdapterRegistry => ({ image, audio, video, document }),
};

@Module({
  imports: [
    ConfigModule,
    MulterModule.registerAsync({
      imports: [ConfigModule],
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => buildMulterOptions(config),
    }),
  ],
  controllers: [VerifyController, CaseController, HealthController],
  providers: [
    storageProvider,
    repositoryProvider,
    adapterRegistryProvider,
    { provide: LLM_CLIENT, useClass: GeminiLlmClient },
    { provide: FRAME_SOURCE, useClass: FfmpegFrameSource },
    TamperDetectionClient,
    TranscriptionClient,
    LedgerClient,
    ImageTamperService,
    ImageAdapter,
    AudioAdapter,
    VideoAdapter,
    DocumentAdapter,
    DispatchScheduler,
    MetaSynthesizer,
    IntegrityStamper,
    VerificationService,
  ],
})
export class AppModule {}
