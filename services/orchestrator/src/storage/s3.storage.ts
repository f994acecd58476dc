import { readFile } from "node:fs/promises";

import { PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { Injectable, Logger } from "@nestjs/common";

import type { ObjectStorageConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";
import type { StorageService, StoredFile } from "./storage.service.js";

const CONTENT_TYPES: Readonly<Record<string, string>> = {
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  gif: "image/gif",
  mp4: "video/mp4",
  mov: "video/quicktime",
  avi: "video/x-msvideo",
  mkv: "video/x-matroska",
  mp3: "audio/mpeg",
  wav: "audio/wav",
  m4a: "audio/mp4",
  txt: "text/plain",
  pdf: "application/pdf",
  docx: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
};

export function contentTypeFor(name: string): string {
  const ext = name.includes(".") ? (name.split(".").pop() ?? "").toLowerCase() : "";
  return CONTENT_TYPES[ext] ?? "application/octet-stream";
}

@Injectable()
export class S3StorageService implements StorageService {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly logger = new Logger(S3StorageService.name);

  constructor(private readonly config: ObjectStorageConfig) {
    if (!config.bucket) {
      throw new ConfigurationError("OBJECT_BUCKET must be configured");
    }
    this.bucket = config.bucket;

    this.client = new S3Client({
      region: config.region ?? "us-east-1",
      endpoint: config.endpoint,
      forcePathStyle: Boolean(config.endpoint),
      credentials: config.accessKeyId && config.secretAccessKey
        ? {
          accessKeyId: config.accessKeyId,
          secretAccessKey: config.secretAccessKey,
        }
        : undefined,
    });
  }

  async store(localPath: string, name: string, folder: string): Promise<StoredFile> {
    const body = await readFile(localPath);
    const key = this.buildKey(folder, name);
    await this.client.send(new PutObjectCommand({
      Bucket: this.bucket,
      Key: key,
      Body: body,
      ContentType: contentTypeFor(name),
    }));
    this.logger.log(`Stored ${name} in bucket ${this.bucket}`);
    return {
      name,
      folder,
      size: body.length,
      location: `s3://${this.bucket}/${key}`,
    };
  }

  buildKey(folder: string, name: string): string {
    const prefix = this.config.prefix ? `${this.config.prefix.replace(/\/$/, "")}/` : "";
    return `${prefix}${folder}/${name}`;
  }
}
