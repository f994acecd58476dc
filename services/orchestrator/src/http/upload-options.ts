import { randomUUID } from "node:crypto";
import { mkdir } from "node:fs/promises";
import path from "node:path";

import type { MulterModuleOptions } from "@nestjs/platform-express";
import multer from "multer";

import type { AppConfig } from "../config.js";

/** Keeps letters, digits, dots, dashes and underscores of the base name. */
export function sanitizeFileName(originalName: string): string {
  const base = path.basename(originalName.replace(/\\/g, "/"));
  const cleaned = base
    .replace(/\s+/g, "_")
    .replace(/[^A-Za-z0-9._-]/g, "")
    .replace(/^[._]+/, "");
  return cleaned || "upload";
}

export function buildMulterOptions(config: Pick<AppConfig, "uploadDir" | "maxUploadFiles">): MulterModuleOptions {
  const destination = path.resolve(config.uploadDir);
  return {
    storage: multer.diskStorage({
      destination: (_req, _file, callback) => {
        mkdir(destination, { recursive: true }).then(
          () => callback(null, destination),
          (error: Error) => callback(error, destination),
        );
      },
      filename: (_req, file, callback) => {
        callback(null, `${randomUUID()}-${sanitizeFileName(file.originalname)}`);
      },
    }),
    limits: { files: config.maxUploadFiles },
  };
}
