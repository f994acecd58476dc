import { readFile } from "node:fs/promises";

import { Injectable } from "@nestjs/common";

import type { StorageService, StoredFile } from "./storage.service.js";

@Injectable()
export class InMemoryStorageService implements StorageService {
  private readonly records = new Map<string, StoredFile & { data: Buffer }>();

  async store(localPath: string, name: string, folder: string): Promise<StoredFile> {
    const data = await readFile(localPath);
    const key = `${folder}/${name}`;
    const record = {
      name,
      folder,
      size: data.length,
      data,
      location: `memory://${key}`,
    };
    this.records.set(key, record);
    return { name, folder, size: record.size, location: record.location };
  }

  get(folder: string, name: string): (StoredFile & { data: Buffer }) | undefined {
    return this.records.get(`${folder}/${name}`);
  }
}
