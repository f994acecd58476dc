import { Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import { Pool } from "pg";

import type { CaseFile, CaseRecord, CaseRepository } from "./case.repository.js";

type CaseRow = {
  case_id: string;
  status: string;
  files: CaseFile[];
  output: CaseRecord["output"];
  created_at: Date;
};

@Injectable()
export class PostgresCaseRepository implements CaseRepository, OnModuleDestroy {
  private readonly logger = new Logger(PostgresCaseRepository.name);
  private readonly pool: Pool;
  private initialized = false;

  constructor(databaseUrl: string) {
    this.pool = new Pool({ connectionString: databaseUrl });
  }

  async init(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS cases (
        case_id TEXT PRIMARY KEY,
        status TEXT NOT NULL,
        files JSONB NOT NULL,
        output JSONB NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    this.initialized = true;
    this.logger.log("Postgres case repository ready");
  }

  async save(record: CaseRecord): Promise<void> {
    if (!this.initialized) {
      await this.init();
    }
    await this.pool.query(
      `INSERT INTO cases (case_id, status, files, output, created_at)
       VALUES ($1, $2, $3::jsonb, $4::jsonb, $5)
       ON CONFLICT (case_id) DO UPDATE SET
         status = EXCLUDED.status,
         files = EXCLUDED.files,
         output = EXCLUDED.output,
         created_at = EXCLUDED.created_at`,
      [
        record.caseId,
        record.status,
        JSON.stringify(record.files),
        JSON.stringify(record.output),
        record.createdAt,
      ],
    );
  }

  async find(caseId: string): Promise<CaseRecord | undefined> {
    if (!this.initialized) {
      await this.init();
    }
    const result = await this.pool.query<CaseRow>(
      `SELECT case_id, status, files, output, created_at
       FROM cases
       WHERE case_id = $1`,
      [caseId],
    );
    const row = result.rows[0];
    if (!row) {
      return undefined;
    }
    return {
      caseId: row.case_id,
      status: "completed",
      files: row.files,
      output: row.output,
      createdAt: new Date(row.created_at),
    };
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
  }
}
