import { CaseRecord, SessionResponse, UploadFile, VerificationReport } from './types.js';

export interface ForensicsClientOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
  headers?: Record<string, string>;
}

function toBlob(file: UploadFile): Blob {
  if (file.data instanceof Blob) {
    return file.data;
  }
  return new Blob([new Uint8Array(file.data)], { type: file.contentType ?? 'application/octet-stream' });
}

export class ForensicsClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: ForensicsClientOptions) {
    if (!options.baseUrl) {
      throw new Error('baseUrl is required');
    }
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.defaultHeaders = options.headers ?? {};
  }

  async verifyFile(file: UploadFile): Promise<VerificationReport> {
    const form = new FormData();
    form.append('file', toBlob(file), file.name);

    const response = await this.fetchImpl(`${this.baseUrl}/verify`, {
      method: 'POST',
      headers: this.defaultHeaders,
      body: form,
    });

    if (!response.ok) {
      const body = await this.readErrorBody(response);
      throw new Error(`Verify request failed with ${response.status}: ${body}`);
    }

    return (await response.json()) as VerificationReport;
  }

  async verifySession(files: UploadFile[], instructions = ''): Promise<SessionResponse> {
    if (files.length === 0) {
      throw new Error('at least one file is required');
    }
    const form = new FormData();
    for (const file of files) {
      form.append('files', toBlob(file), file.name);
    }
    form.append('instructions', instructions);

    const response = await this.fetchImpl(`${this.baseUrl}/verify/session`, {
      method: 'POST',
      headers: this.defaultHeaders,
      body: form,
    });

    if (!response.ok) {
      const body = await this.readErrorBody(response);
      throw new Error(`Session request failed with ${response.status}: ${body}`);
    }

    return (await response.json()) as SessionResponse;
  }

  async getCase(caseId: string): Promise<CaseRecord> {
    if (!caseId) {
      throw new Error('caseId is required');
    }

    const response = await this.fetchImpl(`${this.baseUrl}/cases/${encodeURIComponent(caseId)}`, {
      method: 'GET',
      headers: this.defaultHeaders,
    });

    if (response.status === 404) {
      throw new Error('Case not found');
    }

    if (!response.ok) {
      const body = await this.readErrorBody(response);
      throw new Error(`Case request failed with ${response.status}: ${body}`);
    }

    return (await response.json()) as CaseRecord;
  }

  private async readErrorBody(response: Response): Promise<string> {
    try {
      const text = await response.text();
      return text || '<empty>';
    } catch (err) {
      return `<failed to read error body: ${String(err)}>`;
    }
  }
}

export * from './types.js';
