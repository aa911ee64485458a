/**
 * Controller-side handle on the JSON side channel. Code running on the peer
 * writes key/value pairs into the file named by REMOTE_EXEC_JSON_PIPE_FILE;
 * the controller reads them back once the command has returned.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

export const JSON_PIPE_ENV = 'REMOTE_EXEC_JSON_PIPE_FILE';
export const DEFAULT_PIPE_FILE_NAME = 'remote_exec_output_pipe.json';

const PipeDocumentSchema = z.record(z.unknown());

export type PipeDocument = z.infer<typeof PipeDocumentSchema>;

export function defaultPipePath(): string {
  return process.env[JSON_PIPE_ENV] ?? path.join(os.tmpdir(), DEFAULT_PIPE_FILE_NAME);
}

function isJsonValue(value: unknown): boolean {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (value === null) return true;
      if (Array.isArray(value)) return value.every(isJsonValue);
      if (Object.getPrototypeOf(value) !== Object.prototype) return false;
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

export class JsonOutputPipe {
  readonly path: string;

  constructor(filePath?: string) {
    this.path = filePath ?? defaultPipePath();
  }

  private async save(document: PipeDocument): Promise<void> {
    await fs.mkdir(path.dirname(this.path), { recursive: true });
    await fs.writeFile(this.path, JSON.stringify(document), 'utf-8');
  }

  /** Reset the file to an empty document. */
  async flush(): Promise<void> {
    await this.save({});
  }

  /** Values JSON cannot represent are stored as their string form. */
  async write(key: string, value: unknown): Promise<void> {
    const document = await this.readAll();
    document[key] = isJsonValue(value) ? value : String(value);
    await this.save(document);
  }

  async read(key: string, defaultValue?: unknown): Promise<unknown> {
    const document = await this.readAll();
    return Object.prototype.hasOwnProperty.call(document, key) ? document[key] : defaultValue;
  }

  /** A missing file, or one that is not a JSON object, reads as empty. */
  async readAll(): Promise<PipeDocument> {
    let text: string;
    try {
      text = await fs.readFile(this.path, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {};
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      return {};
    }
    const parsed = PipeDocumentSchema.safeParse(raw);
    return parsed.success ? parsed.data : {};
  }
}
