// src/services/courseSource.ts
// What: Loads raw course records for indexing and prepares them (validation + url dedupe).
// How: A CourseSource yields the raw JSON array produced by the scraping collaborator together with a SHA-256
//      content hash, which the rebuild scheduler compares against the published index. prepareRecords
//      applies the configured invalid-record and dedupe policies and logs every decision it takes.

import { createHash } from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import type { DedupePolicy, InvalidRecordPolicy } from '../config/env.js';
import { NotFoundError, ValidationError, errorMessage } from '../errors.js';
import type { Logger } from '../logging.js';
import type { CourseRecord } from '../models/types.js';
import { parseCourseRecord } from './normalizer.js';

export interface SourceSnapshot {
  records: unknown[];
  contentHash: string;
}

export interface CourseSource {
  describe(): string;
  load(): Promise<SourceSnapshot>;
}

export class JsonFileCourseSource implements CourseSource {
  private readonly filePath: string;

  constructor(filePath: string) {
    // Relative paths resolve against the project root at runtime.
    this.filePath = path.isAbsolute(filePath) ? filePath : path.resolve(process.cwd(), filePath);
  }

  describe(): string {
    return this.filePath;
  }

  async load(): Promise<SourceSnapshot> {
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(this.filePath);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        throw new NotFoundError(`Course data file not found: ${this.filePath}`);
      }
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(bytes.toString('utf8'));
    } catch (err) {
      throw new ValidationError(`Course data file ${this.filePath} is not valid JSON: ${errorMessage(err)}`);
    }
    if (!Array.isArray(json)) {
      throw new ValidationError(`Course data file ${this.filePath} must contain a JSON array`);
    }

    return {
      records: json,
      contentHash: createHash('sha256').update(bytes).digest('hex'),
    };
  }
}

export interface PrepareOptions {
  dedupe: DedupePolicy;
  invalidRecords: InvalidRecordPolicy;
}

export interface PreparedRecords {
  records: CourseRecord[];
  skippedInvalid: number;
  duplicatesDropped: number;
}

export function prepareRecords(raw: unknown[], options: PrepareOptions, logger: Logger): PreparedRecords {
  const valid: CourseRecord[] = [];
  let skippedInvalid = 0;

  raw.forEach((item, position) => {
    try {
      valid.push(parseCourseRecord(item));
    } catch (err) {
      if (!(err instanceof ValidationError) || options.invalidRecords === 'fail') {
        throw err instanceof ValidationError
          ? new ValidationError(`Course record at position ${position}: ${err.message}`, err.details)
          : err;
      }
      skippedInvalid += 1;
      logger.warn({ position, reason: err.message }, 'Skipping invalid course record');
    }
  });

  // Map keeps the position of a url's first appearance even when keep-last overwrites its value.
  const byUrl = new Map<string, CourseRecord>();
  for (const record of valid) {
    if (options.dedupe === 'keep-last' || !byUrl.has(record.url)) {
      byUrl.set(record.url, record);
    }
  }
  const duplicatesDropped = valid.length - byUrl.size;
  if (duplicatesDropped > 0) {
    logger.info({ duplicatesDropped, policy: options.dedupe }, 'Dropped duplicate course records by url');
  }

  return { records: [...byUrl.values()], skippedInvalid, duplicatesDropped };
}
