/**
 * Test helpers: temporary trees, archive reading, log capture
 */

import { createReadStream } from 'node:fs';
import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { createGunzip } from 'node:zlib';
import { pino } from 'pino';
import { extract, type Headers } from 'tar-stream';
import type { Logger } from '@jarpack/utils';

export async function makeTempDir(label: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `jarpack-${label}-`));
}

export async function writeFixture(path: string, content: string): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content);
  return path;
}

export interface TarEntry {
  header: Headers;
  content: string;
}

export function readTarGz(archivePath: string): Promise<TarEntry[]> {
  return new Promise((resolve, reject) => {
    const entries: TarEntry[] = [];
    const extractor = extract();

    extractor.on('entry', (header, stream, next) => {
      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => chunks.push(chunk));
      stream.on('end', () => {
        entries.push({ header, content: Buffer.concat(chunks).toString('utf8') });
        next();
      });
    });
    extractor.on('finish', () => resolve(entries));
    extractor.on('error', reject);

    const gunzip = createGunzip();
    gunzip.on('error', reject);
    createReadStream(archivePath).on('error', reject).pipe(gunzip).pipe(extractor);
  });
}

export interface CapturedLog {
  level: number;
  msg: string;
}

/**
 * Logger that keeps every record in memory
 */
export function captureLogger(): { logger: Logger; records: CapturedLog[] } {
  const records: CapturedLog[] = [];
  const logger = pino({ level: 'debug' }, {
    write(line: string) {
      const parsed: unknown = JSON.parse(line);
      if (typeof parsed === 'object' && parsed !== null && 'level' in parsed && 'msg' in parsed) {
        records.push({ level: Number(parsed.level), msg: String(parsed.msg) });
      }
    },
  });
  return { logger, records };
}

export const WARN = 40;
