/**
 * Cloud Storage file enumeration
 *
 * Expands a `gs://bucket/glob` pattern into a lazy sequence of file handles.
 *
 * @module @dicom-it/connectors/storage/gcs-file-matcher
 */

import { Storage } from '@google-cloud/storage';
import { ConfigurationError, type ILogger, NoOpLogger } from '@dicom-it/core';

/**
 * A matched object, read in full on demand
 */
export interface MatchedFile {
  /** `gs://bucket/object` */
  readonly path: string;
  readonly size?: number;
  read(): Promise<Buffer>;
}

/**
 * File enumeration contract
 */
export interface FileMatcher {
  match(pattern: string): AsyncIterable<MatchedFile>;
}

/**
 * The slice of `File` the matcher uses
 */
export interface StorageFileLike {
  name: string;
  metadata?: { size?: string | number };
  download(): Promise<[Buffer]>;
}

/**
 * The slice of `Bucket` the matcher uses
 */
export interface StorageBucketLike {
  getFiles(query: { matchGlob?: string; autoPaginate?: boolean }): Promise<[StorageFileLike[], ...unknown[]]>;
}

export interface StorageLike {
  bucket(name: string): StorageBucketLike;
}

export interface GsUri {
  bucket: string;
  object: string;
}

/**
 * Split `gs://bucket/path` into bucket and object
 */
export function parseGsUri(uri: string): GsUri {
  const match = /^gs:\/\/([^/]+)\/(.*)$/.exec(uri);
  if (!match || match[2].length === 0) {
    throw new ConfigurationError(`Not a gs:// object pattern: ${uri}`, [
      { field: 'pattern', message: 'Expected gs://bucket/path' },
    ]);
  }
  return { bucket: match[1], object: match[2] };
}

export class GcsFileMatcher implements FileMatcher {
  private readonly logger: ILogger;

  constructor(
    private readonly storage: StorageLike = new Storage(),
    logger?: ILogger
  ) {
    this.logger = (logger ?? new NoOpLogger()).child({ component: 'gcs-matcher' });
  }

  async *match(pattern: string): AsyncIterable<MatchedFile> {
    const { bucket, object } = parseGsUri(pattern);
    const [files] = await this.storage.bucket(bucket).getFiles({ matchGlob: object, autoPaginate: true });

    this.logger.info('Matched files', { pattern, count: files.length });

    for (const file of files) {
      // Directory placeholder objects
      if (file.name.endsWith('/')) {
        continue;
      }
      yield toMatchedFile(bucket, file);
    }
  }
}

function toMatchedFile(bucket: string, file: StorageFileLike): MatchedFile {
  const size = file.metadata?.size;
  return {
    path: `gs://${bucket}/${file.name}`,
    size: size === undefined ? undefined : Number(size),
    async read(): Promise<Buffer> {
      const [contents] = await file.download();
      return contents;
    },
  };
}

/**
 * Drain a match into an array
 */
export async function collectMatches(matches: AsyncIterable<MatchedFile>): Promise<MatchedFile[]> {
  const files: MatchedFile[] = [];
  for await (const file of matches) {
    files.push(file);
  }
  return files;
}
