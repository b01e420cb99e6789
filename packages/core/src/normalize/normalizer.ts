/**
 * Volatile-tag normalization
 *
 * Some tags differ between any two independent runs (the Retrieve URL embeds
 * the temporary store name, which embeds a timestamp). Both sides of every
 * comparison pass through here first.
 *
 * @module @dicom-it/core/normalize
 */

import type { DicomRecord } from '../types.js';

/**
 * Retrieve URL (0008,1190)
 */
export const DEFAULT_VOLATILE_TAGS: ReadonlySet<string> = new Set(['00081190']);

/**
 * Anything carrying a `result` array of records (a SearchResult, a
 * ground-truth container)
 */
export interface RecordContainer {
  result?: readonly DicomRecord[];
}

export type NormalizedCollection<T extends RecordContainer> = Omit<T, 'result'> & {
  result: DicomRecord[];
};

/**
 * Copy of `record` without any volatile tag
 */
export function normalizeRecord(
  record: DicomRecord,
  volatileTags: ReadonlySet<string> = DEFAULT_VOLATILE_TAGS
): DicomRecord {
  const normalized: DicomRecord = {};
  for (const [tag, value] of Object.entries(record)) {
    if (!volatileTags.has(tag)) {
      normalized[tag] = value;
    }
  }
  return normalized;
}

/**
 * Shallow copy of `container` with every record in `result` normalized.
 * A missing `result` becomes an empty array.
 */
export function normalizeCollection<T extends RecordContainer>(
  container: T,
  volatileTags: ReadonlySet<string> = DEFAULT_VOLATILE_TAGS
): NormalizedCollection<T> {
  const { result, ...rest } = container;
  const records: readonly DicomRecord[] = result ?? [];
  return {
    ...rest,
    result: records.map((record) => normalizeRecord(record, volatileTags)),
  };
}

export interface Normalizer {
  readonly volatileTags: ReadonlySet<string>;
  record(record: DicomRecord): DicomRecord;
  records(records: readonly DicomRecord[]): DicomRecord[];
  collection<T extends RecordContainer>(container: T): NormalizedCollection<T>;
}

/**
 * Bind a volatile-tag set
 */
export function createNormalizer(volatileTags: Iterable<string> = DEFAULT_VOLATILE_TAGS): Normalizer {
  const tags: ReadonlySet<string> = new Set(volatileTags);
  return {
    volatileTags: tags,
    record: (record) => normalizeRecord(record, tags),
    records: (records) => records.map((record) => normalizeRecord(record, tags)),
    collection<T extends RecordContainer>(container: T): NormalizedCollection<T> {
      return normalizeCollection(container, tags);
    },
  };
}
