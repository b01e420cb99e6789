/**
 * Disposable resource naming
 *
 * `{prefix}{YYYY-MM-DD_HHMMSS.ffffff}_{15 random alphanumerics}`
 *
 * The timestamp is UTC with microsecond precision; the random suffix is the
 * collision guard between concurrent runs (62^15 outcomes).
 *
 * @module @dicom-it/core/naming
 */

import { randomInt } from 'node:crypto';

export const RANDOM_SUFFIX_LENGTH = 15;

export const ALPHANUMERIC =
  'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

export interface ResourceIdOptions {
  /** Microseconds since the Unix epoch */
  nowMicros?: () => bigint;
  /** Uniform integer in [0, max) */
  randomIndex?: (max: number) => number;
  suffixLength?: number;
}

/**
 * Wall-clock time in microseconds
 */
export function currentMicros(): bigint {
  const millis = performance.timeOrigin + performance.now();
  return BigInt(Math.floor(millis * 1000));
}

/**
 * Random alphanumeric string drawn with a CSPRNG
 */
export function randomAlphanumeric(
  length: number,
  randomIndex: (max: number) => number = (max) => randomInt(max)
): string {
  let result = '';
  for (let i = 0; i < length; i++) {
    result += ALPHANUMERIC[randomIndex(ALPHANUMERIC.length)];
  }
  return result;
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * Format epoch microseconds as `YYYY-MM-DD_HHMMSS.ffffff` (UTC)
 */
export function formatTimestampMicros(micros: bigint): string {
  const millis = Number(micros / 1000n);
  const fraction = Number(micros % 1_000_000n);
  const date = new Date(millis);

  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}.` +
    pad(fraction, 6)
  );
}

/**
 * Build a unique name for a disposable resource
 *
 * @example
 * ```typescript
 * createResourceId('DICOM_store_')
 * // => 'DICOM_store_2026-10-19_142301.482913_Xq3b9TzLm0PaR7c'
 * ```
 */
export function createResourceId(prefix: string, options: ResourceIdOptions = {}): string {
  const now = options.nowMicros ?? currentMicros;
  const suffix = randomAlphanumeric(
    options.suffixLength ?? RANDOM_SUFFIX_LENGTH,
    options.randomIndex
  );
  return `${prefix}${formatTimestampMicros(now())}_${suffix}`;
}
