/**
 * Comparison protocol
 *
 * Two equality modes over normalized values:
 * - ordered: same length, deep-strict-equal at every index
 * - unordered: multiset equality (order-insensitive, duplicate-sensitive)
 *
 * Which one a scenario uses is an explicit `orderSensitive` setting. Search
 * results come back in a server-determined order; ingestion completion order
 * is not guaranteed.
 *
 * @module @dicom-it/core/compare
 */

import { isDeepStrictEqual } from 'node:util';
import { AssertionFailure } from '../errors/index.js';

/**
 * Result of comparing two collections
 */
export type ComparisonResult =
  | { equal: true; mode: ComparisonMode; size: number }
  | {
      equal: false;
      mode: ComparisonMode;
      reason: string;
      /** Expected elements absent from actual */
      missing: unknown[];
      /** Actual elements absent from expected */
      unexpected: unknown[];
      /** First differing index (ordered mode only) */
      firstMismatchIndex?: number;
    };

export type ComparisonMode = 'ordered' | 'unordered';

export interface AssertEqualOptions {
  orderSensitive: boolean;
  label: string;
}

// =============================================================================
// Canonical form
// =============================================================================

/**
 * Deterministic JSON rendering with object keys sorted at every level
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

// =============================================================================
// Comparisons
// =============================================================================

/**
 * Positional comparison
 */
export function compareOrdered(
  actual: readonly unknown[],
  expected: readonly unknown[]
): ComparisonResult {
  const shared = Math.min(actual.length, expected.length);
  for (let index = 0; index < shared; index++) {
    if (!isDeepStrictEqual(actual[index], expected[index])) {
      return {
        equal: false,
        mode: 'ordered',
        reason: `element ${index} differs`,
        missing: [expected[index]],
        unexpected: [actual[index]],
        firstMismatchIndex: index,
      };
    }
  }

  if (actual.length !== expected.length) {
    return {
      equal: false,
      mode: 'ordered',
      reason: `expected ${expected.length} element(s), got ${actual.length}`,
      missing: expected.slice(shared),
      unexpected: actual.slice(shared),
      firstMismatchIndex: shared,
    };
  }

  return { equal: true, mode: 'ordered', size: actual.length };
}

/**
 * Multiset comparison keyed on canonical JSON
 */
export function compareUnordered(
  actual: readonly unknown[],
  expected: readonly unknown[]
): ComparisonResult {
  const remaining = new Map<string, unknown[]>();
  for (const element of expected) {
    const key = canonicalJson(element);
    const bucket = remaining.get(key);
    if (bucket) {
      bucket.push(element);
    } else {
      remaining.set(key, [element]);
    }
  }

  const unexpected: unknown[] = [];
  for (const element of actual) {
    const bucket = remaining.get(canonicalJson(element));
    if (bucket && bucket.length > 0) {
      bucket.pop();
    } else {
      unexpected.push(element);
    }
  }

  const missing = [...remaining.values()].flat();
  if (missing.length === 0 && unexpected.length === 0) {
    return { equal: true, mode: 'unordered', size: actual.length };
  }

  return {
    equal: false,
    mode: 'unordered',
    reason: `${missing.length} expected element(s) missing, ${unexpected.length} unexpected`,
    missing,
    unexpected,
  };
}

export function compareCollections(
  actual: readonly unknown[],
  expected: readonly unknown[],
  orderSensitive: boolean
): ComparisonResult {
  return orderSensitive ? compareOrdered(actual, expected) : compareUnordered(actual, expected);
}

// =============================================================================
// Assertions
// =============================================================================

const PREVIEW_LIMIT = 3;

/**
 * Human-readable summary of a failed comparison
 */
export function describeMismatch(result: ComparisonResult): string {
  if (result.equal) {
    return 'collections are equal';
  }
  const lines = [`${result.mode} comparison failed: ${result.reason}`];
  if (result.missing.length > 0) {
    lines.push(`missing: ${result.missing.slice(0, PREVIEW_LIMIT).map(canonicalJson).join(', ')}`);
  }
  if (result.unexpected.length > 0) {
    lines.push(`unexpected: ${result.unexpected.slice(0, PREVIEW_LIMIT).map(canonicalJson).join(', ')}`);
  }
  return lines.join('\n');
}

/**
 * Throw AssertionFailure unless the collections are equal
 */
export function assertCollectionsEqual(
  actual: readonly unknown[],
  expected: readonly unknown[],
  options: AssertEqualOptions
): ComparisonResult {
  const result = compareCollections(actual, expected, options.orderSensitive);
  if (!result.equal) {
    throw new AssertionFailure(options.label, describeMismatch(result), actual, expected);
  }
  return result;
}

/**
 * Fails closed: zero outcomes never satisfy a non-zero expectation
 */
export function assertOutcomeCount(
  outcomes: readonly unknown[],
  expectedCount: number,
  label: string
): void {
  if (outcomes.length !== expectedCount) {
    throw new AssertionFailure(
      label,
      `expected ${expectedCount} outcome(s), got ${outcomes.length}`,
      outcomes.length,
      expectedCount
    );
  }
}

/**
 * Every outcome must report success
 */
export function assertAllSucceeded<T extends { success: boolean; input?: unknown }>(
  outcomes: readonly T[],
  label: string
): void {
  const failed = outcomes.filter((outcome) => !outcome.success);
  if (failed.length > 0) {
    const inputs = failed.slice(0, PREVIEW_LIMIT).map((outcome) => String(outcome.input));
    throw new AssertionFailure(
      label,
      `${failed.length} of ${outcomes.length} outcome(s) failed: ${inputs.join(', ')}`,
      failed,
      []
    );
  }
}
