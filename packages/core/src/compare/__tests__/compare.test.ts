import { describe, it, expect } from 'vitest';
import {
  assertAllSucceeded,
  assertCollectionsEqual,
  assertOutcomeCount,
  canonicalJson,
  compareOrdered,
  compareUnordered,
  describeMismatch,
} from '../compare.js';
import { AssertionFailure } from '../../errors/index.js';

const a = { '00080018': 'a' };
const b = { '00080018': 'b' };
const c = { '00080018': 'c' };

describe('canonicalJson', () => {
  it('should sort keys at every level', () => {
    expect(canonicalJson({ b: 1, a: { d: [{ z: 1, y: 2 }], c: 3 } })).toBe(
      '{"a":{"c":3,"d":[{"y":2,"z":1}]},"b":1}'
    );
  });

  it('should keep array order', () => {
    expect(canonicalJson([2, 1])).toBe('[2,1]');
  });
});

describe('compareOrdered', () => {
  it('should accept identical sequences', () => {
    expect(compareOrdered([a, b], [{ ...a }, { ...b }])).toEqual({ equal: true, mode: 'ordered', size: 2 });
  });

  it('should reject a permutation', () => {
    const result = compareOrdered([b, a], [a, b]);

    expect(result.equal).toBe(false);
    if (!result.equal) {
      expect(result.firstMismatchIndex).toBe(0);
      expect(result.reason).toBe('element 0 differs');
    }
  });

  it('should report extra trailing elements', () => {
    const result = compareOrdered([a, b, c], [a, b]);

    expect(result.equal).toBe(false);
    if (!result.equal) {
      expect(result.reason).toBe('expected 2 element(s), got 3');
      expect(result.unexpected).toEqual([c]);
      expect(result.missing).toEqual([]);
    }
  });
});

describe('compareUnordered', () => {
  it('should accept a permutation', () => {
    expect(compareUnordered([c, a, b], [a, b, c]).equal).toBe(true);
  });

  it('should ignore key order inside records', () => {
    expect(compareUnordered([{ x: 1, y: 2 }], [{ y: 2, x: 1 }]).equal).toBe(true);
  });

  it('should be sensitive to duplicate counts', () => {
    const result = compareUnordered([a, a, b], [a, b, b]);

    expect(result.equal).toBe(false);
    if (!result.equal) {
      expect(result.missing).toEqual([b]);
      expect(result.unexpected).toEqual([a]);
      expect(result.reason).toBe('1 expected element(s) missing, 1 unexpected');
    }
  });

  it('should treat two empty collections as equal', () => {
    expect(compareUnordered([], [])).toEqual({ equal: true, mode: 'unordered', size: 0 });
  });
});

describe('describeMismatch', () => {
  it('should list missing and unexpected elements', () => {
    const summary = describeMismatch(compareUnordered([a], [b]));

    expect(summary).toBe(
      'unordered comparison failed: 1 expected element(s) missing, 1 unexpected\n' +
        'missing: {"00080018":"b"}\n' +
        'unexpected: {"00080018":"a"}'
    );
  });
});

describe('assertCollectionsEqual', () => {
  it('should use ordered comparison when order sensitive', () => {
    expect(() =>
      assertCollectionsEqual([b, a], [a, b], { orderSensitive: true, label: 'search all' })
    ).toThrow(AssertionFailure);
  });

  it('should use multiset comparison otherwise', () => {
    const result = assertCollectionsEqual([b, a], [a, b], { orderSensitive: false, label: 'store' });

    expect(result.equal).toBe(true);
  });

  it('should carry label, actual and expected', () => {
    try {
      assertCollectionsEqual([a], [b], { orderSensitive: true, label: 'search all' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(AssertionFailure);
      if (error instanceof AssertionFailure) {
        expect(error.label).toBe('search all');
        expect(error.actual).toEqual([a]);
        expect(error.expected).toEqual([b]);
        expect(error.message.startsWith('search all: ordered comparison failed')).toBe(true);
      }
    }
  });
});

describe('assertOutcomeCount', () => {
  it('should pass on the exact count', () => {
    expect(() => assertOutcomeCount([1, 2], 2, 'count')).not.toThrow();
  });

  it('should fail closed on an empty match set', () => {
    expect(() => assertOutcomeCount([], 18, 'store first assert')).toThrow(
      'store first assert: expected 18 outcome(s), got 0'
    );
  });

  it('should accept zero when zero is expected', () => {
    expect(() => assertOutcomeCount([], 0, 'count')).not.toThrow();
  });
});

describe('assertAllSucceeded', () => {
  it('should pass when every outcome succeeded', () => {
    expect(() => assertAllSucceeded([{ success: true }, { success: true }], 'upload')).not.toThrow();
  });

  it('should name the failing inputs', () => {
    expect(() =>
      assertAllSucceeded(
        [
          { success: true, input: 'gs://bucket/a.dcm' },
          { success: false, input: 'gs://bucket/b.dcm' },
        ],
        'upload'
      )
    ).toThrow('upload: 1 of 2 outcome(s) failed: gs://bucket/b.dcm');
  });
});
