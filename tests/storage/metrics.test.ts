import { cosineSimilarity, innerProduct, resolveMetric, squaredEuclidean } from '../../storage/metrics';

describe('vector metrics', () => {
  it('calculates cosine similarity', () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBeCloseTo(0);
    expect(cosineSimilarity([1, 1], [-1, -1])).toBeCloseTo(-1);
  });

  it('cosineSimilarity returns 0 when denominator is 0', () => {
    expect(cosineSimilarity([0, 0], [0, 0])).toBe(0);
  });

  it('calculates inner product and squared euclidean distance', () => {
    expect(innerProduct([1, 2, 3], [4, 5, 6])).toBe(32);
    expect(squaredEuclidean([1, 2], [4, 6])).toBe(25);
  });

  it('rejects vectors of different lengths', () => {
    expect(() => squaredEuclidean([1, 2], [1])).toThrow('Vector length mismatch');
  });
});

describe('resolveMetric', () => {
  it('defaults to L2 and ranks it ascending', () => {
    const metric = resolveMetric(undefined);

    expect(metric.higherIsCloser).toBe(false);
    expect(metric.score([0, 0], [3, 4])).toBe(25);
  });

  it('accepts metric names in any case', () => {
    expect(resolveMetric('ip').higherIsCloser).toBe(true);
    expect(resolveMetric('Cosine').score([2, 0], [5, 0])).toBeCloseTo(1);
  });

  it('rejects unknown metrics', () => {
    expect(() => resolveMetric('HAMMING')).toThrow("Unsupported metric 'HAMMING'");
  });
});
