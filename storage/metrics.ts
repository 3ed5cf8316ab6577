import { StorageError } from '../core/errors';

export type MetricName = 'L2' | 'IP' | 'COSINE';

export interface Metric {
  score(vectorA: number[], vectorB: number[]): number;
  /** True when a larger score means a closer neighbour. */
  higherIsCloser: boolean;
}

export function cosineSimilarity(vectorA: number[], vectorB: number[]): number {
  assertSameLength(vectorA, vectorB);

  const denominator = vectorNorm(vectorA) * vectorNorm(vectorB);
  if (denominator === 0) {
    return 0;
  }
  return innerProduct(vectorA, vectorB) / denominator;
}

export function innerProduct(vectorA: number[], vectorB: number[]): number {
  assertSameLength(vectorA, vectorB);

  let dot = 0;
  for (let i = 0; i < vectorA.length; i += 1) {
    dot += vectorA[i] * vectorB[i];
  }
  return dot;
}

/** Squared euclidean distance, as Milvus reports it for L2. */
export function squaredEuclidean(vectorA: number[], vectorB: number[]): number {
  assertSameLength(vectorA, vectorB);

  let sum = 0;
  for (let i = 0; i < vectorA.length; i += 1) {
    const delta = vectorA[i] - vectorB[i];
    sum += delta * delta;
  }
  return sum;
}

const METRICS: Record<MetricName, Metric> = {
  L2: { score: squaredEuclidean, higherIsCloser: false },
  IP: { score: innerProduct, higherIsCloser: true },
  COSINE: { score: cosineSimilarity, higherIsCloser: true }
};

export function resolveMetric(name: string | undefined): Metric {
  const key = (name ?? 'L2').toUpperCase();
  if (key === 'L2' || key === 'IP' || key === 'COSINE') {
    return METRICS[key];
  }
  throw new StorageError(`Unsupported metric '${name ?? ''}'`);
}

function vectorNorm(vector: number[]): number {
  return Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
}

function assertSameLength(vectorA: number[], vectorB: number[]): void {
  if (vectorA.length !== vectorB.length) {
    throw new StorageError('Vector length mismatch');
  }
}
