import {
  DimensionMismatchError,
  InvalidThresholdError,
} from '../shared/errors';

export type Embedding = readonly number[];

export const DEFAULT_THRESHOLD = 0.65;

// Largest double below 1, for vectors that point the same way but differ.
const BELOW_ONE = 1 - Number.EPSILON / 2;

function sameVector(a: Embedding, b: Embedding): boolean {
  if (a === b) return true;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Similarity of two embeddings in [0, 1]: cosine similarity with negative
 * values clamped to 0. Only element-wise identical vectors score exactly 1.
 */
export function compareEmbeddings(a: Embedding, b: Embedding): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }
  if (sameVector(a, b)) return 1;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA * normB);
  if (magnitude === 0) return 0;

  const similarity = dot / magnitude;
  if (similarity <= 0) return 0;
  return Math.min(similarity, BELOW_ONE);
}

export function isCandidateMatch(score: number, threshold: number): boolean {
  return score >= threshold;
}

/**
 * Resolve a caller-supplied threshold, falling back to the default when it is
 * absent.
 */
export function resolveThreshold(threshold?: number): number {
  if (threshold === undefined) return DEFAULT_THRESHOLD;
  if (!Number.isFinite(threshold) || threshold <= 0 || threshold > 1) {
    throw new InvalidThresholdError(threshold);
  }
  return threshold;
}
