import { InvalidVectorError } from '../errors';

function norm(vector: number[], label: string): number {
  let sumOfSquares = 0;
  for (const value of vector) {
    if (!Number.isFinite(value)) {
      throw new InvalidVectorError(`${label} vector contains a non-finite value`);
    }
    sumOfSquares += value * value;
  }
  return Math.sqrt(sumOfSquares);
}

/**
 * Cosine similarity in [-1, 1]
 * Throws InvalidVectorError for empty, all-zero, non-finite or mismatched vectors
 */
export function cosineSimilarity(a: number[], b: number[], labels: [string, string] = ['first', 'second']): number {
  if (a.length === 0) throw new InvalidVectorError(`${labels[0]} vector is empty`);
  if (b.length === 0) throw new InvalidVectorError(`${labels[1]} vector is empty`);
  if (a.length !== b.length) {
    throw new InvalidVectorError(
      `Dimension mismatch: ${labels[0]} has ${a.length}, ${labels[1]} has ${b.length}`
    );
  }

  const normA = norm(a, labels[0]);
  const normB = norm(b, labels[1]);
  if (normA === 0) throw new InvalidVectorError(`${labels[0]} vector is all zeros`);
  if (normB === 0) throw new InvalidVectorError(`${labels[1]} vector is all zeros`);

  let dot = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
  }

  return dot / (normA * normB);
}

/**
 * Similarity as compared against the threshold: cosine clamped to [0, 1]
 */
export function matchScore(cvVector: number[], jobVector: number[]): number {
  const similarity = cosineSimilarity(cvVector, jobVector, ['CV', 'job']);
  return Math.min(1, Math.max(0, similarity));
}
