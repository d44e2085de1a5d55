/**
 * Vector helpers shared by the pgvector adapter and the in-memory store.
 */
export function toPgVectorLiteral(vector: readonly number[]): string {
  if (!Array.isArray(vector)) {
    throw new TypeError("toPgVectorLiteral expected an array");
  }

  if (vector.length === 0) {
    throw new Error("toPgVectorLiteral received an empty vector");
  }

  if (!vector.every((v) => Number.isFinite(v))) {
    throw new Error("toPgVectorLiteral received a non-finite value");
  }

  return `[${vector.join(",")}]`;
}

export function dotProduct(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

export function magnitude(v: readonly number[]): number {
  return Math.sqrt(dotProduct(v, v));
}

/** Cosine similarity in [-1, 1]; zero vectors compare as 0. */
export function cosineSimilarity(
  a: readonly number[],
  b: readonly number[]
): number {
  const denom = magnitude(a) * magnitude(b);
  if (denom === 0) {
    return 0;
  }
  return dotProduct(a, b) / denom;
}
