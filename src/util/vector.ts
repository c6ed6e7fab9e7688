// src/util/vector.ts
// What: Vector math for similarity scoring.
// How: dot/norm and cosine with precomputed norms over plain number arrays; a zero vector scores 0 against anything.

export function dot(a: readonly number[], b: readonly number[]): number {
  let s = 0;
  for (let i = 0; i < a.length; i++) s += a[i] * b[i];
  return s;
}

export function norm(a: readonly number[]): number {
  return Math.sqrt(dot(a, a));
}

// Cosine with precomputed norms; keeps the result in [-1, 1].
export function cosineWithNorms(a: readonly number[], aNorm: number, b: readonly number[], bNorm: number): number {
  if (aNorm === 0 || bNorm === 0) return 0;
  const sim = dot(a, b) / (aNorm * bNorm);
  if (sim > 1) return 1;
  if (sim < -1) return -1;
  return sim;
}
