/**
 * Vector helpers shared by the pattern store and its in-memory test double.
 */

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  const similarity = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  return Math.max(-1, Math.min(1, similarity));
}

/** pgvector accepts and returns the JSON array form, e.g. "[0.1,0.2]". */
export function serializeEmbedding(embedding: number[]): string {
  return JSON.stringify(embedding);
}

export function parseEmbedding(raw: string): number[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed) || !parsed.every((v): v is number => typeof v === 'number')) {
    throw new Error('Stored embedding is not a numeric array');
  }
  return parsed;
}
