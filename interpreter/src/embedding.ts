/**
 * Latent vector capability for the memory context.
 *
 * The Embedder interface is the seam where a real embedding backend would
 * go. HashEmbedder is the deterministic stand-in the language ships with:
 * it is a rolling character hash bucketed into three dimensions, not a
 * semantic model, and similarity results depend on word order.
 */

export interface Embedder {
  /** Length of every vector this embedder returns. */
  readonly dimensions: number;
  embed(text: string): number[];
}

export class HashEmbedder implements Embedder {
  readonly dimensions = 3;

  embed(text: string): number[] {
    const vec: number[] = new Array<number>(this.dimensions).fill(0);
    splitWords(text).forEach((word, i) => {
      vec[i % this.dimensions] += wordBucket(word);
    });
    return vec;
  }
}

/**
 * Rolling hash over the UTF-8 bytes of a word: `hash = byte + hash * 31`,
 * wrapping as a signed 64-bit integer.
 */
export function wordHash(word: string): bigint {
  let hash = 0n;
  for (const byte of Buffer.from(word, 'utf8')) {
    hash = BigInt.asIntN(64, BigInt(byte) + ((hash << 5n) - hash));
  }
  return hash;
}

/**
 * The contribution of one word: its hash modulo 100. The remainder keeps the
 * sign of the hash, so long words that wrap negative contribute negatively.
 */
export function wordBucket(word: string): number {
  return Number(wordHash(word) % 100n);
}

/**
 * Cosine similarity of two vectors. Zero-magnitude input gives 0.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let magA = 0;
  let magB = 0;
  const n = Math.max(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    magA += x * x;
    magB += y * y;
  }
  if (magA === 0 || magB === 0) return 0;
  return dot / (Math.sqrt(magA) * Math.sqrt(magB));
}

function splitWords(text: string): string[] {
  return text.split(/\s+/).filter(w => w.length > 0);
}
