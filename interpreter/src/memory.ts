/**
 * Memory context for the Sentience interpreter.
 *
 * Four stores, threaded through evaluation and kept alive for a session:
 *   - short: working key/value facts (handler parameters are bound here)
 *   - long:  durable key/value facts
 *   - latent: mock vectors used for similarity lookup
 *   - links: association table, last write wins per key
 *
 * `currentAgent` is registration state, not data: it never appears in a
 * snapshot and a load leaves it as it was.
 */

import * as fs from 'fs';
import { z } from 'zod';
import type { AgentStatement } from './ast';
import { Embedder, HashEmbedder, cosineSimilarity } from './embedding';
import { SnapshotError, errorMessage } from './errors';

export type MemoryTarget = 'short' | 'long';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.75;

export interface MemoryOptions {
  embedder?: Embedder;
  similarityThreshold?: number;
}

// ---------------------------------------------------------------------------
// Snapshot shape
// ---------------------------------------------------------------------------

const snapshotSchema = z.object({
  MemShort: z.record(z.string()).default({}),
  MemLong: z.record(z.string()).default({}),
  MemLatent: z.record(z.array(z.number())).default({}),
  Links: z.record(z.string()).default({}),
});

export type MemorySnapshot = z.infer<typeof snapshotSchema>;

// ---------------------------------------------------------------------------
// MemoryContext
// ---------------------------------------------------------------------------

export class MemoryContext {
  memShort = new Map<string, string>();
  memLong = new Map<string, string>();
  memLatent = new Map<string, number[]>();
  links = new Map<string, string>();
  currentAgent: AgentStatement | null = null;

  readonly embedder: Embedder;
  private readonly similarityThreshold: number;

  constructor(options?: MemoryOptions) {
    this.embedder = options?.embedder ?? new HashEmbedder();
    this.similarityThreshold = options?.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  }

  /** Write a fact. Targets other than short/long are ignored. */
  setMem(target: string, key: string, value: string): void {
    const store = this.storeFor(target);
    if (store) store.set(key, value);
  }

  /** Read a fact; unknown targets and missing keys read as "". */
  getMem(target: string, key: string): string {
    return this.storeFor(target)?.get(key) ?? '';
  }

  hasMem(target: string, key: string): boolean {
    return this.storeFor(target)?.has(key) ?? false;
  }

  link(from: string, to: string): void {
    this.links.set(from, to);
  }

  embedLatent(key: string, text: string): void {
    this.memLatent.set(key, this.embedder.embed(text));
  }

  /**
   * Keys of latent entries whose cosine similarity to `query` is above the
   * threshold, in insertion order.
   */
  similarTo(query: string): string[] {
    const q = this.embedder.embed(query);
    const results: string[] = [];
    for (const [key, vec] of this.memLatent) {
      if (cosineSimilarity(vec, q) > this.similarityThreshold) {
        results.push(key);
      }
    }
    return results;
  }

  /** Drop all stored data and the current agent. */
  clear(): void {
    this.memShort.clear();
    this.memLong.clear();
    this.memLatent.clear();
    this.links.clear();
    this.currentAgent = null;
  }

  // ---------------------------------------------------------------------------
  // Snapshots
  // ---------------------------------------------------------------------------

  toSnapshot(): MemorySnapshot {
    return {
      MemShort: Object.fromEntries(this.memShort),
      MemLong: Object.fromEntries(this.memLong),
      MemLatent: Object.fromEntries([...this.memLatent].map(([k, v]) => [k, [...v]])),
      Links: Object.fromEntries(this.links),
    };
  }

  /** Replace all four stores with the snapshot's contents. */
  restore(snapshot: MemorySnapshot): void {
    this.memShort = new Map(Object.entries(snapshot.MemShort));
    this.memLong = new Map(Object.entries(snapshot.MemLong));
    this.memLatent = new Map(Object.entries(snapshot.MemLatent).map(([k, v]) => [k, [...v]]));
    this.links = new Map(Object.entries(snapshot.Links));
  }

  save(path: string): void {
    try {
      fs.writeFileSync(path, JSON.stringify(this.toSnapshot(), null, 2), 'utf-8');
    } catch (e) {
      throw new SnapshotError('save', path, errorMessage(e));
    }
  }

  load(path: string): void {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(path, 'utf-8'));
    } catch (e) {
      throw new SnapshotError('load', path, errorMessage(e));
    }
    this.restore(parseSnapshot(raw, path, this.embedder.dimensions));
  }

  private storeFor(target: string): Map<string, string> | null {
    switch (target) {
      case 'short': return this.memShort;
      case 'long': return this.memLong;
      default: return null;
    }
  }
}

/**
 * Validate an already-decoded snapshot document. When `dimensions` is given,
 * every latent vector must have exactly that many components.
 */
export function parseSnapshot(raw: unknown, path = '<snapshot>', dimensions?: number): MemorySnapshot {
  const result = snapshotSchema.safeParse(raw);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first.path.length > 0 ? first.path.join('.') : 'document';
    throw new SnapshotError('load', path, `${where}: ${first.message}`);
  }
  if (dimensions !== undefined) {
    for (const [key, vec] of Object.entries(result.data.MemLatent)) {
      if (vec.length !== dimensions) {
        throw new SnapshotError(
          'load',
          path,
          `MemLatent.${key}: expected ${dimensions} components, got ${vec.length}`,
        );
      }
    }
  }
  return result.data;
}
