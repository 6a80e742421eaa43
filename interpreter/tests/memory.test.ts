/**
 * Tests for the memory context, latent similarity and snapshots.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { MemoryContext, parseSnapshot } from '../src/memory';
import { HashEmbedder, Embedder, wordHash, wordBucket, cosineSimilarity } from '../src/embedding';
import { SnapshotError } from '../src/errors';

// ============================================================================
// Stores
// ============================================================================

describe('MemoryContext: stores', () => {
  test('set and get per store', () => {
    const ctx = new MemoryContext();
    ctx.setMem('short', 'a', '1');
    ctx.setMem('long', 'a', '2');
    expect(ctx.getMem('short', 'a')).toBe('1');
    expect(ctx.getMem('long', 'a')).toBe('2');
    expect(ctx.hasMem('short', 'a')).toBe(true);
    expect(ctx.hasMem('short', 'b')).toBe(false);
  });

  test('missing keys and unknown stores read as empty', () => {
    const ctx = new MemoryContext();
    ctx.setMem('elsewhere', 'a', '1');
    expect(ctx.getMem('short', 'a')).toBe('');
    expect(ctx.getMem('elsewhere', 'a')).toBe('');
    expect(ctx.hasMem('elsewhere', 'a')).toBe(false);
  });

  test('clear drops data and the current agent', () => {
    const ctx = new MemoryContext();
    ctx.setMem('short', 'a', '1');
    ctx.link('a', 'b');
    ctx.embedLatent('a', 'x');
    ctx.currentAgent = { kind: 'agent', name: 'A', body: [], line: 1 };
    ctx.clear();
    expect(ctx.toSnapshot()).toEqual({ MemShort: {}, MemLong: {}, MemLatent: {}, Links: {} });
    expect(ctx.currentAgent).toBeNull();
  });
});

// ============================================================================
// Embedding
// ============================================================================

describe('HashEmbedder', () => {
  const embedder = new HashEmbedder();

  test('word hashes and buckets', () => {
    expect(wordHash('x')).toBe(120n);
    expect(wordHash('joy')).toBe(105428n);
    expect(wordBucket('joy')).toBe(28);
    expect(wordBucket('hello')).toBe(22);
    expect(wordBucket('world')).toBe(2);
  });

  test('long words wrap to negative buckets', () => {
    expect(wordHash('interpolations')).toBe(-2812600595376997553n);
    expect(wordBucket('interpolations')).toBe(-53);
    expect(embedder.embed('interpolations extraordinary')).toEqual([-53, 46, 0]);
  });

  test('words are spread over three dimensions by position', () => {
    expect(embedder.embed('hello world')).toEqual([22, 2, 0]);
    expect(embedder.embed('  hello \n world ')).toEqual([22, 2, 0]);
    expect(embedder.embed('cat dog sun')).toEqual([62, 44, 52]);
    expect(embedder.embed('cat dog sun x')).toEqual([82, 44, 52]);
    expect(embedder.embed('')).toEqual([0, 0, 0]);
  });

  test('cosine similarity', () => {
    expect(cosineSimilarity([1, 0, 0], [0, 1, 0])).toBe(0);
    expect(cosineSimilarity([1, 2, 3], [1, 2, 3])).toBeCloseTo(1);
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0);
    expect(cosineSimilarity([22, 2, 0], [2, 22, 0])).toBeCloseTo(0.1803, 4);
  });

  test('cosine similarity pads the shorter vector with zeros', () => {
    // 22*22 / (22 * sqrt(22*22 + 2*2))
    expect(cosineSimilarity([22], [22, 2, 0])).toBeCloseTo(0.9959, 4);
    expect(cosineSimilarity([22, 2, 0], [22])).toBeCloseTo(0.9959, 4);
    expect(cosineSimilarity([0], [1, 2, 3])).toBe(0);
  });
});

describe('MemoryContext: similarity', () => {
  test('finds entries above the threshold in insertion order', () => {
    const ctx = new MemoryContext();
    ctx.embedLatent('first', 'sun moon');
    ctx.embedLatent('second', 'dog sun');
    ctx.embedLatent('third', 'sun dog');
    // cat: 0.7853 vs "sun moon", 0.6459 vs "dog sun", 0.7634 vs "sun dog"
    expect(ctx.similarTo('cat')).toEqual(['first', 'third']);
  });

  test('identical word multisets in a different order do not match; the embedder is order-dependent', () => {
    const ctx = new MemoryContext();
    ctx.embedLatent('greeting', 'hello world');
    expect(ctx.similarTo('hello world')).toEqual(['greeting']);
    expect(ctx.similarTo('world hello')).toEqual([]);
  });

  test('zero vectors never match', () => {
    const ctx = new MemoryContext();
    ctx.embedLatent('empty', '');
    ctx.embedLatent('greeting', 'hello world');
    expect(ctx.similarTo('')).toEqual([]);
    expect(ctx.similarTo('hello world')).toEqual(['greeting']);
  });

  test('threshold and embedder are configurable', () => {
    const fixed: Embedder = { dimensions: 2, embed: (text) => (text === 'a' ? [1, 0] : [1, 1]) };
    const ctx = new MemoryContext({ embedder: fixed, similarityThreshold: 0.5 });
    ctx.embedLatent('k', 'b');
    // cos([1,1],[1,0]) = 0.7071
    expect(ctx.similarTo('a')).toEqual(['k']);
    expect(new MemoryContext({ embedder: fixed, similarityThreshold: 0.8 }).similarTo('a')).toEqual([]);
  });
});

// ============================================================================
// Snapshots
// ============================================================================

describe('MemoryContext: snapshots', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sentience-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function populated(): MemoryContext {
    const ctx = new MemoryContext();
    ctx.setMem('short', 'msg', 'hello world');
    ctx.setMem('long', 'fact', 'sky is blue');
    ctx.embedLatent('msg', 'hello world');
    ctx.link('a', 'b');
    ctx.currentAgent = { kind: 'agent', name: 'Echo', body: [], line: 1 };
    return ctx;
  }

  test('save then load restores all four stores', () => {
    const file = path.join(dir, 'ctx.json');
    populated().save(file);

    const restored = new MemoryContext();
    restored.load(file);
    expect(restored.toSnapshot()).toEqual({
      MemShort: { msg: 'hello world' },
      MemLong: { fact: 'sky is blue' },
      MemLatent: { msg: [22, 2, 0] },
      Links: { a: 'b' },
    });
  });

  test('the file holds exactly the four stores, two-space indented', () => {
    const file = path.join(dir, 'ctx.json');
    populated().save(file);
    const text = fs.readFileSync(file, 'utf-8');
    expect(Object.keys(JSON.parse(text))).toEqual(['MemShort', 'MemLong', 'MemLatent', 'Links']);
    expect(text.split('\n')[1]).toBe('  "MemShort": {');
  });

  test('load replaces data but keeps the current agent', () => {
    const file = path.join(dir, 'ctx.json');
    new MemoryContext().save(file);

    const ctx = populated();
    ctx.load(file);
    expect(ctx.memShort.size).toBe(0);
    expect(ctx.links.size).toBe(0);
    expect(ctx.currentAgent?.name).toBe('Echo');
  });

  test('loading a missing file raises SnapshotError', () => {
    const file = path.join(dir, 'missing.json');
    const ctx = populated();
    expect(() => ctx.load(file)).toThrow(SnapshotError);
    expect(ctx.getMem('short', 'msg')).toBe('hello world');
  });

  test('saving into a missing directory raises SnapshotError', () => {
    const file = path.join(dir, 'no', 'such', 'ctx.json');
    expect(() => new MemoryContext().save(file)).toThrow(`SnapshotError: cannot save '${file}'`);
  });

  test('latent vectors of the wrong length are rejected and leave memory untouched', () => {
    const file = path.join(dir, 'short-vector.json');
    fs.writeFileSync(file, JSON.stringify({ MemLatent: { odd: [22] } }), 'utf-8');

    const ctx = populated();
    expect(() => ctx.load(file)).toThrow(
      `SnapshotError: cannot load '${file}': MemLatent.odd: expected 3 components, got 1`,
    );
    expect(ctx.memLatent.has('odd')).toBe(false);
    expect(ctx.getMem('short', 'msg')).toBe('hello world');
    expect(ctx.similarTo('hello world')).toEqual(['msg']);
  });

  test('malformed JSON raises SnapshotError', () => {
    const file = path.join(dir, 'bad.json');
    fs.writeFileSync(file, '{ not json', 'utf-8');
    expect(() => new MemoryContext().load(file)).toThrow(SnapshotError);
  });
});

describe('parseSnapshot', () => {
  test('missing stores default to empty', () => {
    expect(parseSnapshot({ Links: { a: 'b' } })).toEqual({
      MemShort: {},
      MemLong: {},
      MemLatent: {},
      Links: { a: 'b' },
    });
  });

  test('reports the first invalid field', () => {
    expect(() => parseSnapshot({ MemShort: { a: 1 } }, 'ctx.json')).toThrow(
      "SnapshotError: cannot load 'ctx.json': MemShort.a:",
    );
  });

  test('checks latent vector length only when dimensions are given', () => {
    const doc = { MemLatent: { odd: [22], ok: [1, 2, 3] } };
    expect(parseSnapshot(doc).MemLatent).toEqual({ odd: [22], ok: [1, 2, 3] });
    expect(() => parseSnapshot(doc, 'ctx.json', 3)).toThrow(
      "SnapshotError: cannot load 'ctx.json': MemLatent.odd: expected 3 components, got 1",
    );
    expect(() => parseSnapshot({ MemLatent: { long: [1, 2, 3, 4] } }, 'ctx.json', 3)).toThrow(
      'MemLatent.long: expected 3 components, got 4',
    );
    expect(parseSnapshot({ MemLatent: { ok: [1, 2, 3] } }, 'ctx.json', 3).MemLatent).toEqual({ ok: [1, 2, 3] });
  });

  test('rejects a non-object document', () => {
    expect(() => parseSnapshot([1, 2])).toThrow("SnapshotError: cannot load '<snapshot>': document:");
  });
});
