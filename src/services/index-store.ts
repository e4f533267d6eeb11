/**
 * Index Store Service
 *
 * Persists vector index snapshots: row-major vectors, the serialized forest,
 * the metadata table and a meta.json header. The data files of a snapshot
 * carry its tag in their names (`vectors-<tag>.f32`, `trees-<tag>.bin`,
 * `metadata-<tag>.json`) and are never overwritten. meta.json names the
 * current tag and is replaced by rename after the data files are in place,
 * so an interrupted save leaves the previous snapshot loadable. Files of
 * older snapshots are removed once the new header is written.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { AnnTree, TreeNode } from './ann-forest.js';
import type { DistanceMetric, VectorMetadata } from '../models/vector-entry.js';

const FORMAT_VERSION = 2;
const META_FILE = 'meta.json';
const SNAPSHOT_FILE_PATTERN = /^(?:vectors|trees|metadata)-([\w-]+)\.(?:f32|bin|json)(?:\..+\.tmp)?$/;
const KIND_SPLIT = 1;
const KIND_LEAF = 2;

export const IndexMetadataSchema = z.object({
  version: z.literal(FORMAT_VERSION),
  dim: z.number().int().positive(),
  metric: z.enum(['angular', 'euclidean']),
  nTrees: z.number().int().nonnegative(),
  leafSize: z.number().int().positive(),
  generation: z.number().int().nonnegative(),
  numItems: z.number().int().nonnegative(),
  snapshot: z.string().regex(/^[\w-]+$/),
  updatedAt: z.string(),
});

export type IndexMetadata = z.infer<typeof IndexMetadataSchema>;

const VectorMetadataTableSchema = z.array(
  z.object({
    command: z.string(),
    record_id: z.number().int(),
  })
);

/**
 * Everything needed to restore a built index
 */
export interface PersistedSnapshot {
  meta: IndexMetadata;
  vectors: Float32Array;
  metadata: VectorMetadata[];
  trees: AnnTree[];
}

export interface SnapshotHeader {
  dim: number;
  metric: DistanceMetric;
  leafSize: number;
  generation: number;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Serialize trees: u32 treeCount, then per tree u32 nodeCount, u32 root and
 * its nodes (u8 kind; split: u32 left, u32 right, f32 offset, f32[dim]
 * normal; leaf: u32 count, u32[count] items). Little-endian.
 */
export function encodeForest(trees: AnnTree[], dim: number): Buffer {
  let size = 4;
  for (const tree of trees) {
    size += 8;
    for (const node of tree.nodes) {
      size += 1 + (node.kind === 'split' ? 12 + dim * 4 : 4 + node.items.length * 4);
    }
  }

  const buffer = Buffer.alloc(size);
  let offset = buffer.writeUInt32LE(trees.length, 0);

  for (const tree of trees) {
    offset = buffer.writeUInt32LE(tree.nodes.length, offset);
    offset = buffer.writeUInt32LE(tree.root, offset);
    for (const node of tree.nodes) {
      if (node.kind === 'split') {
        offset = buffer.writeUInt8(KIND_SPLIT, offset);
        offset = buffer.writeUInt32LE(node.left, offset);
        offset = buffer.writeUInt32LE(node.right, offset);
        offset = buffer.writeFloatLE(node.offset, offset);
        for (let i = 0; i < dim; i++) {
          offset = buffer.writeFloatLE(node.normal[i] ?? 0, offset);
        }
      } else {
        offset = buffer.writeUInt8(KIND_LEAF, offset);
        offset = buffer.writeUInt32LE(node.items.length, offset);
        for (const item of node.items) {
          offset = buffer.writeUInt32LE(item, offset);
        }
      }
    }
  }

  return buffer;
}

/**
 * Inverse of encodeForest; throws on truncated or inconsistent input
 */
export function decodeForest(buffer: Buffer, dim: number, numItems: number): AnnTree[] {
  let offset = 0;
  const need = (bytes: number): void => {
    if (offset + bytes > buffer.length) {
      throw new Error('Forest file is truncated');
    }
  };
  const readU32 = (): number => {
    need(4);
    const value = buffer.readUInt32LE(offset);
    offset += 4;
    return value;
  };

  const treeCount = readU32();
  const trees: AnnTree[] = [];

  for (let t = 0; t < treeCount; t++) {
    const nodeCount = readU32();
    const root = readU32();
    if (root >= nodeCount) {
      throw new Error(`Tree ${t} root ${root} out of range`);
    }

    const nodes: TreeNode[] = [];
    for (let n = 0; n < nodeCount; n++) {
      need(1);
      const kind = buffer.readUInt8(offset);
      offset += 1;

      if (kind === KIND_SPLIT) {
        const left = readU32();
        const right = readU32();
        if (left >= nodeCount || right >= nodeCount) {
          throw new Error(`Tree ${t} node ${n} has an out-of-range child`);
        }
        need(4 + dim * 4);
        const splitOffset = buffer.readFloatLE(offset);
        offset += 4;
        const normal = new Float32Array(dim);
        for (let i = 0; i < dim; i++) {
          normal[i] = buffer.readFloatLE(offset);
          offset += 4;
        }
        nodes.push({ kind: 'split', normal, offset: splitOffset, left, right });
      } else if (kind === KIND_LEAF) {
        const count = readU32();
        const items = new Uint32Array(count);
        for (let i = 0; i < count; i++) {
          const item = readU32();
          if (item >= numItems) {
            throw new Error(`Tree ${t} references item ${item} beyond ${numItems}`);
          }
          items[i] = item;
        }
        nodes.push({ kind: 'leaf', items });
      } else {
        throw new Error(`Unknown node kind ${kind}`);
      }
    }
    trees.push({ root, nodes });
  }

  return trees;
}

interface SnapshotFiles {
  vectors: string;
  trees: string;
  metadata: string;
}

/**
 * Service for persisting vector index snapshots
 */
export class IndexStoreService {
  private metaFile: string;
  private writeCounter = 0;
  private saving: Promise<void> = Promise.resolve();

  constructor(private indexDir: string) {
    this.metaFile = path.join(indexDir, META_FILE);
  }

  /**
   * Write a snapshot and make it the current one; concurrent calls run in
   * order
   */
  save(
    header: SnapshotHeader,
    vectors: Float32Array,
    metadata: VectorMetadata[],
    trees: AnnTree[]
  ): Promise<void> {
    const run = this.saving.then(() => this.writeSnapshot(header, vectors, metadata, trees));
    // A failed save does not block later ones; the caller still gets the rejection
    this.saving = run.catch(() => undefined);
    return run;
  }

  /**
   * @returns null when no snapshot has been saved
   * @throws Error when files exist but are unreadable or inconsistent
   */
  async load(): Promise<PersistedSnapshot | null> {
    let metaJson: string;
    try {
      metaJson = await fs.readFile(this.metaFile, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    const parsed = IndexMetadataSchema.safeParse(JSON.parse(metaJson));
    if (!parsed.success) {
      throw new Error(`Invalid index header: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
    }
    const meta = parsed.data;
    const files = this.snapshotFiles(meta.snapshot);

    const vectorBytes = await fs.readFile(files.vectors);
    if (vectorBytes.byteLength !== meta.numItems * meta.dim * 4) {
      throw new Error(
        `Vector file holds ${vectorBytes.byteLength} bytes, expected ${meta.numItems * meta.dim * 4}`
      );
    }
    // Copy out so the vectors do not alias the pooled Buffer memory
    const vectors = new Float32Array(meta.numItems * meta.dim);
    new Uint8Array(vectors.buffer).set(vectorBytes);

    const metadata = VectorMetadataTableSchema.parse(JSON.parse(await fs.readFile(files.metadata, 'utf-8')));
    if (metadata.length !== meta.numItems) {
      throw new Error(`Metadata table has ${metadata.length} rows, expected ${meta.numItems}`);
    }

    const trees = decodeForest(await fs.readFile(files.trees), meta.dim, meta.numItems);

    return { meta, vectors, metadata, trees };
  }

  private async writeSnapshot(
    header: SnapshotHeader,
    vectors: Float32Array,
    metadata: VectorMetadata[],
    trees: AnnTree[]
  ): Promise<void> {
    await fs.mkdir(this.indexDir, { recursive: true, mode: 0o700 });

    const tag = `${header.generation}-${Date.now()}-${++this.writeCounter}`;
    const files = this.snapshotFiles(tag);
    const meta: IndexMetadata = {
      version: FORMAT_VERSION,
      dim: header.dim,
      metric: header.metric,
      nTrees: trees.length,
      leafSize: header.leafSize,
      generation: header.generation,
      numItems: metadata.length,
      snapshot: tag,
      updatedAt: new Date().toISOString(),
    };

    await this.writeAtomic(files.vectors, Buffer.from(vectors.buffer, vectors.byteOffset, vectors.byteLength));
    await this.writeAtomic(files.trees, encodeForest(trees, header.dim));
    await this.writeAtomic(files.metadata, JSON.stringify(metadata));
    await this.writeAtomic(this.metaFile, JSON.stringify(meta, null, 2));

    await this.removeSnapshotsExcept(tag);
  }

  private snapshotFiles(tag: string): SnapshotFiles {
    return {
      vectors: path.join(this.indexDir, `vectors-${tag}.f32`),
      trees: path.join(this.indexDir, `trees-${tag}.bin`),
      metadata: path.join(this.indexDir, `metadata-${tag}.json`),
    };
  }

  private async removeSnapshotsExcept(tag: string): Promise<void> {
    const entries = await fs.readdir(this.indexDir);
    const stale = entries.filter((name) => {
      const match = SNAPSHOT_FILE_PATTERN.exec(name);
      return match !== null && match[1] !== tag;
    });

    await Promise.all(
      stale.map((name) =>
        fs.unlink(path.join(this.indexDir, name)).catch((error: unknown) => {
          if (!isNotFound(error)) {
            throw error;
          }
        })
      )
    );
  }

  private async writeAtomic(target: string, data: Buffer | string): Promise<void> {
    const tmp = `${target}.${process.pid}.${++this.writeCounter}.tmp`;
    await fs.writeFile(tmp, data, { mode: 0o600 });
    await fs.rename(tmp, target);
  }
}
