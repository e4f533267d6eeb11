/**
 * Random projection forest
 *
 * Each tree recursively splits the item set with a hyperplane equidistant
 * from two randomly chosen items until a node holds at most `leafSize`
 * items. Queries walk all trees best-first by hyperplane margin, gather a
 * candidate set and rank it by exact distance.
 *
 * @module ann-forest
 */

import type { DistanceMetric } from '../models/vector-entry.js';

export interface SplitNode {
  kind: 'split';
  /** Unit normal; all zeros for an arbitrary split of indistinguishable items */
  normal: Float32Array;
  offset: number;
  left: number;
  right: number;
}

export interface LeafNode {
  kind: 'leaf';
  items: Uint32Array;
}

export type TreeNode = SplitNode | LeafNode;

export interface AnnTree {
  root: number;
  nodes: TreeNode[];
}

/**
 * Row-major matrix of `count` vectors of length `dim`
 */
export interface VectorSet {
  vectors: Float32Array;
  dim: number;
  count: number;
}

export interface Neighbour {
  index: number;
  distance: number;
}

/**
 * mulberry32; returns floats in [0, 1)
 */
export function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function vectorAt(set: VectorSet, index: number): Float32Array {
  return set.vectors.subarray(index * set.dim, (index + 1) * set.dim);
}

export function dot(a: Float32Array, b: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

function norm(a: Float32Array): number {
  return Math.sqrt(dot(a, a));
}

/**
 * angular: sqrt(2 - 2 cos), in [0, 2]; zero vectors count as orthogonal.
 * euclidean: L2 distance.
 */
export function distance(metric: DistanceMetric, a: Float32Array, b: Float32Array): number {
  if (metric === 'euclidean') {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
      const d = (a[i] ?? 0) - (b[i] ?? 0);
      sum += d * d;
    }
    return Math.sqrt(sum);
  }

  const denominator = norm(a) * norm(b);
  const cosine = denominator > 0 ? dot(a, b) / denominator : 0;
  return Math.sqrt(Math.max(0, 2 - 2 * cosine));
}

function randomIndex(rng: () => number, length: number): number {
  return Math.min(length - 1, Math.floor(rng() * length));
}

function chooseHyperplane(
  set: VectorSet,
  items: Uint32Array,
  metric: DistanceMetric,
  rng: () => number
): { normal: Float32Array; offset: number } | null {
  for (let attempt = 0; attempt < 3; attempt++) {
    const a = items[randomIndex(rng, items.length)] ?? 0;
    const b = items[randomIndex(rng, items.length)] ?? 0;
    if (a === b) continue;

    const va = vectorAt(set, a);
    const vb = vectorAt(set, b);
    const normal = new Float32Array(set.dim);
    let offset = 0;

    if (metric === 'angular') {
      const na = norm(va) || 1;
      const nb = norm(vb) || 1;
      for (let i = 0; i < set.dim; i++) {
        normal[i] = (va[i] ?? 0) / na - (vb[i] ?? 0) / nb;
      }
    } else {
      for (let i = 0; i < set.dim; i++) {
        normal[i] = (va[i] ?? 0) - (vb[i] ?? 0);
        offset -= (normal[i] ?? 0) * (((va[i] ?? 0) + (vb[i] ?? 0)) / 2);
      }
    }

    const length = norm(normal);
    if (length < 1e-12) continue;
    for (let i = 0; i < set.dim; i++) {
      normal[i] = (normal[i] ?? 0) / length;
    }
    // Stored as f32 so a reloaded forest makes identical decisions
    return { normal, offset: Math.fround(offset / length) };
  }
  return null;
}

function shuffled(items: Uint32Array, rng: () => number): Uint32Array {
  const copy = Uint32Array.from(items);
  for (let i = copy.length - 1; i > 0; i--) {
    const j = randomIndex(rng, i + 1);
    const tmp = copy[i] ?? 0;
    copy[i] = copy[j] ?? 0;
    copy[j] = tmp;
  }
  return copy;
}

/**
 * Build one tree over every item of the set
 */
export function buildTree(
  set: VectorSet,
  metric: DistanceMetric,
  leafSize: number,
  rng: () => number
): AnnTree {
  const nodes: TreeNode[] = [];

  const grow = (items: Uint32Array): number => {
    if (items.length <= leafSize) {
      nodes.push({ kind: 'leaf', items });
      return nodes.length - 1;
    }

    let normal: Float32Array;
    let offset = 0;
    let left: Uint32Array;
    let right: Uint32Array;

    const plane = chooseHyperplane(set, items, metric, rng);
    const sides = plane ? partition(set, items, plane.normal, plane.offset) : null;

    if (plane && sides && sides.left.length > 0 && sides.right.length > 0) {
      normal = plane.normal;
      offset = plane.offset;
      left = sides.left;
      right = sides.right;
    } else {
      const mixed = shuffled(items, rng);
      const half = Math.floor(mixed.length / 2);
      normal = new Float32Array(set.dim);
      left = mixed.subarray(0, half);
      right = mixed.subarray(half);
    }

    const id = nodes.length;
    const node: SplitNode = { kind: 'split', normal, offset, left: -1, right: -1 };
    nodes.push(node);
    node.left = grow(left);
    node.right = grow(right);
    return id;
  };

  const all = new Uint32Array(set.count);
  for (let i = 0; i < set.count; i++) all[i] = i;
  const root = grow(all);
  return { root, nodes };
}

function partition(
  set: VectorSet,
  items: Uint32Array,
  normal: Float32Array,
  offset: number
): { left: Uint32Array; right: Uint32Array } {
  const left: number[] = [];
  const right: number[] = [];
  for (const item of items) {
    if (dot(normal, vectorAt(set, item)) + offset > 0) {
      right.push(item);
    } else {
      left.push(item);
    }
  }
  return { left: Uint32Array.from(left), right: Uint32Array.from(right) };
}

interface QueueItem {
  priority: number;
  tree: number;
  node: number;
}

/**
 * Binary max-heap on priority
 */
class MaxHeap {
  private items: QueueItem[] = [];

  get size(): number {
    return this.items.length;
  }

  push(item: QueueItem): void {
    const items = this.items;
    items.push(item);
    let i = items.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      const p = items[parent];
      if (!p || p.priority >= item.priority) break;
      items[i] = p;
      i = parent;
    }
    items[i] = item;
  }

  pop(): QueueItem | undefined {
    const items = this.items;
    const top = items[0];
    const last = items.pop();
    if (top === undefined || last === undefined || items.length === 0) {
      return top;
    }

    let i = 0;
    for (;;) {
      const l = 2 * i + 1;
      const r = l + 1;
      let largest = i;
      let largestPriority = last.priority;
      const leftItem = items[l];
      const rightItem = items[r];
      if (leftItem && leftItem.priority > largestPriority) {
        largest = l;
        largestPriority = leftItem.priority;
      }
      if (rightItem && rightItem.priority > largestPriority) {
        largest = r;
      }
      if (largest === i) break;
      const child = items[largest];
      if (!child) break;
      items[i] = child;
      i = largest;
    }
    items[i] = last;
    return top;
  }
}

/**
 * Walk the forest best-first until at least `searchK` candidates are seen
 */
export function collectCandidates(trees: AnnTree[], query: Float32Array, searchK: number): Set<number> {
  const candidates = new Set<number>();
  const heap = new MaxHeap();
  trees.forEach((tree, index) => heap.push({ priority: Infinity, tree: index, node: tree.root }));

  while (heap.size > 0 && candidates.size < searchK) {
    const current = heap.pop();
    if (!current) break;
    const node = trees[current.tree]?.nodes[current.node];
    if (!node) continue;

    if (node.kind === 'leaf') {
      for (const item of node.items) candidates.add(item);
      continue;
    }

    const margin = dot(node.normal, query) + node.offset;
    heap.push({ priority: Math.min(current.priority, margin), tree: current.tree, node: node.right });
    heap.push({ priority: Math.min(current.priority, -margin), tree: current.tree, node: node.left });
  }

  return candidates;
}

/**
 * Exact k nearest among the given candidates, ties broken by index
 */
export function rankNeighbours(
  set: VectorSet,
  metric: DistanceMetric,
  query: Float32Array,
  candidates: Iterable<number>,
  k: number
): Neighbour[] {
  const scored: Neighbour[] = [];
  for (const index of candidates) {
    scored.push({ index, distance: distance(metric, query, vectorAt(set, index)) });
  }
  scored.sort((a, b) => a.distance - b.distance || a.index - b.index);
  return scored.slice(0, k);
}
