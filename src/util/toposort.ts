// src/util/toposort.ts
import type { CollectionSpec } from "../types/schema.js";

/**
 * Topological sort for collection ordering based on reference fields.
 * Returns collections in an order where reference targets come before
 * the collections that point at them.
 */
export function toposort(
  names: string[],
  edges: Array<{ from: string; to: string }>, // from references to
): string[] {
  const inDegree = new Map<string, number>();
  const adjacency = new Map<string, string[]>();

  for (const name of names) {
    inDegree.set(name, 0);
    adjacency.set(name, []);
  }

  // Edge from -> to means "from" needs "to" first, so track to -> [from, ...]
  for (const { from, to } of edges) {
    if (!names.includes(from) || !names.includes(to)) continue;
    if (from === to) continue;

    adjacency.get(to)?.push(from);
    inDegree.set(from, (inDegree.get(from) ?? 0) + 1);
  }

  // Kahn's algorithm
  const queue: string[] = [];
  for (const [name, degree] of inDegree.entries()) {
    if (degree === 0) {
      queue.push(name);
    }
  }

  const result: string[] = [];
  let current = queue.shift();
  while (current !== undefined) {
    result.push(current);

    for (const neighbor of adjacency.get(current) ?? []) {
      const newDegree = (inDegree.get(neighbor) ?? 1) - 1;
      inDegree.set(neighbor, newDegree);
      if (newDegree === 0) {
        queue.push(neighbor);
      }
    }
    current = queue.shift();
  }

  if (result.length !== names.length) {
    const remaining = names.filter((n) => !result.includes(n));
    throw new Error(
      `Circular reference detected involving collections: ${remaining.join(", ")}`,
    );
  }

  return result;
}

/**
 * Build reference edges from collection specs for use with toposort.
 * Duplicate edges (two fields pointing at the same target) count once.
 */
export function buildReferenceEdges(
  collections: readonly CollectionSpec[],
): Array<{ from: string; to: string }> {
  const edges: Array<{ from: string; to: string }> = [];

  for (const collection of collections) {
    for (const field of collection.fields) {
      if (field.kind !== "reference") continue;
      const exists = edges.some(
        (e) => e.from === collection.name && e.to === field.target,
      );
      if (!exists) edges.push({ from: collection.name, to: field.target });
    }
  }

  return edges;
}

/**
 * Order collection specs so every reference target precedes its referrers.
 */
export function dependencyOrder(
  collections: readonly CollectionSpec[],
): CollectionSpec[] {
  const order = toposort(
    collections.map((c) => c.name),
    buildReferenceEdges(collections),
  );
  return order.map((name) => {
    const spec = collections.find((c) => c.name === name);
    if (!spec) throw new Error(`Unknown collection ${name}`);
    return spec;
  });
}
