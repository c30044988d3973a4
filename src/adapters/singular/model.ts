/**
 * Control app document model handling.
 *
 * The model endpoint returns a list of compositions, each of which may nest
 * further compositions under "subcompositions" to any depth. Both the
 * conversion and the walk below use an explicit stack.
 */

import { z } from 'zod';
import type { CompositionTree, FieldMeta, RemoteNode } from './types.js';

// ============================================================================
// Schemas
// ============================================================================

const FieldMetaSchema = z
  .object({
    id: z.string(),
    title: z.string().optional(),
    name: z.string().optional(),
    type: z.string().optional(),
  })
  .passthrough();

const CHILD_KEYS = ['subcompositions', 'Subcompositions'] as const;

// ============================================================================
// Conversion
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toFieldList(value: unknown): FieldMeta[] | null {
  if (!Array.isArray(value)) {
    return null;
  }

  const fields: FieldMeta[] = [];
  for (const entry of value) {
    const parsed = FieldMetaSchema.safeParse(entry);
    if (!parsed.success || parsed.data.id.length === 0) {
      continue;
    }
    fields.push({
      id: parsed.data.id,
      title: parsed.data.title ?? parsed.data.name ?? parsed.data.id,
      type: parsed.data.type ?? '',
    });
  }
  return fields;
}

/**
 * Convert a raw model document into composition trees.
 * Entries that are not objects are dropped; nested lists are unwrapped.
 */
export function toCompositionTrees(raw: unknown): CompositionTree[] {
  const roots: CompositionTree[] = [];
  const stack: Array<{ item: unknown; into: CompositionTree[] }> = [{ item: raw, into: roots }];

  for (let next = stack.pop(); next !== undefined; next = stack.pop()) {
    const { item, into } = next;

    if (Array.isArray(item)) {
      for (let i = item.length - 1; i >= 0; i--) {
        stack.push({ item: item[i], into });
      }
      continue;
    }

    if (!isRecord(item)) {
      continue;
    }

    const id = item['id'];
    const name = item['name'];
    const node: CompositionTree = {
      id: typeof id === 'string' && id.length > 0 ? id : typeof id === 'number' ? String(id) : null,
      name: typeof name === 'string' ? name : null,
      model: toFieldList(item['model']),
      subcompositions: [],
    };
    into.push(node);

    const children: unknown[] = [];
    for (const key of CHILD_KEYS) {
      const value = item[key];
      if (Array.isArray(value)) {
        children.push(...value);
      }
    }
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ item: children[i], into: node.subcompositions });
    }
  }

  return roots;
}

// ============================================================================
// Traversal
// ============================================================================

/**
 * Visit every composition in pre-order, regardless of depth.
 */
export function walkCompositions(
  trees: readonly CompositionTree[],
  visit: (node: CompositionTree) => void
): void {
  const stack: CompositionTree[] = [...trees].reverse();

  for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
    visit(node);
    for (let i = node.subcompositions.length - 1; i >= 0; i--) {
      const child = node.subcompositions[i];
      if (child) {
        stack.push(child);
      }
    }
  }
}

/**
 * Collect every addressable composition.
 * Nodes without an id, a name or a field list are skipped; their
 * children are still visited.
 */
export function flatten(trees: readonly CompositionTree[]): RemoteNode[] {
  const nodes: RemoteNode[] = [];

  walkCompositions(trees, (node) => {
    if (node.id === null || node.name === null || node.model === null) {
      return;
    }
    nodes.push({
      id: node.id,
      name: node.name,
      fields: new Map(node.model.map((field): [string, FieldMeta] => [field.id, field])),
    });
  });

  return nodes;
}
