/**
 * A serialized layout value: the JSON tree the host sends to and receives
 * from the browser.
 */
export type LayoutValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | LayoutNode
  | LayoutValue[];

/**
 * A component (`{ type, namespace, props }`) or a props object
 * (`{ id, children, ... }`).
 */
export type LayoutNode = { [key: string]: LayoutValue };

/**
 * Props to merge, keyed by component id.
 */
export type ComponentStateUpdates = Record<string, LayoutNode>;

/**
 * Ids are compared with `-` replaced by `_`, so `graph-content` and
 * `graph_content` address the same component.
 */
export function normalizeComponentId(id: string): string {
  return id.replaceAll('-', '_');
}

function patchLayout(
  value: LayoutValue,
  updates: ReadonlyMap<string, LayoutNode>
): LayoutValue {
  if (Array.isArray(value)) {
    return value.map(item => patchLayout(item, updates));
  }

  // Strings, numbers, booleans and empty slots pass through.
  if (typeof value !== 'object' || value === null) return value;

  const next: LayoutNode = { ...value };

  if ('children' in next) next.children = patchLayout(next.children, updates);
  if ('props' in next) next.props = patchLayout(next.props, updates);

  // Only string ids participate; pattern-matching (object) ids are skipped.
  const id = next.id;
  if (typeof id === 'string') {
    const update = updates.get(normalizeComponentId(id));
    if (update) Object.assign(next, update);
  }

  return next;
}

/**
 * Returns a copy of `layout` with `updates` merged into the props of the
 * matching components.
 *
 * Traversal:
 * - Arrays are walked item by item.
 * - Objects are walked through `children` and `props`, whether those hold a
 *   single component or a list.
 * - An object carrying a string `id` is a props object; when its normalized id
 *   is a key of `updates`, the update's entries are merged over it. Merging
 *   happens after the object's own children were patched, so an update that
 *   sets `children` wins.
 *
 * The input tree is never mutated. With no updates the input is returned as is.
 *
 * @example
 * updateComponentState(layout, { title: { children: 'Shared view' } });
 */
export function updateComponentState(
  layout: LayoutValue,
  updates: ComponentStateUpdates
): LayoutValue {
  const entries = Object.entries(updates);
  if (entries.length === 0) return layout;

  const normalized = new Map<string, LayoutNode>();
  for (const [id, update] of entries) {
    normalized.set(normalizeComponentId(id), update);
  }

  return patchLayout(layout, normalized);
}
