import type { CategoryNode, CategoryRecord } from "./types.js";

function byName(a: CategoryRecord, b: CategoryRecord): number {
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  return a.id - b.id;
}

/**
 * Arrange flat category rows into a forest.
 *
 * Roots and siblings are sorted by name. A row whose parent chain never
 * reaches a root (a cycle the schema does not prevent) is emitted as an
 * extra root after the regular ones, in id order, so every row shows up
 * exactly once.
 */
export function buildCategoryTree(categories: CategoryRecord[]): CategoryNode[] {
  const ids = new Set(categories.map((c) => c.id));
  const childrenOf = new Map<number, CategoryRecord[]>();
  const roots: CategoryRecord[] = [];

  for (const category of categories) {
    if (category.parentId === null || !ids.has(category.parentId)) {
      roots.push(category);
      continue;
    }
    const siblings = childrenOf.get(category.parentId);
    if (siblings) siblings.push(category);
    else childrenOf.set(category.parentId, [category]);
  }

  const visited = new Set<number>();
  const build = (category: CategoryRecord): CategoryNode => {
    visited.add(category.id);
    const children = (childrenOf.get(category.id) ?? [])
      .filter((child) => !visited.has(child.id))
      .sort(byName)
      .map(build);
    return { category, children };
  };

  const forest = [...roots].sort(byName).map(build);

  const stranded = categories
    .filter((c) => !visited.has(c.id))
    .sort((a, b) => a.id - b.id);
  for (const category of stranded) {
    if (!visited.has(category.id)) forest.push(build(category));
  }

  return forest;
}

/** Indented outline, two spaces per level: `Reading [2]`. */
export function formatCategoryTree(forest: CategoryNode[]): string[] {
  const lines: string[] = [];
  const walk = (node: CategoryNode, depth: number): void => {
    lines.push(`${"  ".repeat(depth)}${node.category.name} [${node.category.id}]`);
    for (const child of node.children) walk(child, depth + 1);
  };
  for (const root of forest) walk(root, 0);
  return lines;
}
