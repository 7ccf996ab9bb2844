import type { StructureNode } from '@tagsense/model';

/**
 * Label used in log lines, e.g. `Figure [obj: 12, id: fig-1, page: 3]`
 *
 * @param page - Zero-based page index; printed one-based
 */
export function formatTagIdentity(node: StructureNode, page: number | null): string {
  const pageLabel = page === null ? '?' : String(page + 1);
  return `${node.rawType} [obj: ${node.id.objectNumber}, id: ${node.id.elementId}, page: ${pageLabel}]`;
}

/**
 * First page of the element itself, else the first page found through
 * its children in order; null when none resolves
 */
export function resolveTargetPage(node: StructureNode): number | null {
  const [first] = node.pageNumbers();
  if (first !== undefined) return first;

  for (let index = 0; index < node.childCount(); index++) {
    const page = node.childPageNumber(index);
    if (page !== null) return page;
  }
  return null;
}
