import type { StructureNode, TagGroup } from '@tagsense/model';

import { matchesTag } from './tag-matcher';

/**
 * Build the context window around the child at `childIndex` of `parent`.
 *
 * The window covers child indexes `[childIndex - halfWidth, childIndex + halfWidth]`
 * clipped to the parent's range. Content leaves and unresolvable children
 * inside the range are left out. When none are left out the target sits at
 * `min(halfWidth, childIndex)`; otherwise its index moves left by the number
 * of leaves dropped before it.
 */
export function buildTagGroup(
  parent: StructureNode,
  childIndex: number,
  halfWidth: number,
): TagGroup {
  const tags: StructureNode[] = [];
  let targetIndex = 0;
  const first = Math.max(0, childIndex - halfWidth);
  const last = Math.min(parent.childCount() - 1, childIndex + halfWidth);

  for (let index = first; index <= last; index++) {
    const child = parent.childAt(index);
    if (child?.kind !== 'element') continue;
    if (index === childIndex) targetIndex = tags.length;
    tags.push(child.element);
  }

  return Object.freeze({ tags: Object.freeze(tags), targetIndex });
}

/**
 * Collect one group per structure element whose type matches `pattern`.
 *
 * Depth-first, pre-order. A matching element ends the descent on its
 * branch, so no target is nested inside another target. Groups come back
 * in traversal order.
 * Each element is descended into at most once, so kids that loop back
 * to an ancestor do not recurse.
 *
 * @param surroundCount - Number of sibling tags to include around each
 *   target, split evenly on both sides
 */
export function buildTagGroups(
  root: StructureNode,
  pattern: RegExp,
  surroundCount: number,
): TagGroup[] {
  const halfWidth = Math.max(0, Math.floor(surroundCount / 2));
  const groups: TagGroup[] = [];
  const visited = new Set<StructureNode>();

  const visit = (parent: StructureNode): void => {
    visited.add(parent);
    const count = parent.childCount();
    for (let index = 0; index < count; index++) {
      const child = parent.childAt(index);
      if (child?.kind !== 'element') continue;

      const element = child.element;
      if (matchesTag(element.rawType, element.mappedType, pattern)) {
        groups.push(buildTagGroup(parent, index, halfWidth));
      } else if (!visited.has(element)) {
        visit(element);
      }
    }
  };

  visit(root);
  return groups;
}
