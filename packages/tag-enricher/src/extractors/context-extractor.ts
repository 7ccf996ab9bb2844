import type { StructureNode } from '@tagsense/model';

/**
 * Content kinds with their own extraction rule
 */
export type ContentKind = 'text' | 'alternate' | 'list' | 'table' | 'other';

/**
 * Nested string arrays produced for lists and tables
 */
export type ContextData = string | ContextData[];

const KIND_BY_TYPE = new Map<string, ContentKind>([
  ['P', 'text'],
  ['H', 'text'],
  ['H1', 'text'],
  ['H2', 'text'],
  ['H3', 'text'],
  ['H4', 'text'],
  ['H5', 'text'],
  ['H6', 'text'],
  ['H7', 'text'],
  ['H8', 'text'],
  ['Caption', 'text'],
  ['Title', 'text'],
  ['Figure', 'alternate'],
  ['Formula', 'alternate'],
  ['L', 'list'],
  ['Table', 'table'],
]);

const TABLE_SECTIONS = ['THead', 'TBody', 'TFoot'];
const TABLE_CELLS = ['TH', 'TD'];

/**
 * Kind of a node, looked up by raw type first and role-mapped type second
 */
export function contentKindOf(node: StructureNode): ContentKind {
  return (
    KIND_BY_TYPE.get(node.rawType) ?? KIND_BY_TYPE.get(node.mappedType) ?? 'other'
  );
}

/**
 * Cut every string so the whole structure fits `maxLength` characters.
 *
 * An array of N members gives each member `floor(maxLength / N)`,
 * recursively; strings are cut to their share.
 */
export function shortenData(data: ContextData, maxLength: number): ContextData {
  if (typeof data === 'string') {
    return data.slice(0, Math.max(0, maxLength));
  }
  if (data.length === 0) {
    return [];
  }
  const share = Math.floor(maxLength / data.length);
  return data.map((member) => shortenData(member, share));
}

function isType(node: StructureNode, types: readonly string[]): boolean {
  return types.includes(node.rawType) || types.includes(node.mappedType);
}

function childElements(node: StructureNode): StructureNode[] {
  const elements: StructureNode[] = [];
  for (let index = 0; index < node.childCount(); index++) {
    const child = node.childAt(index);
    if (child?.kind === 'element') {
      elements.push(child.element);
    }
  }
  return elements;
}

function tableRows(table: StructureNode): StructureNode[] {
  return childElements(table).flatMap((child) => {
    if (isType(child, ['TR'])) return [child];
    if (isType(child, TABLE_SECTIONS)) {
      return childElements(child).filter((row) => isType(row, ['TR']));
    }
    return [];
  });
}

/**
 * Elements being extracted further up the current call chain
 */
type ExtractionPath = ReadonlySet<StructureNode>;

function cellText(cell: StructureNode, maxChars: number, path: ExtractionPath): string {
  const text = cell.text(maxChars);
  if (text) return text;

  for (const child of childElements(cell)) {
    const content = extractWithin(child, maxChars, path);
    if (content) return content;
  }
  return '';
}

function listBodies(list: StructureNode): StructureNode[] {
  return childElements(list)
    .filter((item) => isType(item, ['LI']))
    .flatMap((item) =>
      childElements(item).filter((body) => isType(body, ['LBody'])),
    );
}

function extractTable(table: StructureNode, maxChars: number, path: ExtractionPath): string {
  const data: string[][] = tableRows(table).map((row) =>
    childElements(row)
      .filter((cell) => isType(cell, TABLE_CELLS))
      .map((cell) => cellText(cell, maxChars, path))
      .filter((text) => text !== ''),
  );
  return JSON.stringify(shortenData(data, maxChars));
}

function extractList(list: StructureNode, maxChars: number, path: ExtractionPath): string {
  const data: string[] = [];

  for (const body of listBodies(list)) {
    const text = body.text(maxChars);
    if (text) {
      data.push(text);
      continue;
    }
    for (const child of childElements(body)) {
      const content = extractWithin(child, maxChars, path);
      if (content) data.push(content);
    }
  }

  return JSON.stringify(shortenData(data, maxChars));
}

const EXTRACTORS: Record<
  ContentKind,
  (node: StructureNode, maxChars: number, path: ExtractionPath) => string
> = {
  text: (node, maxChars) => node.text(maxChars).slice(0, maxChars),
  alternate: (node, maxChars) => node.altText().slice(0, maxChars),
  list: extractList,
  table: extractTable,
  other: (node, maxChars) => node.text(maxChars).slice(0, maxChars),
};

/**
 * Short textual summary of a node for use as model context.
 *
 * Paragraphs and headings give their text, figures and formulas their
 * alternate text, lists and tables a compact JSON array. Missing content
 * yields an empty string.
 */
export function extractContext(node: StructureNode, maxChars: number): string {
  return extractWithin(node, Math.max(0, Math.floor(maxChars)), new Set());
}

/**
 * An element nested inside itself contributes nothing the second time
 */
function extractWithin(node: StructureNode, maxChars: number, path: ExtractionPath): string {
  if (path.has(node)) return '';
  return EXTRACTORS[contentKindOf(node)](node, maxChars, new Set(path).add(node));
}
