import type {
  AttributeEntry,
  EnrichmentRequest,
  OperationKind,
  StructureNode,
} from '@tagsense/model';

import { MATHML } from '../config/constants';

/**
 * Pre-check and write-back for one operation kind
 */
export interface MutationPolicy {
  /**
   * Whether the element already holds content that must be kept
   */
  shouldSkip(node: StructureNode, request: EnrichmentRequest): boolean;

  /**
   * Write generated text onto the element
   */
  apply(node: StructureNode, text: string, request: EnrichmentRequest): void;
}

const TABLE_OWNER = 'Table';
const SUMMARY_KEY = 'Summary';

/**
 * Last attribute entry owned by Table, searching newest first
 */
export function findTableAttribute(node: StructureNode): AttributeEntry | undefined {
  const entries = node.attributeEntries();
  for (let index = entries.length - 1; index >= 0; index--) {
    if (entries[index].owner === TABLE_OWNER) return entries[index];
  }
  return undefined;
}

/**
 * Whether any Table-owned attribute entry has a non-empty Summary
 */
export function hasTableSummary(node: StructureNode): boolean {
  return node
    .attributeEntries()
    .some((entry) => entry.owner === TABLE_OWNER && !!entry.getText(SUMMARY_KEY));
}

export function hasMathMl(node: StructureNode): boolean {
  return node
    .associatedFiles()
    .some(
      (file) => file.mimeType === MATHML.MIME_TYPE || file.name.startsWith('mathml'),
    );
}

const CODE_FENCE = /^```[\w-]*\s*\n?([\s\S]*?)\n?```$/;

/**
 * Turn a model answer into a standalone MathML XML document.
 *
 * Code fences are stripped, a `<math>` root in the MathML namespace is added
 * when the answer has none, and an XML declaration is prepended when missing.
 */
export function buildMathMlDocument(answer: string): string {
  const trimmed = answer.trim();
  let body = (CODE_FENCE.exec(trimmed)?.[1] ?? trimmed).trim();

  if (!/<(?:\w+:)?math[\s>]/.test(body)) {
    body = `<math xmlns="${MATHML.NAMESPACE}">\n${body}\n</math>`;
  }
  if (!body.startsWith('<?xml')) {
    body = `<?xml version="1.0" encoding="UTF-8"?>\n${body}`;
  }
  return body;
}

const altTextPolicy: MutationPolicy = {
  shouldSkip: (node, request) => !request.overwrite && node.altText() !== '',
  apply: (node, text) => node.setAltText(text),
};

const tableSummaryPolicy: MutationPolicy = {
  shouldSkip: (node, request) => !request.overwrite && hasTableSummary(node),
  apply: (node, text) => {
    const entry = findTableAttribute(node) ?? node.addAttributeEntry(TABLE_OWNER);
    entry.setText(SUMMARY_KEY, text);
  },
};

const mathMlPolicy: MutationPolicy = {
  shouldSkip: (node, request) =>
    request.mathMlExisting === 'respect-overwrite' &&
    !request.overwrite &&
    hasMathMl(node),
  apply: (node, text, request) => {
    node.attachAssociatedFile({
      name: request.mathMlVersion,
      description: request.mathMlVersion,
      mimeType: MATHML.MIME_TYPE,
      relationship: MATHML.RELATIONSHIP,
      contents: new TextEncoder().encode(buildMathMlDocument(text)),
    });
  },
};

export const MUTATION_POLICIES: Record<OperationKind, MutationPolicy> = {
  'alt-text': altTextPolicy,
  'table-summary': tableSummaryPolicy,
  mathml: mathMlPolicy,
};
