/**
 * Structure tree contract consumed by the enrichment core.
 *
 * Implementations wrap a concrete PDF library. The core never touches PDF
 * objects directly: it walks nodes, reads geometry and existing content, and
 * writes back through the mutators declared here.
 */

/**
 * Stable identity of a structure element for the duration of one run
 */
export interface StructureNodeId {
  /**
   * Object number of the element's indirect object (0 for direct objects)
   */
  objectNumber: number;

  /**
   * Value of the element's ID entry, or an empty string when absent
   */
  elementId: string;
}

/**
 * Rectangle in page user space (origin bottom-left, PDF points)
 */
export interface BoundingBox {
  left: number;
  bottom: number;
  right: number;
  top: number;
}

/**
 * Child slot of a structure element.
 *
 * Marked-content references and object references are `content` leaves;
 * only `element` children take part in grouping and context extraction.
 */
export type StructureChild =
  | { kind: 'element'; element: StructureNode }
  | { kind: 'content' };

/**
 * Attribute object owned by a structure element (the A entry)
 */
export interface AttributeEntry {
  readonly owner: string;
  getText(key: string): string | undefined;
  setText(key: string, value: string): void;
}

/**
 * Description of an associated file read from the AF entry
 */
export interface AssociatedFileInfo {
  name: string;
  description?: string;
  mimeType?: string;
  relationship?: string;
}

/**
 * Associated file to embed and attach to an element
 */
export interface AssociatedFileSpec {
  name: string;
  description: string;
  mimeType: string;
  relationship: string;
  contents: Uint8Array;
}

export interface StructureNode {
  readonly id: StructureNodeId;

  /**
   * Type name as written in the S entry
   */
  readonly rawType: string;

  /**
   * Type name after following the role map (equals rawType when unmapped)
   */
  readonly mappedType: string;

  childCount(): number;

  /**
   * Child at index, or null when the slot cannot be resolved
   */
  childAt(index: number): StructureChild | null;

  /**
   * Zero-based page indexes the element's own content occurs on, in order
   */
  pageNumbers(): number[];

  /**
   * First page index reachable through the child at index, or null
   */
  childPageNumber(index: number): number | null;

  /**
   * Bounds of the element's content on a page, or null when unknown
   */
  boundingBox(page: number): BoundingBox | null;

  /**
   * Text content of the element, cut to maxChars characters
   */
  text(maxChars: number): string;

  altText(): string;
  setAltText(value: string): void;

  attributeEntries(): AttributeEntry[];
  addAttributeEntry(owner: string): AttributeEntry;

  associatedFiles(): AssociatedFileInfo[];
  attachAssociatedFile(spec: AssociatedFileSpec): void;
}
