import type {
  AssociatedFileInfo,
  AssociatedFileSpec,
  AttributeEntry,
  BoundingBox,
  StructureChild,
  StructureNode,
  StructureNodeId,
} from '@tagsense/model';
import type { PDFContext, PDFObject } from 'pdf-lib';

import {
  PDFArray,
  PDFDict,
  PDFHexString,
  PDFName,
  PDFNumber,
  PDFRef,
  PDFStream,
  PDFString,
} from 'pdf-lib';

import { LAYOUT_OWNER } from '../config/constants';
import type { PageContentIndex } from '../content/pdfjs-content-index';
import { unionBox } from '../content/marked-content-bounds';

const KEY = {
  A: PDFName.of('A'),
  ActualText: PDFName.of('ActualText'),
  AF: PDFName.of('AF'),
  AFRelationship: PDFName.of('AFRelationship'),
  Alt: PDFName.of('Alt'),
  BBox: PDFName.of('BBox'),
  Desc: PDFName.of('Desc'),
  EF: PDFName.of('EF'),
  F: PDFName.of('F'),
  ID: PDFName.of('ID'),
  K: PDFName.of('K'),
  MCID: PDFName.of('MCID'),
  O: PDFName.of('O'),
  Obj: PDFName.of('Obj'),
  Pg: PDFName.of('Pg'),
  Rect: PDFName.of('Rect'),
  S: PDFName.of('S'),
  Subtype: PDFName.of('Subtype'),
  Type: PDFName.of('Type'),
  UF: PDFName.of('UF'),
} as const;

/**
 * Text of a PDF string, hex string or name; undefined for anything else
 */
export function decodeText(object: PDFObject | undefined): string | undefined {
  if (object instanceof PDFString || object instanceof PDFHexString) {
    return object.decodeText();
  }
  if (object instanceof PDFName) return object.decodeText();
  if (object instanceof PDFNumber) return String(object.asNumber());
  return undefined;
}

function toRect(object: PDFObject | undefined): BoundingBox | null {
  if (!(object instanceof PDFArray) || object.size() !== 4) return null;
  const values = object.asArray().map((item) =>
    item instanceof PDFNumber ? item.asNumber() : Number.NaN,
  );
  if (!values.every(Number.isFinite)) return null;
  const [x0, y0, x1, y1] = values;
  return {
    left: Math.min(x0, x1),
    bottom: Math.min(y0, y1),
    right: Math.max(x0, x1),
    top: Math.max(y0, y1),
  };
}

/**
 * Leaf of marked content or an object reference, with its resolved page
 */
type ContentLeaf =
  | { page: number | null; mcid: number }
  | { page: number | null; rect: BoundingBox | null };

/**
 * Document-wide state shared by every node of one structure tree
 */
export class StructureTree {
  private readonly nodes = new Map<PDFDict, PdfStructureNode>();
  private readonly pageIndexByRef: Map<string, number>;
  private readonly roleMap = new Map<string, string>();

  constructor(
    readonly context: PDFContext,
    pageRefs: readonly PDFRef[],
    readonly contentIndex: PageContentIndex,
    roleMap?: PDFDict,
  ) {
    this.pageIndexByRef = new Map(pageRefs.map((ref, index) => [ref.toString(), index]));
    for (const [key, value] of roleMap?.entries() ?? []) {
      const target = decodeText(this.context.lookup(value));
      if (target !== undefined) this.roleMap.set(key.decodeText(), target);
    }
  }

  /**
   * Follow the role map from a type name; cycles stop at the last new name
   */
  mapRole(rawType: string): string {
    const seen = new Set([rawType]);
    let current = rawType;
    for (;;) {
      const next = this.roleMap.get(current);
      if (next === undefined || seen.has(next)) return current;
      seen.add(next);
      current = next;
    }
  }

  pageIndexOf(object: PDFObject | undefined): number | null {
    if (!(object instanceof PDFRef)) return null;
    return this.pageIndexByRef.get(object.toString()) ?? null;
  }

  lookup(object: PDFObject | undefined): PDFObject | undefined {
    return object === undefined ? undefined : this.context.lookup(object);
  }

  /**
   * Node for an element dictionary; one instance per dictionary
   */
  nodeFor(
    dict: PDFDict,
    ref: PDFRef | undefined,
    inheritedPage: number | null,
  ): PdfStructureNode {
    let node = this.nodes.get(dict);
    if (!node) {
      node = new PdfStructureNode(this, dict, ref?.objectNumber ?? 0, inheritedPage);
      this.nodes.set(dict, node);
    }
    return node;
  }
}

/**
 * Attribute object (an entry of A) backed by its dictionary
 */
export class PdfAttributeEntry implements AttributeEntry {
  readonly owner: string;

  constructor(
    private readonly tree: StructureTree,
    private readonly dict: PDFDict,
  ) {
    this.owner = decodeText(dict.lookup(KEY.O)) ?? '';
  }

  getText(key: string): string | undefined {
    return decodeText(this.tree.lookup(this.dict.get(PDFName.of(key))));
  }

  setText(key: string, value: string): void {
    this.dict.set(PDFName.of(key), PDFHexString.fromText(value));
  }
}

/**
 * StructureNode over a pdf-lib structure element dictionary.
 *
 * Page references (Pg) inherit from the nearest ancestor. Geometry and
 * text of marked content come from the tree's PageContentIndex; a Layout
 * attribute BBox takes precedence over computed bounds.
 */
export class PdfStructureNode implements StructureNode {
  readonly id: StructureNodeId;
  readonly rawType: string;
  readonly mappedType: string;
  private readonly page: number | null;
  private kidsCache?: PDFObject[];

  constructor(
    private readonly tree: StructureTree,
    readonly dict: PDFDict,
    objectNumber: number,
    inheritedPage: number | null,
  ) {
    this.rawType = decodeText(dict.lookup(KEY.S)) ?? '';
    this.mappedType = tree.mapRole(this.rawType);
    this.id = {
      objectNumber,
      elementId: decodeText(dict.lookup(KEY.ID)) ?? '',
    };
    this.page = tree.pageIndexOf(dict.get(KEY.Pg)) ?? inheritedPage;
  }

  private kids(): PDFObject[] {
    if (!this.kidsCache) {
      const k = this.dict.get(KEY.K);
      const resolved = this.tree.lookup(k);
      this.kidsCache =
        resolved instanceof PDFArray ? resolved.asArray() : k === undefined ? [] : [k];
    }
    return this.kidsCache;
  }

  childCount(): number {
    return this.kids().length;
  }

  childAt(index: number): StructureChild | null {
    const kid = this.kids()[index];
    if (kid === undefined) return null;

    const resolved = this.tree.lookup(kid);
    if (resolved instanceof PDFNumber) return { kind: 'content' };
    if (!(resolved instanceof PDFDict)) return null;

    const type = decodeText(resolved.lookup(KEY.Type));
    if (type === 'MCR' || type === 'OBJR') return { kind: 'content' };
    if (!resolved.has(KEY.S)) return null;

    return {
      kind: 'element',
      element: this.tree.nodeFor(
        resolved,
        kid instanceof PDFRef ? kid : undefined,
        this.page,
      ),
    };
  }

  /**
   * Content leaf for a kid, or null when the kid is an element or unknown
   */
  private leafAt(index: number): ContentLeaf | null {
    const resolved = this.tree.lookup(this.kids()[index]);
    if (resolved instanceof PDFNumber) {
      return { page: this.page, mcid: resolved.asNumber() };
    }
    if (!(resolved instanceof PDFDict)) return null;

    const page = this.tree.pageIndexOf(resolved.get(KEY.Pg)) ?? this.page;
    const type = decodeText(resolved.lookup(KEY.Type));
    if (type === 'MCR') {
      const mcid = resolved.lookup(KEY.MCID);
      return mcid instanceof PDFNumber ? { page, mcid: mcid.asNumber() } : null;
    }
    if (type === 'OBJR') {
      const target = this.tree.lookup(resolved.get(KEY.Obj));
      return {
        page,
        rect: target instanceof PDFDict ? toRect(target.lookup(KEY.Rect)) : null,
      };
    }
    return null;
  }

  /**
   * Each element is walked once; a kid that points back to an element
   * already visited contributes nothing
   */
  private collectLeaves(out: ContentLeaf[], visited: Set<PDFDict>): void {
    visited.add(this.dict);
    for (let index = 0; index < this.childCount(); index++) {
      const child = this.childAt(index);
      if (child?.kind === 'element') {
        if (child.element instanceof PdfStructureNode && !visited.has(child.element.dict)) {
          child.element.collectLeaves(out, visited);
        }
        continue;
      }
      const leaf = this.leafAt(index);
      if (leaf) out.push(leaf);
    }
  }

  private leaves(): ContentLeaf[] {
    const out: ContentLeaf[] = [];
    this.collectLeaves(out, new Set());
    return out;
  }

  pageNumbers(): number[] {
    const pages: number[] = [];
    for (const { page } of this.leaves()) {
      if (page !== null && !pages.includes(page)) pages.push(page);
    }
    return pages;
  }

  childPageNumber(index: number): number | null {
    const child = this.childAt(index);
    if (child?.kind === 'element') {
      return child.element.pageNumbers()[0] ?? null;
    }
    return this.leafAt(index)?.page ?? null;
  }

  boundingBox(page: number): BoundingBox | null {
    const layoutBox = this.layoutBBox();
    if (layoutBox && (this.page === page || this.pageNumbers().includes(page))) {
      return layoutBox;
    }

    let box: BoundingBox | null = null;
    for (const leaf of this.leaves()) {
      if (leaf.page !== page) continue;
      const leafBox =
        'mcid' in leaf
          ? this.tree.contentIndex.lookup(page, leaf.mcid)?.bounds
          : leaf.rect;
      if (leafBox) box = unionBox(box, leafBox);
    }
    return box;
  }

  private layoutBBox(): BoundingBox | null {
    for (const entry of this.attributeDicts()) {
      if (decodeText(entry.lookup(KEY.O)) !== LAYOUT_OWNER) continue;
      const box = toRect(this.tree.lookup(entry.get(KEY.BBox)));
      if (box) return box;
    }
    return null;
  }

  text(maxChars: number): string {
    const pieces: string[] = [];
    this.collectText(pieces, new Set());
    return pieces
      .join(' ')
      .replace(/\s+/g, ' ')
      .trim()
      .slice(0, Math.max(0, maxChars));
  }

  private collectText(pieces: string[], visited: Set<PDFDict>): void {
    visited.add(this.dict);
    const actualText = decodeText(this.dict.lookup(KEY.ActualText));
    if (actualText !== undefined) {
      pieces.push(actualText);
      return;
    }

    for (let index = 0; index < this.childCount(); index++) {
      const child = this.childAt(index);
      if (child?.kind === 'element') {
        if (child.element instanceof PdfStructureNode && !visited.has(child.element.dict)) {
          child.element.collectText(pieces, visited);
        }
        continue;
      }
      const leaf = this.leafAt(index);
      if (leaf && 'mcid' in leaf && leaf.page !== null) {
        const content = this.tree.contentIndex.lookup(leaf.page, leaf.mcid);
        if (content?.text) pieces.push(content.text);
      }
    }
  }

  altText(): string {
    return decodeText(this.dict.lookup(KEY.Alt)) ?? '';
  }

  setAltText(value: string): void {
    this.dict.set(KEY.Alt, PDFHexString.fromText(value));
  }

  /**
   * Attribute dictionaries of A in order; revision numbers are skipped
   */
  private attributeDicts(): PDFDict[] {
    const a = this.tree.lookup(this.dict.get(KEY.A));
    const items = a instanceof PDFArray ? a.asArray() : a === undefined ? [] : [a];
    return items
      .map((item) => this.tree.lookup(item))
      .filter((item): item is PDFDict => item instanceof PDFDict);
  }

  attributeEntries(): AttributeEntry[] {
    return this.attributeDicts().map((dict) => new PdfAttributeEntry(this.tree, dict));
  }

  addAttributeEntry(owner: string): AttributeEntry {
    const dict = this.tree.context.obj({ O: owner });
    appendEntry(this.tree, this.dict, KEY.A, dict, false);
    return new PdfAttributeEntry(this.tree, dict);
  }

  associatedFiles(): AssociatedFileInfo[] {
    const af = this.tree.lookup(this.dict.get(KEY.AF));
    const items = af instanceof PDFArray ? af.asArray() : af === undefined ? [] : [af];

    return items
      .map((item) => this.tree.lookup(item))
      .filter((item): item is PDFDict => item instanceof PDFDict)
      .map((spec) => {
        const embedded = this.tree.lookup(spec.get(KEY.EF));
        const stream =
          embedded instanceof PDFDict
            ? this.tree.lookup(embedded.get(KEY.F) ?? embedded.get(KEY.UF))
            : undefined;
        return {
          name: decodeText(spec.lookup(KEY.UF)) ?? decodeText(spec.lookup(KEY.F)) ?? '',
          description: decodeText(spec.lookup(KEY.Desc)),
          mimeType:
            stream instanceof PDFStream
              ? decodeText(stream.dict.lookup(KEY.Subtype))
              : undefined,
          relationship: decodeText(spec.lookup(KEY.AFRelationship)),
        };
      });
  }

  attachAssociatedFile(spec: AssociatedFileSpec): void {
    const { context } = this.tree;
    const stream = context.flateStream(spec.contents, {
      Type: 'EmbeddedFile',
      Subtype: spec.mimeType,
    });
    const streamRef = context.register(stream);

    const fileSpec = context.obj({
      Type: 'Filespec',
      F: PDFString.of(spec.name),
      UF: PDFHexString.fromText(spec.name),
      Desc: PDFHexString.fromText(spec.description),
      AFRelationship: spec.relationship,
      EF: { F: streamRef, UF: streamRef },
    });
    appendEntry(this.tree, this.dict, KEY.AF, context.register(fileSpec), true);
  }
}

/**
 * Add a value to an entry that may hold a single object or an array,
 * turning a single object into an array. AF is always an array.
 */
function appendEntry(
  tree: StructureTree,
  dict: PDFDict,
  key: PDFName,
  value: PDFObject,
  alwaysArray: boolean,
): void {
  const current = dict.get(key);
  if (current === undefined) {
    dict.set(key, alwaysArray ? tree.context.obj([value]) : value);
    return;
  }

  const resolved = tree.lookup(current);
  if (resolved instanceof PDFArray) {
    resolved.push(value);
    return;
  }
  dict.set(key, tree.context.obj([current, value]));
}
