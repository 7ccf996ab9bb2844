import type {
  AssociatedFileInfo,
  AssociatedFileSpec,
  AttributeEntry,
  BoundingBox,
  StructureChild,
  StructureNode,
} from '@tagsense/model';

type FakeChild = FakeStructureNode | 'content' | null;

export interface FakeNodeInit {
  mappedType?: string;
  elementId?: string;
  children?: FakeChild[];
  text?: string;
  alt?: string;
  pages?: number[];
  bbox?: BoundingBox | null;
  attributes?: Array<{ owner: string; values?: Record<string, string> }>;
  associatedFiles?: AssociatedFileInfo[];
}

class FakeAttributeEntry implements AttributeEntry {
  readonly values: Record<string, string>;

  constructor(
    readonly owner: string,
    values: Record<string, string> = {},
  ) {
    this.values = { ...values };
  }

  getText(key: string): string | undefined {
    return this.values[key];
  }

  setText(key: string, value: string): void {
    this.values[key] = value;
  }
}

let nextObjectNumber = 1;

/**
 * In-memory structure element for tests
 */
export class FakeStructureNode implements StructureNode {
  readonly id: { objectNumber: number; elementId: string };
  readonly rawType: string;
  readonly mappedType: string;
  readonly children: FakeChild[];
  readonly attributes: FakeAttributeEntry[];
  readonly attached: AssociatedFileSpec[] = [];
  readonly existingFiles: AssociatedFileInfo[];
  alt: string;
  private readonly ownText: string;
  private readonly pages: number[];
  private readonly bbox: BoundingBox | null;

  constructor(rawType: string, init: FakeNodeInit = {}) {
    this.id = {
      objectNumber: nextObjectNumber++,
      elementId: init.elementId ?? '',
    };
    this.rawType = rawType;
    this.mappedType = init.mappedType ?? rawType;
    this.children = init.children ?? [];
    this.ownText = init.text ?? '';
    this.alt = init.alt ?? '';
    this.pages = init.pages ?? [];
    this.bbox =
      init.bbox === undefined
        ? { left: 10, bottom: 10, right: 110, top: 60 }
        : init.bbox;
    this.attributes = (init.attributes ?? []).map(
      (entry) => new FakeAttributeEntry(entry.owner, entry.values),
    );
    this.existingFiles = init.associatedFiles ?? [];
  }

  childCount(): number {
    return this.children.length;
  }

  childAt(index: number): StructureChild | null {
    const child = this.children[index];
    if (child === undefined || child === null) return null;
    if (child === 'content') return { kind: 'content' };
    return { kind: 'element', element: child };
  }

  pageNumbers(): number[] {
    return [...this.pages];
  }

  childPageNumber(index: number): number | null {
    const child = this.children[index];
    if (!(child instanceof FakeStructureNode)) return null;
    const [first] = child.pageNumbers();
    if (first !== undefined) return first;
    for (let i = 0; i < child.childCount(); i++) {
      const page = child.childPageNumber(i);
      if (page !== null) return page;
    }
    return null;
  }

  boundingBox(page: number): BoundingBox | null {
    return this.pages.includes(page) ? this.bbox : null;
  }

  text(maxChars: number): string {
    return this.ownText.slice(0, Math.max(0, maxChars));
  }

  altText(): string {
    return this.alt;
  }

  setAltText(value: string): void {
    this.alt = value;
  }

  attributeEntries(): AttributeEntry[] {
    return [...this.attributes];
  }

  addAttributeEntry(owner: string): AttributeEntry {
    const entry = new FakeAttributeEntry(owner);
    this.attributes.push(entry);
    return entry;
  }

  associatedFiles(): AssociatedFileInfo[] {
    return [
      ...this.existingFiles,
      ...this.attached.map(({ contents: _contents, ...info }) => info),
    ];
  }

  attachAssociatedFile(spec: AssociatedFileSpec): void {
    this.attached.push(spec);
  }
}

export function el(rawType: string, init: FakeNodeInit = {}): FakeStructureNode {
  return new FakeStructureNode(rawType, init);
}

/**
 * Paragraph-like element with text
 */
export function textEl(rawType: string, text: string): FakeStructureNode {
  return el(rawType, { text, children: ['content'] });
}
