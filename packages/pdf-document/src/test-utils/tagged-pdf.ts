import type { LoggerMethods } from '@tagsense/logger';
import type { PDFDict, PDFRef } from 'pdf-lib';

import { PDFDocument, PDFName, PDFString } from 'pdf-lib';
import { vi } from 'vitest';

import type { MarkedContent } from '../content/marked-content-bounds';
import { MapContentIndex } from '../content/pdfjs-content-index';

export function createMockLogger(): LoggerMethods {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * Object numbers of the fixture elements, as registered
 */
export interface SampleRefs {
  document: PDFRef;
  paragraph: PDFRef;
  chart: PDFRef;
  table: PDFRef;
  formula: PDFRef;
  link: PDFRef;
  span: PDFRef;
}

/**
 * Two-page tagged PDF:
 *
 * Document (Pg 0)
 *   P          MCID 0
 *   Chart      ID fig-1, Alt "old", MCID 1 + MCR on page 1 (role-mapped to Figure)
 *   Table      A {O: Table, Summary: Existing}; TR > TD MCID 2
 *   Formula    A {O: Layout, BBox}, ActualText "x squared", MCID 3
 *   Link       OBJR to a link annotation
 *   Span       no kids
 */
export async function createSampleTaggedPdf(): Promise<{
  bytes: Uint8Array;
  refs: SampleRefs;
}> {
  const pdf = await PDFDocument.create();
  const page0 = pdf.addPage([612, 792]);
  const page1 = pdf.addPage([612, 792]);
  const ctx = pdf.context;
  const elem = (dict: PDFDict): PDFRef => {
    dict.set(PDFName.of('Type'), PDFName.of('StructElem'));
    return ctx.register(dict);
  };

  const paragraph = elem(ctx.obj({ S: 'P', K: [0] }));
  const chart = elem(ctx.obj({
    S: 'Chart',
    ID: PDFString.of('fig-1'),
    Alt: PDFString.of('old'),
    K: [1, ctx.obj({ Type: 'MCR', Pg: page1.ref, MCID: 0 })],
  }));
  const cell = elem(ctx.obj({ S: 'TD', K: 2 }));
  const row = elem(ctx.obj({ S: 'TR', K: [cell] }));
  const table = elem(ctx.obj({
    S: 'Table',
    A: ctx.obj({ O: 'Table', Summary: PDFString.of('Existing') }),
    K: [row],
  }));
  const formula = elem(ctx.obj({
    S: 'Formula',
    A: ctx.obj({ O: 'Layout', BBox: [10, 20, 110, 70] }),
    ActualText: PDFString.of('x squared'),
    K: [3],
  }));
  const annotation = ctx.register(
    ctx.obj({ Type: 'Annot', Subtype: 'Link', Rect: [200, 200, 300, 220] }),
  );
  const link = elem(ctx.obj({ S: 'Link', K: [ctx.obj({ Type: 'OBJR', Obj: annotation })] }));
  const span = elem(ctx.obj({ S: 'Span' }));

  const document = elem(ctx.obj({
    S: 'Document',
    Pg: page0.ref,
    K: [paragraph, chart, table, formula, link, span],
  }));
  const root = ctx.register(
    ctx.obj({
      Type: 'StructTreeRoot',
      K: document,
      RoleMap: { Chart: 'Figure' },
    }),
  );
  pdf.catalog.set(PDFName.of('StructTreeRoot'), root);
  pdf.catalog.set(PDFName.of('MarkInfo'), ctx.obj({ Marked: true }));

  return {
    bytes: await pdf.save({ useObjectStreams: false }),
    refs: { document, paragraph, chart, table, formula, link, span },
  };
}

/**
 * Content index matching createSampleTaggedPdf
 */
export function createSampleContentIndex(): MapContentIndex {
  const page0 = new Map<number, MarkedContent>([
    [0, { text: 'Hello world', bounds: { left: 72, bottom: 700, right: 200, top: 712 } }],
    [1, { text: '', bounds: { left: 100, bottom: 300, right: 300, top: 500 } }],
    [2, { text: 'Cell', bounds: { left: 72, bottom: 200, right: 120, top: 212 } }],
    [3, { text: 'x^2', bounds: { left: 0, bottom: 0, right: 5, top: 5 } }],
  ]);
  const page1 = new Map<number, MarkedContent>([
    [0, { text: 'continued', bounds: { left: 50, bottom: 50, right: 150, top: 150 } }],
  ]);
  return new MapContentIndex(
    new Map([
      [0, page0],
      [1, page1],
    ]),
  );
}
