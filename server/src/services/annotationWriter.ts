import {
  PDFDocument,
  PDFPage,
  fill,
  lineTo,
  moveTo,
  rectangle,
  setFillingRgbColor,
  setLineWidth,
  setStrokingRgbColor,
  stroke,
} from 'pdf-lib';
import type { LineGeometry, RectGeometry, RgbColor, ShapeDescriptor } from '../types';

/** Thinnest line we write; anything below is invisible in most viewers */
export const MIN_LINE_WIDTH = 0.1;

// Annotation flag: print
const PRINT_FLAG = 4;

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

const colorComponents = (color: RgbColor): [number, number, number] => [
  clamp01(color.r),
  clamp01(color.g),
  clamp01(color.b),
];

/**
 * Clip a page-local rectangle to the page. Returns null when nothing with a
 * positive width and height is left.
 */
export function clipRectToPage(rect: RectGeometry, width: number, height: number): RectGeometry | null {
  const x0 = Math.max(0, Math.min(rect.x0, rect.x1));
  const y0 = Math.max(0, Math.min(rect.y0, rect.y1));
  const x1 = Math.min(width, Math.max(rect.x0, rect.x1));
  const y1 = Math.min(height, Math.max(rect.y0, rect.y1));
  if (x1 - x0 <= 0 || y1 - y0 <= 0) {
    return null;
  }
  return { x0, y0, x1, y1 };
}

/**
 * Page-local coordinates have a top-left origin at the corner of the visible
 * area (the CropBox); PDF user space grows upward.
 */
const toPdfPoint = (page: PDFPage, x: number, y: number): [number, number] => {
  const box = page.getCropBox();
  return [box.x + x, box.y + box.height - y];
};

function addSquareAnnotation(doc: PDFDocument, page: PDFPage, rect: RectGeometry, color: RgbColor): void {
  const [llx, lly] = toPdfPoint(page, rect.x0, rect.y1);
  const [urx, ury] = toPdfPoint(page, rect.x1, rect.y0);
  const width = urx - llx;
  const height = ury - lly;
  const [r, g, b] = colorComponents(color);

  const appearance = doc.context.formXObject([setFillingRgbColor(r, g, b), rectangle(0, 0, width, height), fill()], {
    BBox: [0, 0, width, height],
    Resources: {},
  });

  const annotation = doc.context.obj({
    Type: 'Annot',
    Subtype: 'Square',
    Rect: [llx, lly, urx, ury],
    IC: [r, g, b],
    C: [],
    BS: { W: 0 },
    F: PRINT_FLAG,
    P: page.ref,
    AP: { N: doc.context.register(appearance) },
  });
  page.node.addAnnot(doc.context.register(annotation));
}

function addLineAnnotation(
  doc: PDFDocument,
  page: PDFPage,
  line: LineGeometry,
  color: RgbColor,
  strokeWidth: number
): void {
  const width = Math.max(MIN_LINE_WIDTH, strokeWidth);
  const [x1, y1] = toPdfPoint(page, line.x1, line.y1);
  const [x2, y2] = toPdfPoint(page, line.x2, line.y2);
  const [r, g, b] = colorComponents(color);
  const bbox = [
    Math.min(x1, x2) - width,
    Math.min(y1, y2) - width,
    Math.max(x1, x2) + width,
    Math.max(y1, y2) + width,
  ];

  const appearance = doc.context.formXObject(
    [setStrokingRgbColor(r, g, b), setLineWidth(width), moveTo(x1, y1), lineTo(x2, y2), stroke()],
    { BBox: bbox, Resources: {} }
  );

  const annotation = doc.context.obj({
    Type: 'Annot',
    Subtype: 'Line',
    Rect: bbox,
    L: [x1, y1, x2, y2],
    C: [r, g, b],
    BS: { W: width },
    F: PRINT_FLAG,
    P: page.ref,
    AP: { N: doc.context.register(appearance) },
  });
  page.node.addAnnot(doc.context.register(annotation));
}

/**
 * Add one permanent annotation per descriptor. Rectangles are clipped to the
 * page and dropped when nothing is left; lines with identical endpoints are
 * dropped. A descriptor aimed at a missing page fails the whole call.
 * Returns the number of annotations written.
 */
export function applyAnnotations(doc: PDFDocument, shapes: readonly ShapeDescriptor[]): number {
  const pageCount = doc.getPageCount();
  let written = 0;

  for (const shape of shapes) {
    if (shape.pageIndex < 0 || shape.pageIndex >= pageCount) {
      throw new Error(`Page ${shape.pageIndex} does not exist (document has ${pageCount} pages)`);
    }
    const page = doc.getPage(shape.pageIndex);

    if (shape.kind === 'rectangle') {
      const { width, height } = page.getCropBox();
      const clipped = clipRectToPage(shape.geometry, width, height);
      if (!clipped) continue;
      addSquareAnnotation(doc, page, clipped, shape.color);
    } else {
      const { x1, y1, x2, y2 } = shape.geometry;
      if (x1 === x2 && y1 === y2) continue;
      addLineAnnotation(doc, page, shape.geometry, shape.color, shape.strokeWidth);
    }
    written++;
  }

  return written;
}

/**
 * Copy the pages and document info into a new document. Objects nothing on
 * a page refers to are left behind.
 */
async function compactDocument(source: PDFDocument): Promise<PDFDocument> {
  const target = await PDFDocument.create({ updateMetadata: false });
  const pages = await target.copyPages(source, source.getPageIndices());
  pages.forEach((page) => target.addPage(page));

  const title = source.getTitle();
  if (title !== undefined) target.setTitle(title);
  const author = source.getAuthor();
  if (author !== undefined) target.setAuthor(author);
  const subject = source.getSubject();
  if (subject !== undefined) target.setSubject(subject);
  const creator = source.getCreator();
  if (creator !== undefined) target.setCreator(creator);
  const producer = source.getProducer();
  if (producer !== undefined) target.setProducer(producer);

  return target;
}

/**
 * Load the original bytes, annotate them and serialize a new, compacted
 * document with compressed object streams. The input buffer is left
 * untouched.
 */
export async function annotateDocument(originalBytes: Uint8Array, shapes: readonly ShapeDescriptor[]): Promise<Uint8Array> {
  const source = await PDFDocument.load(originalBytes.slice(), { updateMetadata: false });
  const doc = await compactDocument(source);
  applyAnnotations(doc, shapes);
  return doc.save({ useObjectStreams: true });
}
