/**
 * Document Rasterizer
 *
 * Renders every page of a PDF with mupdf and stacks the renders into one
 * composite JPEG, so a multi-page form can be sent as a single image.
 */

import fs from "node:fs";
import path from "node:path";
import mupdf, { type Document as MupdfDocument } from "mupdf";
import { Observable } from "rxjs";
import { DocumentDecodeError, EmptyDocumentError, PageRangeError } from "../errors";
import {
  decodePng,
  encodeJpeg,
  stackVertically,
  type Placement,
} from "../images/png-utils";

// ============================================================================
// Types
// ============================================================================

export interface RenderInput {
  /** PDF file contents as a Buffer */
  pdfBuffer: Buffer;
  /** 1 renders at the PDF's native 72 DPI */
  scale?: number;
  /** Page range to render (1-indexed, inclusive) */
  startPage?: number;
  endPage?: number;
}

export interface PageImage {
  pageNumber: number;
  width: number;
  height: number;
  pngBuffer: Buffer;
}

export interface RenderProgress {
  page: number;
  totalPages: number;
}

export interface RasterizeOptions {
  pdfPath: string;
  /** Defaults to compositePathFor(pdfPath, outputSuffix) */
  outputPath?: string;
  outputSuffix?: string;
  scale?: number;
  quality?: number;
  startPage?: number;
  endPage?: number;
  /** Size above which a warning is printed; nothing is resized */
  maxBytes?: number;
}

export interface RasterizeResult {
  outputPath: string;
  width: number;
  height: number;
  byteLength: number;
  pageCount: number;
  placements: (Placement & { pageNumber: number })[];
}

const DEFAULT_SUFFIX = ".composite.jpg";
const DEFAULT_QUALITY = 100;

// ============================================================================
// Rendering
// ============================================================================

function checkPageNumber(label: string, value: number | undefined): void {
  if (value === undefined) return;
  if (!Number.isInteger(value) || value < 1) {
    throw new PageRangeError(`${label} must be an integer of at least 1, got ${value}`);
  }
}

const tick = () => new Promise<void>((r) => setImmediate(r));

function openPdfFromBuffer(buffer: Buffer): MupdfDocument {
  // Suppress mupdf stderr warnings
  const origWrite = process.stderr.write;
  process.stderr.write = () => true;
  try {
    return mupdf.Document.openDocument(buffer, "application/pdf");
  } catch (err) {
    throw new DocumentDecodeError(
      `Could not open PDF: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  } finally {
    process.stderr.write = origWrite;
  }
}

function countPages(doc: MupdfDocument): number {
  try {
    return doc.countPages();
  } catch (err) {
    throw new DocumentDecodeError(
      `Could not read page tree: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
}

function renderPage(doc: MupdfDocument, pageIndex: number, scale: number): PageImage {
  try {
    const page = doc.loadPage(pageIndex);
    const pixmap = page.toPixmap(
      mupdf.Matrix.scale(scale, scale),
      mupdf.ColorSpace.DeviceRGB,
      false
    );
    return {
      pageNumber: pageIndex + 1,
      width: pixmap.getWidth(),
      height: pixmap.getHeight(),
      pngBuffer: Buffer.from(pixmap.asPNG()),
    };
  } catch (err) {
    throw new DocumentDecodeError(
      `Could not render page ${pageIndex + 1}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
}

/**
 * Render pages in document order.
 *
 * @throws DocumentDecodeError when mupdf cannot open the input
 * @throws EmptyDocumentError when the document (or the requested range) has no pages
 * @throws PageRangeError when a page bound is not a positive integer
 */
export async function renderPages(
  input: RenderInput,
  onProgress?: (progress: RenderProgress) => void
): Promise<PageImage[]> {
  const { pdfBuffer, scale = 1, startPage = 1, endPage } = input;
  checkPageNumber("startPage", startPage);
  checkPageNumber("endPage", endPage);

  const doc = openPdfFromBuffer(pdfBuffer);
  const totalPagesInPdf = countPages(doc);
  if (totalPagesInPdf === 0) {
    throw new EmptyDocumentError();
  }

  const start = startPage - 1;
  const end = Math.min(endPage ?? totalPagesInPdf, totalPagesInPdf);
  const rangeSize = end - start;
  if (rangeSize <= 0) {
    throw new EmptyDocumentError(
      `Page range ${startPage}-${endPage ?? totalPagesInPdf} is empty (document has ${totalPagesInPdf} pages)`
    );
  }

  const pages: PageImage[] = [];
  for (let i = start; i < end; i++) {
    pages.push(renderPage(doc, i, scale));
    onProgress?.({ page: i - start + 1, totalPages: rangeSize });
    await tick();
  }
  return pages;
}

// ============================================================================
// Composite
// ============================================================================

export function compositePathFor(inputPath: string, suffix = DEFAULT_SUFFIX): string {
  const base = path.basename(inputPath, path.extname(inputPath));
  return path.join(path.dirname(inputPath), `${base}${suffix}`);
}

export async function rasterizeDocument(
  options: RasterizeOptions,
  onProgress?: (progress: RenderProgress) => void
): Promise<RasterizeResult> {
  const outputPath =
    options.outputPath ?? compositePathFor(options.pdfPath, options.outputSuffix);

  const pages = await renderPages(
    {
      pdfBuffer: fs.readFileSync(options.pdfPath),
      scale: options.scale,
      startPage: options.startPage,
      endPage: options.endPage,
    },
    onProgress
  );

  const composite = stackVertically(pages.map((p) => decodePng(p.pngBuffer)));
  const jpeg = await encodeJpeg(composite, options.quality ?? DEFAULT_QUALITY);

  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, jpeg);

  if (options.maxBytes !== undefined && jpeg.length > options.maxBytes) {
    console.warn(
      `[rasterize] ${outputPath} is ${jpeg.length} bytes, above the ${options.maxBytes} byte limit of the inference endpoint`
    );
  }

  return {
    outputPath,
    width: composite.width,
    height: composite.height,
    byteLength: jpeg.length,
    pageCount: pages.length,
    placements: composite.placements.map((p) => ({
      ...p,
      pageNumber: pages[p.index].pageNumber,
    })),
  };
}

/**
 * Observable wrapper for CLI usage: emits page progress, completes once the
 * composite is on disk.
 */
export function rasterize(
  options: RasterizeOptions,
  onDone?: (result: RasterizeResult) => void
): Observable<RenderProgress> {
  return new Observable<RenderProgress>((subscriber) => {
    rasterizeDocument(options, (p) => subscriber.next(p)).then(
      (result) => {
        onDone?.(result);
        subscriber.complete();
      },
      (err: unknown) => subscriber.error(err)
    );
  });
}
