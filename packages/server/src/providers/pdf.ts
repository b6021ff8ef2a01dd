/**
 * PDF rendering using mupdf (WebAssembly, no system binaries).
 */

import * as mupdf from 'mupdf';
import { PDF_RENDER_SCALE } from '../config.js';
import type { PdfProvider } from './types.js';

const PDF_MAGIC = Buffer.from('%PDF-', 'latin1');

/** The header may be preceded by junk, within the first 1024 bytes. */
const MAGIC_SEARCH_WINDOW = 1024;

export function isPdf(data: Uint8Array): boolean {
  const head = Buffer.from(data.buffer, data.byteOffset, Math.min(data.byteLength, MAGIC_SEARCH_WINDOW));
  return head.includes(PDF_MAGIC);
}

/**
 * Render every page of a PDF to PNG.
 *
 * @param scale - Scale factor for rendering (1.0 = 72 DPI)
 */
export function renderPdfToPngs(data: Uint8Array, scale: number = PDF_RENDER_SCALE): Buffer[] {
  const doc = mupdf.Document.openDocument(new Uint8Array(data), 'application/pdf');
  const pageCount = doc.countPages();
  const matrix = mupdf.Matrix.scale(scale, scale);

  const images: Buffer[] = [];
  for (let i = 0; i < pageCount; i++) {
    const page = doc.loadPage(i);
    const pixmap = page.toPixmap(matrix, mupdf.ColorSpace.DeviceRGB, false);
    images.push(Buffer.from(pixmap.asPNG()));
  }

  return images;
}

export function createMupdfProvider(scale: number = PDF_RENDER_SCALE): PdfProvider {
  return {
    isPdf,
    renderPages: async (data) => renderPdfToPngs(data, scale),
  };
}
