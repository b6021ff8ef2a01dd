/**
 * Capability providers - the imaging and PDF libraries the dispatcher calls.
 *
 * Providers are stateless functions over byte buffers; one instance serves
 * every connection.
 */

import type { InputFormat } from '@fileconv/shared';

export type RasterFormat = Exclude<InputFormat, 'pdf'>;

export interface ImageInfo {
  /** Format reported by the decoder, e.g. 'png', 'jpeg', 'gif'. */
  format: string;
  width: number;
  height: number;
}

export interface ImageProvider {
  inspect(data: Uint8Array): Promise<ImageInfo>;
  toJpeg(data: Uint8Array): Promise<Buffer>;
  toPng(data: Uint8Array): Promise<Buffer>;
  grayscale(data: Uint8Array, format: RasterFormat): Promise<Buffer>;
  resize(data: Uint8Array, width: number, height: number, format: RasterFormat): Promise<Buffer>;
}

export interface PdfProvider {
  isPdf(data: Uint8Array): boolean;
  /** One PNG per page, in page order. */
  renderPages(data: Uint8Array): Promise<Buffer[]>;
}

export interface CapabilityProviders {
  image: ImageProvider;
  pdf: PdfProvider;
}
