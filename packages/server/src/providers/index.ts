export type {
  CapabilityProviders,
  ImageInfo,
  ImageProvider,
  PdfProvider,
  RasterFormat,
} from './types.js';
export { sharpImageProvider } from './image.js';
export { createMupdfProvider, isPdf, renderPdfToPngs } from './pdf.js';

import type { CapabilityProviders } from './types.js';
import { sharpImageProvider } from './image.js';
import { createMupdfProvider } from './pdf.js';

export function createDefaultProviders(): CapabilityProviders {
  return {
    image: sharpImageProvider,
    pdf: createMupdfProvider(),
  };
}
