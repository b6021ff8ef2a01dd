/**
 * ConversionDispatcher - validates a request against its operation contract
 * and runs the matching capability provider.
 *
 * `dispatch` always resolves to a well-formed response. Validation runs
 * before any provider call; provider failures are reported as DecodeError.
 */

import {
  DecodeError,
  errorMessage,
  OPERATION_CONTRACTS,
  failureResponse,
  fileStem,
  resolveOperation,
  successResponse,
  toConversionError,
  type ConversionOperation,
  type ConversionOutput,
  type ConversionRequest,
  type ConversionResponse,
  type InputFormat,
} from '@fileconv/shared';
import { createDefaultProviders, type CapabilityProviders, type RasterFormat } from './providers/index.js';

const EXTENSIONS: Record<RasterFormat, string> = {
  png: 'png',
  jpeg: 'jpg',
  webp: 'webp',
  tiff: 'tiff',
};

const FORMAT_LABELS: Record<InputFormat, string> = {
  pdf: 'PDF',
  png: 'PNG',
  jpeg: 'JPEG',
  webp: 'WebP',
  tiff: 'TIFF',
};

export class ConversionDispatcher {
  private readonly providers: CapabilityProviders;

  constructor(providers?: CapabilityProviders) {
    this.providers = providers ?? createDefaultProviders();
  }

  async dispatch(request: ConversionRequest): Promise<ConversionResponse> {
    const startTime = Date.now();
    try {
      const operation = resolveOperation(request.operationName, request.params);
      const outputs = await this.run(operation, request);
      console.log(
        `[dispatch] ${operation.kind} ${request.fileName} → ${outputs.length} output(s) in ${Date.now() - startTime}ms`,
      );
      return successResponse(outputs);
    } catch (err) {
      const error = toConversionError(err, 'DecodeError');
      console.warn(`[dispatch] ${request.operationName} ${request.fileName} failed: ${error.kind}: ${error.message}`);
      return failureResponse(error);
    }
  }

  private async run(operation: ConversionOperation, request: ConversionRequest): Promise<ConversionOutput[]> {
    const stem = fileStem(request.fileName);
    const data = request.sourceBytes;
    const { image, pdf } = this.providers;

    switch (operation.kind) {
      case 'pdf_to_png': {
        if (!pdf.isPdf(data)) {
          throw new DecodeError('pdf_to_png expects PDF input');
        }
        const pages = await this.provide('PDF', () => pdf.renderPages(data));
        return pages.map((page, index) => ({ name: `${stem}_page_${index + 1}.png`, data: page }));
      }

      case 'png_to_jpg':
        await this.expectFormat(operation.kind, data);
        return [{ name: `${stem}.jpg`, data: await this.provide('PNG', () => image.toJpeg(data)) }];

      case 'jpg_to_png':
        await this.expectFormat(operation.kind, data);
        return [{ name: `${stem}.png`, data: await this.provide('JPEG', () => image.toPng(data)) }];

      case 'to_grayscale': {
        const format = await this.expectFormat(operation.kind, data);
        return [
          {
            name: `${stem}_grayscale.${EXTENSIONS[format]}`,
            data: await this.provide(FORMAT_LABELS[format], () => image.grayscale(data, format)),
          },
        ];
      }

      case 'resize': {
        const format = await this.expectFormat(operation.kind, data);
        const { width, height } = operation;
        return [
          {
            name: `${stem}_resized.${EXTENSIONS[format]}`,
            data: await this.provide(FORMAT_LABELS[format], () => image.resize(data, width, height, format)),
          },
        ];
      }
    }
  }

  /**
   * Inspect the input and check it against the operation's accepted formats.
   */
  private async expectFormat(kind: ConversionOperation['kind'], data: Uint8Array): Promise<RasterFormat> {
    const accepts = OPERATION_CONTRACTS[kind].accepts;
    const expected = accepts.map((format) => FORMAT_LABELS[format]).join('/');

    const info = await this.provide(expected, () => this.providers.image.inspect(data));
    const format = accepts.find((candidate): candidate is RasterFormat => candidate !== 'pdf' && candidate === info.format);
    if (!format) {
      throw new DecodeError(`${kind} expects ${expected} input, got ${info.format.toUpperCase()}`);
    }
    return format;
  }

  /**
   * Run a provider call, reporting its failure as DecodeError.
   */
  private async provide<T>(label: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      throw new DecodeError(`Cannot decode input as ${label}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
