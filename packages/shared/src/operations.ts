/**
 * Operations - the closed set of conversions and their parameter contracts.
 *
 * Callers (CLI, HTTP bridge, wire header) hand in an operation name plus a
 * loose parameter map. `resolveOperation` turns that into a tagged
 * `ConversionOperation`, so code past that point never sees an invalid
 * parameter combination.
 */

import { z } from 'zod';
import { InvalidParameterError, UnsupportedOperationError } from './errors.js';

export const OPERATION_NAMES = ['pdf_to_png', 'png_to_jpg', 'jpg_to_png', 'to_grayscale', 'resize'] as const;

export type OperationName = (typeof OPERATION_NAMES)[number];

/** Primitive parameter values as they arrive from a CLI flag, query string or wire header. */
export type ParamValue = string | number | boolean;
export type RawParams = Record<string, ParamValue>;

export type ConversionOperation =
  | { kind: 'pdf_to_png' }
  | { kind: 'png_to_jpg' }
  | { kind: 'jpg_to_png' }
  | { kind: 'to_grayscale' }
  | { kind: 'resize'; width: number; height: number };

export type InputFormat = 'pdf' | 'png' | 'jpeg' | 'webp' | 'tiff';

/** Raster formats accepted by the format-preserving operations. */
export const RASTER_FORMATS: readonly InputFormat[] = ['png', 'jpeg', 'webp', 'tiff'];

export interface OperationContract {
  name: OperationName;
  description: string;
  params: Record<string, string>;
  accepts: readonly InputFormat[];
}

export const OPERATION_CONTRACTS: Record<OperationName, OperationContract> = {
  pdf_to_png: {
    name: 'pdf_to_png',
    description: 'Render every PDF page to a PNG, in page order',
    params: {},
    accepts: ['pdf'],
  },
  png_to_jpg: {
    name: 'png_to_jpg',
    description: 'Convert a PNG image to JPEG',
    params: {},
    accepts: ['png'],
  },
  jpg_to_png: {
    name: 'jpg_to_png',
    description: 'Convert a JPEG image to PNG',
    params: {},
    accepts: ['jpeg'],
  },
  to_grayscale: {
    name: 'to_grayscale',
    description: 'Convert an image to grayscale, keeping its format',
    params: {},
    accepts: RASTER_FORMATS,
  },
  resize: {
    name: 'resize',
    description: 'Resize an image to exact pixel dimensions, keeping its format',
    params: {
      width: 'Target width in pixels (integer, 1-16383)',
      height: 'Target height in pixels (integer, 1-16383)',
    },
    accepts: RASTER_FORMATS,
  },
};

/** Largest width or height `resize` accepts, in pixels. */
export const MAX_DIMENSION = 0x3fff;

export function isOperationName(value: unknown): value is OperationName {
  return typeof value === 'string' && (OPERATION_NAMES as readonly string[]).includes(value);
}

// Query strings and CLI flags carry numbers as text.
const dimension = z.preprocess(
  (value) => (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value) ? Number(value) : value),
  z
    .number({ invalid_type_error: 'must be an integer' })
    .int('must be an integer')
    .positive('must be greater than 0')
    .max(MAX_DIMENSION, `must be at most ${MAX_DIMENSION}`),
);

const noParams = z.object({}).strict();

const paramSchemas = {
  pdf_to_png: noParams,
  png_to_jpg: noParams,
  jpg_to_png: noParams,
  to_grayscale: noParams,
  resize: z.object({ width: dimension, height: dimension }).strict(),
} satisfies Record<OperationName, z.ZodTypeAny>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      if (issue.code === 'unrecognized_keys') {
        return `unexpected parameter(s): ${issue.keys.join(', ')}`;
      }
      const path = issue.path.join('.');
      if (issue.code === 'invalid_type' && issue.received === 'undefined') {
        return `missing parameter: ${path}`;
      }
      return path ? `${path} ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Validate an operation name and its parameters.
 *
 * @throws UnsupportedOperationError for a name outside {@link OPERATION_NAMES}
 * @throws InvalidParameterError for missing, malformed or undeclared parameters
 */
export function resolveOperation(name: string, params: RawParams = {}): ConversionOperation {
  if (!isOperationName(name)) {
    throw new UnsupportedOperationError(
      `Unsupported operation "${name}" (expected one of: ${OPERATION_NAMES.join(', ')})`,
    );
  }

  if (name === 'resize') {
    const parsed = paramSchemas.resize.safeParse(params);
    if (!parsed.success) {
      throw new InvalidParameterError(`Invalid parameters for resize: ${describeIssues(parsed.error)}`);
    }
    return { kind: 'resize', width: parsed.data.width, height: parsed.data.height };
  }

  const parsed = paramSchemas[name].safeParse(params);
  if (!parsed.success) {
    throw new InvalidParameterError(`Invalid parameters for ${name}: ${describeIssues(parsed.error)}`);
  }
  return { kind: name };
}

/**
 * Inverse of {@link resolveOperation}: the parameter map sent on the wire.
 */
export function operationParams(operation: ConversionOperation): RawParams {
  switch (operation.kind) {
    case 'resize':
      return { width: operation.width, height: operation.height };
    default:
      return {};
  }
}
