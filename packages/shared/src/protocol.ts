/**
 * Conversion protocol - the request/response pair carried by one connection.
 *
 * Flow:
 *   CLI / HTTP bridge → ConversionClient → TLS socket → ConversionServer
 *   → ConversionDispatcher → capability provider → back the same way
 */

import type { ConversionError, ErrorKind } from './errors.js';
import type { RawParams } from './operations.js';

export const DEFAULT_PORT = 8443;

/** Fallback source name when a caller does not supply one. */
export const DEFAULT_FILE_NAME = 'input';

export interface ConversionRequest {
  /** Wire name of the operation; validated by the dispatcher. */
  operationName: string;
  params: RawParams;
  sourceBytes: Uint8Array;
  /** Base name of the source file, used to name the outputs. */
  fileName: string;
}

/** One converted file. */
export interface ConversionOutput {
  name: string;
  data: Uint8Array;
}

export interface ConversionFailure {
  kind: ErrorKind;
  message: string;
}

export type ConversionResponse =
  | { status: 'success'; outputs: ConversionOutput[] }
  | { status: 'failure'; error: ConversionFailure };

export function successResponse(outputs: ConversionOutput[]): ConversionResponse {
  return { status: 'success', outputs };
}

export function failureResponse(error: ConversionError): ConversionResponse {
  return { status: 'failure', error: { kind: error.kind, message: error.message } };
}
