import { describe, it, expect } from 'vitest';
import {
  OPERATION_CONTRACTS,
  OPERATION_NAMES,
  isOperationName,
  operationParams,
  resolveOperation,
} from '../operations.js';
import { InvalidParameterError, UnsupportedOperationError } from '../errors.js';

describe('resolveOperation', () => {
  it('resolves parameterless operations', () => {
    expect(resolveOperation('pdf_to_png')).toEqual({ kind: 'pdf_to_png' });
    expect(resolveOperation('png_to_jpg', {})).toEqual({ kind: 'png_to_jpg' });
    expect(resolveOperation('to_grayscale')).toEqual({ kind: 'to_grayscale' });
  });

  it('resolves resize with numeric or numeric-string dimensions', () => {
    expect(resolveOperation('resize', { width: 800, height: 600 })).toEqual({
      kind: 'resize',
      width: 800,
      height: 600,
    });
    expect(resolveOperation('resize', { width: '64', height: ' 32 ' })).toEqual({
      kind: 'resize',
      width: 64,
      height: 32,
    });
  });

  it('rejects an unknown operation', () => {
    expect(() => resolveOperation('sharpen')).toThrow(UnsupportedOperationError);
    expect(() => resolveOperation('img_resize')).toThrow('Unsupported operation "img_resize"');
  });

  it('rejects width=0', () => {
    expect(() => resolveOperation('resize', { width: 0, height: 10 })).toThrow(InvalidParameterError);
    expect(() => resolveOperation('resize', { width: 0, height: 10 })).toThrow(
      'Invalid parameters for resize: width must be greater than 0',
    );
  });

  it('rejects a missing height', () => {
    expect(() => resolveOperation('resize', { width: 10 })).toThrow(
      'Invalid parameters for resize: missing parameter: height',
    );
  });

  it('rejects non-integer dimensions', () => {
    expect(() => resolveOperation('resize', { width: 1.5, height: 10 })).toThrow(
      'Invalid parameters for resize: width must be an integer',
    );
    expect(() => resolveOperation('resize', { width: 'wide', height: 10 })).toThrow(
      'Invalid parameters for resize: width must be an integer',
    );
    expect(() => resolveOperation('resize', { width: true, height: 10 })).toThrow(InvalidParameterError);
  });

  it('rejects dimensions above the supported maximum', () => {
    expect(resolveOperation('resize', { width: 16383, height: 1 })).toEqual({ kind: 'resize', width: 16383, height: 1 });
    expect(() => resolveOperation('resize', { width: 16384, height: 1 })).toThrow(
      'Invalid parameters for resize: width must be at most 16383',
    );
    expect(() => resolveOperation('resize', { width: 5, height: 1e20 })).toThrow(
      'Invalid parameters for resize: height must be at most 16383',
    );
  });

  it('rejects parameters the operation does not declare', () => {
    expect(() => resolveOperation('png_to_jpg', { quality: 80 })).toThrow(
      'Invalid parameters for png_to_jpg: unexpected parameter(s): quality',
    );
  });
});

describe('operation contracts', () => {
  it('declares a contract for every operation', () => {
    for (const name of OPERATION_NAMES) {
      expect(OPERATION_CONTRACTS[name].name).toBe(name);
      expect(OPERATION_CONTRACTS[name].accepts.length).toBeGreaterThan(0);
    }
    expect(Object.keys(OPERATION_CONTRACTS.resize.params)).toEqual(['width', 'height']);
  });

  it('narrows operation names', () => {
    expect(isOperationName('jpg_to_png')).toBe(true);
    expect(isOperationName('jpg2png')).toBe(false);
    expect(isOperationName(42)).toBe(false);
  });

  it('maps a resolved operation back to wire params', () => {
    expect(operationParams({ kind: 'resize', width: 5, height: 7 })).toEqual({ width: 5, height: 7 });
    expect(operationParams({ kind: 'jpg_to_png' })).toEqual({});
  });
});
