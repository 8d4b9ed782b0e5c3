import { describe, expect, it } from 'vitest';
import { isCropExportError } from '@/lib/errors';
import type { RenderedMask } from '@/types/export';
import { decodeCocoCounts, decodeCocoRle, encodeMaskRle } from './coco-rle';

describe('decodeCocoRle', () => {
  it('decodes column-major integer counts into a row-major bitmap', () => {
    const mask = decodeCocoRle({ size: [2, 3], counts: [1, 2, 3] });
    expect(mask.pixelWidth).toBe(3);
    expect(mask.pixelHeight).toBe(2);
    expect(Array.from(mask.bytes)).toEqual([0, 255, 0, 255, 0, 0]);
  });

  it('decodes row-major start/length pairs', () => {
    const mask = decodeCocoRle({ size: [2, 3], counts: '0 2 4 1' });
    expect(Array.from(mask.bytes)).toEqual([255, 255, 0, 0, 255, 0]);
  });

  it('decodes the compact counts string', () => {
    const mask = decodeCocoRle({ size: [2, 3], counts: '123' });
    expect(Array.from(mask.bytes)).toEqual([0, 255, 0, 255, 0, 0]);
  });

  it('rejects runs that do not cover the frame', () => {
    let caught: unknown;
    try {
      decodeCocoRle({ size: [2, 3], counts: [1, 2] });
    } catch (error) {
      caught = error;
    }
    expect(isCropExportError(caught, 'invalid-input')).toBe(true);
  });

  it('rejects pairs past the end of the frame', () => {
    expect(() => decodeCocoRle({ size: [2, 2], counts: '3 2' })).toThrow('exceeds 4 pixels');
  });
});

describe('decodeCocoCounts', () => {
  it('applies delta coding from the third count on', () => {
    expect(decodeCocoCounts('324')).toEqual([3, 2, 4]);
    expect(decodeCocoCounts('1233')).toEqual([1, 2, 3, 5]);
  });

  it('sign-extends negative deltas', () => {
    expect(decodeCocoCounts('444M')).toEqual([4, 4, 4, 1]);
  });

  it('rejects characters outside the alphabet', () => {
    expect(() => decodeCocoCounts('12~')).toThrow('Invalid COCO counts character at 2');
  });
});

describe('encodeMaskRle', () => {
  it('encodes column-major runs starting with background', () => {
    const mask: RenderedMask = {
      pixelWidth: 3,
      pixelHeight: 2,
      bytes: Uint8Array.from([0, 255, 0, 255, 0, 0]),
    };
    expect(encodeMaskRle(mask)).toEqual({ size: [2, 3], counts: [1, 2, 3] });
  });

  it('emits an empty leading background run for foreground starts', () => {
    const mask: RenderedMask = { pixelWidth: 2, pixelHeight: 2, bytes: new Uint8Array(4).fill(200) };
    expect(encodeMaskRle(mask).counts).toEqual([0, 4]);
  });

  it('decodes back to the thresholded mask', () => {
    const mask: RenderedMask = {
      pixelWidth: 4,
      pixelHeight: 3,
      bytes: Uint8Array.from([0, 255, 255, 0, 255, 255, 0, 0, 0, 0, 255, 255]),
    };
    expect(Array.from(decodeCocoRle(encodeMaskRle(mask)).bytes)).toEqual(Array.from(mask.bytes));
  });
});
