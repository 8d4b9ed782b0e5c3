import { describe, expect, it } from 'vitest';
import { CropExportError } from '@/lib/errors';
import { evenFloor, evenSourceSize, toPixelRect } from './dimensions';

function errorType(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof CropExportError ? error.type : 'unexpected';
  }
  return undefined;
}

describe('evenFloor', () => {
  it('truncates to even integers', () => {
    expect(evenFloor(1365)).toBe(1364);
    expect(evenFloor(1364)).toBe(1364);
    expect(evenFloor(3.9)).toBe(2);
  });

  it('absorbs floating point error just below an integer', () => {
    expect(evenFloor(191.99999999999997)).toBe(192);
  });
});

describe('evenSourceSize', () => {
  it('trims odd dimensions by one pixel', () => {
    expect(evenSourceSize(1365, 767)).toEqual({ width: 1364, height: 766 });
    expect(evenSourceSize(1920, 1080)).toEqual({ width: 1920, height: 1080 });
  });

  it('fails when nothing encodable remains', () => {
    expect(errorType(() => evenSourceSize(1, 720))).toBe('odd-dimension');
    expect(errorType(() => evenSourceSize(0, 720))).toBe('invalid-input');
    expect(errorType(() => evenSourceSize(Number.NaN, 720))).toBe('invalid-input');
  });
});

describe('toPixelRect', () => {
  it('denormalizes to even sizes', () => {
    expect(toPixelRect({ x: 0.1, y: 0.1, width: 0.5, height: 0.5 }, 1920, 1080)).toEqual({
      x: 192,
      y: 108,
      width: 960,
      height: 540,
    });
  });

  it('keeps the rect inside the frame', () => {
    expect(toPixelRect({ x: 0.9, y: 0.9, width: 0.5, height: 0.5 }, 100, 100)).toEqual({
      x: 90,
      y: 90,
      width: 10,
      height: 10,
    });
  });

  it('never shrinks below two pixels', () => {
    expect(toPixelRect({ x: 0.999, y: 0, width: 0.001, height: 0.001 }, 100, 100)).toEqual({
      x: 98,
      y: 0,
      width: 2,
      height: 2,
    });
  });
});
