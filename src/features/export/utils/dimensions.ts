import { CropExportError } from '@/lib/errors';
import type { NormalizedRect } from '@/types/crop';
import type { PixelRect } from '@/types/export';

/** Guards against 0.1 * 1920 landing a hair below 192 */
const EPSILON = 1e-9;

/** Round down to the nearest even integer */
export function evenFloor(value: number): number {
  const whole = Math.floor(value + EPSILON);
  return whole - (whole % 2);
}

/**
 * Source frame size with odd dimensions truncated by one pixel.
 * Throws `odd-dimension` when nothing encodable is left.
 */
export function evenSourceSize(width: number, height: number): { width: number; height: number } {
  if (!Number.isFinite(width) || !Number.isFinite(height) || width <= 0 || height <= 0) {
    throw new CropExportError('invalid-input', `Invalid source size ${width}x${height}`);
  }
  const even = { width: evenFloor(width), height: evenFloor(height) };
  if (even.width < 2 || even.height < 2) {
    throw new CropExportError(
      'odd-dimension',
      `Source ${width}x${height} cannot be reduced to even dimensions`,
      { actual: { width, height } }
    );
  }
  return even;
}

/**
 * Denormalize a rect to even-sized pixels that stay inside the frame.
 * Offsets are floored; width and height are floored then made even.
 */
export function toPixelRect(rect: NormalizedRect, frameWidth: number, frameHeight: number): PixelRect {
  const axis = (offset: number, size: number, frame: number): [number, number] => {
    let start = Math.min(Math.max(0, Math.floor(offset * frame + EPSILON)), frame - 2);
    let length = Math.max(2, evenFloor(size * frame));
    if (start + length > frame) {
      length = evenFloor(frame - start);
      if (length < 2) {
        length = 2;
        start = frame - 2;
      }
    }
    return [start, length];
  };

  const [x, width] = axis(rect.x, rect.width, frameWidth);
  const [y, height] = axis(rect.y, rect.height, frameHeight);
  return { x, y, width, height };
}
