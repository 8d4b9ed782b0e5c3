/**
 * Run-length mask codecs used by the object tracker.
 *
 * Three `counts` encodings are accepted:
 * - integer array: COCO RLE, column-major, alternating background/foreground
 *   runs starting with background
 * - compact string: COCO compressed counts (6-bit chars, zigzag, delta)
 * - whitespace-separated "start length" pairs: row-major foreground runs
 */

import { CropExportError } from '@/lib/errors';
import type { RenderedMask } from '@/types/export';

export interface CocoRle {
  /** [height, width] */
  size: [number, number];
  counts: number[] | string;
}

const OPAQUE = 255;

function assertSize(size: [number, number]): { width: number; height: number } {
  const [height, width] = size;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new CropExportError('invalid-input', `Invalid RLE size ${height}x${width}`);
  }
  return { width, height };
}

/**
 * Decode the compact COCO counts string into run lengths.
 */
export function decodeCocoCounts(encoded: string): number[] {
  const counts: number[] = [];
  let position = 0;
  while (position < encoded.length) {
    let value = 0;
    let shift = 0;
    let more = true;
    while (more) {
      if (position >= encoded.length) {
        throw new CropExportError('invalid-input', 'Truncated COCO counts string');
      }
      const c = encoded.charCodeAt(position) - 48;
      if (c < 0 || c > 63) {
        throw new CropExportError('invalid-input', `Invalid COCO counts character at ${position}`);
      }
      value |= (c & 0x1f) << (5 * shift);
      more = (c & 0x20) !== 0;
      position++;
      shift++;
      if (!more && (c & 0x10) !== 0) {
        // sign-extend
        value |= -1 << (5 * shift);
      }
    }
    const base = counts.length > 2 ? counts[counts.length - 2] ?? 0 : 0;
    counts.push(base + value);
  }
  return counts;
}

function decodeColumnMajorRuns(counts: number[], width: number, height: number): Uint8Array {
  const total = width * height;
  const bytes = new Uint8Array(total);
  let index = 0;
  let foreground = false;
  for (const count of counts) {
    if (!Number.isInteger(count) || count < 0) {
      throw new CropExportError('invalid-input', `Invalid RLE run length ${count}`);
    }
    if (index + count > total) {
      throw new CropExportError('invalid-input', `RLE runs exceed ${width}x${height} pixels`);
    }
    if (foreground) {
      for (let i = index; i < index + count; i++) {
        const column = Math.floor(i / height);
        const row = i % height;
        bytes[row * width + column] = OPAQUE;
      }
    }
    index += count;
    foreground = !foreground;
  }
  if (index !== total) {
    throw new CropExportError('invalid-input', `RLE runs cover ${index} of ${total} pixels`);
  }
  return bytes;
}

function decodeStartLengthPairs(encoded: string, width: number, height: number): Uint8Array {
  const values = encoded.trim().split(/\s+/).map(Number);
  if (values.length % 2 !== 0 || values.some((v) => !Number.isInteger(v) || v < 0)) {
    throw new CropExportError('invalid-input', 'Expected whitespace-separated "start length" pairs');
  }
  const total = width * height;
  const bytes = new Uint8Array(total);
  for (let i = 0; i < values.length; i += 2) {
    const start = values[i] ?? 0;
    const length = values[i + 1] ?? 0;
    if (start + length > total) {
      throw new CropExportError('invalid-input', `RLE run ${start}+${length} exceeds ${total} pixels`);
    }
    bytes.fill(OPAQUE, start, start + length);
  }
  return bytes;
}

export function decodeCocoRle(rle: CocoRle): RenderedMask {
  const { width, height } = assertSize(rle.size);
  let bytes: Uint8Array;
  if (Array.isArray(rle.counts)) {
    bytes = decodeColumnMajorRuns(rle.counts, width, height);
  } else if (/\s/.test(rle.counts.trim())) {
    bytes = decodeStartLengthPairs(rle.counts, width, height);
  } else {
    bytes = decodeColumnMajorRuns(decodeCocoCounts(rle.counts), width, height);
  }
  return { pixelWidth: width, pixelHeight: height, bytes };
}

/**
 * Encode a mask as COCO RLE with integer counts. Values above 127 count
 * as foreground; the first run is always background (possibly empty).
 */
export function encodeMaskRle(mask: RenderedMask): CocoRle {
  const { pixelWidth: width, pixelHeight: height, bytes } = mask;
  const counts: number[] = [];
  let foreground = false;
  let run = 0;
  for (let column = 0; column < width; column++) {
    for (let row = 0; row < height; row++) {
      const value = (bytes[row * width + column] ?? 0) > 127;
      if (value !== foreground) {
        counts.push(run);
        foreground = value;
        run = 0;
      }
      run++;
    }
  }
  counts.push(run);
  return { size: [height, width], counts };
}
