/**
 * Binary PGM (P5, maxval 255) codec for single-channel masks.
 */

import { CropExportError } from '@/lib/errors';
import type { RenderedMask } from '@/types/export';

export function encodePgm(mask: RenderedMask): Uint8Array {
  const header = new TextEncoder().encode(`P5\n${mask.pixelWidth} ${mask.pixelHeight}\n255\n`);
  const out = new Uint8Array(header.length + mask.bytes.length);
  out.set(header, 0);
  out.set(mask.bytes, header.length);
  return out;
}

const WHITESPACE = new Set([0x20, 0x09, 0x0a, 0x0d]);

export function decodePgm(data: Uint8Array): RenderedMask {
  const fields: string[] = [];
  let position = 0;
  while (fields.length < 4 && position < data.length) {
    while (position < data.length && WHITESPACE.has(data[position] ?? 0)) position++;
    let token = '';
    while (position < data.length && !WHITESPACE.has(data[position] ?? 0)) {
      token += String.fromCharCode(data[position] ?? 0);
      position++;
    }
    if (token) fields.push(token);
  }
  // single whitespace byte separates the header from the raster
  position++;

  const [magic, widthField, heightField, maxField] = fields;
  const width = Number(widthField);
  const height = Number(heightField);
  if (magic !== 'P5' || maxField !== '255' || !Number.isInteger(width) || !Number.isInteger(height)) {
    throw new CropExportError('invalid-input', 'Not an 8-bit binary PGM image');
  }
  const bytes = data.slice(position, position + width * height);
  if (bytes.length !== width * height) {
    throw new CropExportError('invalid-input', `PGM raster is shorter than ${width}x${height}`);
  }
  return { pixelWidth: width, pixelHeight: height, bytes };
}
