// Image decoding and downsampling for the preview pane
// Supports PNG, JPEG and GIF (first frame)

import * as fsp from 'fs/promises';
import { decode as decodePng } from 'fast-png';
import jpeg from 'jpeg-js';
import omggif from 'omggif';

import { NavigatorError } from '../errors.js';
import type { ImageFormat, PreviewPayload } from '../types.js';

/**
 * Decoded image, always RGBA
 */
export interface RasterImage {
  width: number;
  height: number;
  pixels: Uint8ClampedArray;
}

export interface ImagePreviewOptions {
  maxBytes: number;
  maxWidth: number;
  maxHeight: number;
}

type DecodedPng = ReturnType<typeof decodePng>;

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set(['.png', '.jpg', '.jpeg', '.gif']);

/**
 * Detect image format from magic bytes
 */
export function detectImageFormat(bytes: Uint8Array): ImageFormat | null {
  // PNG magic: 0x89 0x50 0x4E 0x47
  if (bytes[0] === 0x89 && bytes[1] === 0x50 && bytes[2] === 0x4e && bytes[3] === 0x47) {
    return 'png';
  }
  // JPEG magic: 0xFF 0xD8 0xFF
  if (bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
    return 'jpeg';
  }
  // GIF magic: GIF87a or GIF89a
  if (
    bytes[0] === 0x47 && bytes[1] === 0x49 && bytes[2] === 0x46 &&
    bytes[3] === 0x38 && (bytes[4] === 0x37 || bytes[4] === 0x39) && bytes[5] === 0x61
  ) {
    return 'gif';
  }
  return null;
}

/**
 * Raw sample reader for decoded PNG data
 *
 * Depths below 8 stay packed by fast-png: several samples per byte, each row
 * padded to a whole byte. 16-bit samples keep their high byte.
 */
function pngSampleReader(decoded: DecodedPng): (pixel: number, channel: number) => number {
  const { width, depth, channels, data } = decoded;

  if (depth >= 8) {
    const shift = depth === 16 ? 8 : 0;
    return (pixel, channel) => data[pixel * channels + channel] >> shift;
  }

  const stride = Math.ceil((width * depth) / 8);
  const mask = (1 << depth) - 1;
  return (pixel) => {
    const bit = (pixel % width) * depth;
    const byte = data[Math.floor(pixel / width) * stride + (bit >> 3)];
    return (byte >> (8 - depth - (bit & 7))) & mask;
  };
}

function decodePngImage(bytes: Uint8Array): RasterImage {
  const decoded = decodePng(bytes);
  const { width, height, channels, depth, palette } = decoded;
  const pixelCount = width * height;
  const out = new Uint8ClampedArray(pixelCount * 4);
  const sample = pngSampleReader(decoded);
  // Low-depth grayscale spans 0..2^depth-1
  const grayScale = depth < 8 ? 255 / ((1 << depth) - 1) : 1;

  for (let p = 0; p < pixelCount; p++) {
    const o = p * 4;
    if (palette && channels === 1) {
      const color = palette[sample(p, 0)] ?? [0, 0, 0];
      out[o] = color[0];
      out[o + 1] = color[1];
      out[o + 2] = color[2];
      out[o + 3] = color.length > 3 ? color[3] : 255;
    } else if (channels === 1 || channels === 2) {
      const gray = sample(p, 0) * grayScale;
      out[o] = gray;
      out[o + 1] = gray;
      out[o + 2] = gray;
      out[o + 3] = channels === 2 ? sample(p, 1) : 255;
    } else {
      out[o] = sample(p, 0);
      out[o + 1] = sample(p, 1);
      out[o + 2] = sample(p, 2);
      out[o + 3] = channels === 4 ? sample(p, 3) : 255;
    }
  }

  return { width, height, pixels: out };
}

function decodeJpegImage(bytes: Uint8Array): RasterImage {
  const decoded = jpeg.decode(bytes, { useTArray: true, formatAsRGBA: true });
  return {
    width: decoded.width,
    height: decoded.height,
    pixels: new Uint8ClampedArray(decoded.data)
  };
}

function decodeGifImage(bytes: Uint8Array): RasterImage {
  const reader = new omggif.GifReader(bytes);
  const rgba = new Uint8Array(reader.width * reader.height * 4);
  reader.decodeAndBlitFrameRGBA(0, rgba);
  return { width: reader.width, height: reader.height, pixels: new Uint8ClampedArray(rgba.buffer) };
}

/**
 * Decode image bytes by magic number
 *
 * @throws NavigatorError with code DecodeFailure
 */
export function decodeImage(bytes: Uint8Array, sourcePath?: string): { format: ImageFormat; image: RasterImage } {
  const format = detectImageFormat(bytes);
  if (format === null) {
    throw new NavigatorError('DecodeFailure', 'Unsupported image format', { path: sourcePath });
  }

  try {
    switch (format) {
      case 'png':
        return { format, image: decodePngImage(bytes) };
      case 'jpeg':
        return { format, image: decodeJpegImage(bytes) };
      case 'gif':
        return { format, image: decodeGifImage(bytes) };
    }
  } catch (error) {
    throw new NavigatorError('DecodeFailure', `Invalid ${format} data`, { path: sourcePath, cause: error });
  }
}

/**
 * Box-filter the image down to fit within maxWidth x maxHeight
 *
 * Aspect ratio is kept and images are never enlarged.
 */
export function fitImage(image: RasterImage, maxWidth: number, maxHeight: number): RasterImage {
  const scale = Math.min(1, maxWidth / image.width, maxHeight / image.height);
  const width = Math.max(1, Math.round(image.width * scale));
  const height = Math.max(1, Math.round(image.height * scale));
  if (width === image.width && height === image.height) {
    return image;
  }

  const pixels = new Uint8ClampedArray(width * height * 4);
  for (let y = 0; y < height; y++) {
    const y0 = Math.floor((y * image.height) / height);
    const y1 = Math.max(y0 + 1, Math.floor(((y + 1) * image.height) / height));
    for (let x = 0; x < width; x++) {
      const x0 = Math.floor((x * image.width) / width);
      const x1 = Math.max(x0 + 1, Math.floor(((x + 1) * image.width) / width));
      let r = 0, g = 0, b = 0, a = 0, n = 0;
      for (let sy = y0; sy < y1; sy++) {
        for (let sx = x0; sx < x1; sx++) {
          const i = (sy * image.width + sx) * 4;
          r += image.pixels[i];
          g += image.pixels[i + 1];
          b += image.pixels[i + 2];
          a += image.pixels[i + 3];
          n++;
        }
      }
      const o = (y * width + x) * 4;
      pixels[o] = r / n;
      pixels[o + 1] = g / n;
      pixels[o + 2] = b / n;
      pixels[o + 3] = a / n;
    }
  }

  return { width, height, pixels };
}

/**
 * Load, decode and shrink an image file for preview
 */
export async function previewImage(filePath: string, options: ImagePreviewOptions): Promise<PreviewPayload> {
  const { size } = await fsp.stat(filePath);
  if (size > options.maxBytes) {
    return { kind: 'binary', size, note: 'Image too large to preview' };
  }

  const bytes = new Uint8Array(await fsp.readFile(filePath));
  const { format, image } = decodeImage(bytes, filePath);
  const fitted = fitImage(image, options.maxWidth, options.maxHeight);

  return {
    kind: 'image',
    format,
    width: fitted.width,
    height: fitted.height,
    sourceWidth: image.width,
    sourceHeight: image.height,
    pixels: fitted.pixels
  };
}
