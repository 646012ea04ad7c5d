import sharp from 'sharp';

import { ValidationError } from './generation/errors';

export type SourceImageFormat = 'png' | 'jpeg' | 'webp' | 'gif';

export interface NormalizedImage {
  /** Base64-encoded RGB PNG. */
  base64: string;
  width: number;
  height: number;
  sourceFormat: SourceImageFormat;
}

const hasPrefix = (buffer: Buffer, bytes: number[]) =>
  buffer.length >= bytes.length && bytes.every((value, index) => buffer[index] === value);

export const detectSourceImageFormat = (buffer: Buffer): SourceImageFormat | null => {
  if (hasPrefix(buffer, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) {
    return 'png';
  }

  if (hasPrefix(buffer, [0xff, 0xd8, 0xff])) {
    return 'jpeg';
  }

  if (buffer.length >= 12 && buffer.toString('ascii', 0, 4) === 'RIFF' && buffer.toString('ascii', 8, 12) === 'WEBP') {
    return 'webp';
  }

  const gifHeader = buffer.toString('ascii', 0, 6);
  if (gifHeader === 'GIF87a' || gifHeader === 'GIF89a') {
    return 'gif';
  }

  return null;
};

/** Largest dimensions with the same aspect ratio whose area stays within `maxPixels`. */
export const fitWithinPixelBudget = (width: number, height: number, maxPixels: number) => {
  if (width * height <= maxPixels) {
    return { width, height };
  }

  const scale = Math.sqrt(maxPixels / (width * height));
  return {
    width: Math.max(1, Math.floor(width * scale)),
    height: Math.max(1, Math.floor(height * scale)),
  };
};

export class ImageNormalizer {
  constructor(private readonly maxPixels: number) {}

  async normalize(bytes: Buffer): Promise<NormalizedImage> {
    const sourceFormat = detectSourceImageFormat(bytes);
    if (!sourceFormat) {
      throw new ValidationError('Unsupported image format. Upload a PNG, JPEG, WebP or GIF file.', {
        image: ['Unsupported format'],
      });
    }

    let metadata: sharp.Metadata;
    try {
      metadata = await sharp(bytes).metadata();
    } catch (error) {
      const details = error instanceof Error ? error.message : String(error);
      throw new ValidationError(`Image could not be decoded: ${details}`, { image: ['Unreadable image'] });
    }

    const rotated = (metadata.orientation ?? 1) >= 5;
    const sourceWidth = (rotated ? metadata.height : metadata.width) ?? 0;
    const sourceHeight = (rotated ? metadata.width : metadata.height) ?? 0;
    if (sourceWidth <= 0 || sourceHeight <= 0) {
      throw new ValidationError('Image has no readable dimensions.', { image: ['Unreadable image'] });
    }

    const target = fitWithinPixelBudget(sourceWidth, sourceHeight, this.maxPixels);

    let output: { data: Buffer; info: sharp.OutputInfo };
    try {
      output = await sharp(bytes)
        .rotate()
        .resize(target.width, target.height, { fit: 'fill' })
        .removeAlpha()
        .toColourspace('srgb')
        .png()
        .toBuffer({ resolveWithObject: true });
    } catch (error) {
      const details = error instanceof Error ? error.message : String(error);
      throw new ValidationError(`Image could not be decoded: ${details}`, { image: ['Unreadable image'] });
    }

    const { data, info } = output;
    return {
      base64: data.toString('base64'),
      width: info.width,
      height: info.height,
      sourceFormat,
    };
  }
}
