import sharp, { Sharp } from 'sharp';

import { Photograph, createPhotograph } from './types';

export const rawInput = (photo: Photograph) => ({
  raw: { width: photo.width, height: photo.height, channels: 4 as const },
});

export const pipelineFor = (photo: Photograph): Sharp => sharp(photo.data, rawInput(photo));

/** Materializes any sharp pipeline as an RGBA Photograph. */
export async function toPhotograph(pipeline: Sharp): Promise<Photograph> {
  const { data, info } = await pipeline.ensureAlpha().raw().toBuffer({ resolveWithObject: true });
  return createPhotograph(info.width, info.height, data);
}

export const decodePhotograph = (encoded: Buffer) => toPhotograph(sharp(encoded));

export type EncodedFormat = 'webp' | 'jpeg' | 'png';

export const MIME_TYPES: Record<EncodedFormat, string> = {
  webp: 'image/webp',
  jpeg: 'image/jpeg',
  png: 'image/png',
};

export function encodePhotograph(photo: Photograph, format: EncodedFormat, quality = 90) {
  const pipeline = pipelineFor(photo);
  switch (format) {
    case 'webp':
      return pipeline.webp({ quality }).toBuffer();
    case 'jpeg':
      return pipeline.jpeg({ quality }).toBuffer();
    case 'png':
      return pipeline.png().toBuffer();
  }
}
