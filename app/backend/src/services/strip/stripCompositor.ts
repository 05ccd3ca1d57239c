import { mkdir } from 'fs/promises';
import path from 'path';
import sharp, { OverlayOptions } from 'sharp';

import { InvalidPhotoCountError } from '../../errors';
import { pipelineFor, rawInput } from '../../imaging';
import { logger } from '../../logger';
import { CompositeStrip, Photograph, createPhotograph } from '../../types';

interface StripSlot {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface StripLayout {
  size: { width: number; height: number };
  background: string;
  slots: StripSlot[];
  /** The finished canvas is shrunk by this integer factor. */
  downscale: number;
}

const SLOT_WIDTH = 2000;
const SLOT_HEIGHT = 1333;
const SLOT_MARGIN = 134;
const SLOT_PITCH = 1466;

export const STRIP_LAYOUT: StripLayout = {
  size: { width: 2268, height: 6465 },
  background: '#ffffff',
  slots: [0, 1, 2, 3].map((i) => ({
    x: SLOT_MARGIN,
    y: SLOT_MARGIN + i * SLOT_PITCH,
    width: SLOT_WIDTH,
    height: SLOT_HEIGHT,
  })),
  downscale: 3,
};

export const STRIP_PHOTO_COUNT = STRIP_LAYOUT.slots.length;

interface StripCompositorOptions {
  layout?: StripLayout;
  templatePath?: string;
  outputDir?: string;
}

export class StripCompositor {
  private readonly layout: StripLayout;
  private template?: Promise<Buffer | undefined>;

  constructor(private readonly options: StripCompositorOptions = {}) {
    this.layout = options.layout ?? STRIP_LAYOUT;
  }

  get photoCount() {
    return this.layout.slots.length;
  }

  /**
   * Places every photograph in its slot and shrinks the result. The same
   * photographs always give the same pixels.
   */
  async compose(photos: readonly Photograph[]): Promise<CompositeStrip> {
    const { layout } = this;
    if (photos.length !== layout.slots.length) {
      throw new InvalidPhotoCountError(layout.slots.length, photos.length);
    }

    const composites: OverlayOptions[] = await Promise.all(
      layout.slots.map(async (slot, i) => {
        const resized = await pipelineFor(photos[i])
          .resize(slot.width, slot.height, { fit: 'fill', kernel: 'lanczos3' })
          .ensureAlpha()
          .raw()
          .toBuffer();
        return {
          input: resized,
          raw: { width: slot.width, height: slot.height, channels: 4 as const },
          left: slot.x,
          top: slot.y,
        };
      })
    );

    const base = await this.buildBase();
    const canvas = await base.composite(composites).ensureAlpha().raw().toBuffer();

    const width = Math.floor(layout.size.width / layout.downscale);
    const height = Math.floor(layout.size.height / layout.downscale);
    const data = await sharp(canvas, {
      raw: { width: layout.size.width, height: layout.size.height, channels: 4 },
    })
      .resize(width, height, { fit: 'fill', kernel: 'lanczos3' })
      .ensureAlpha()
      .raw()
      .toBuffer();

    logger.info(`[Strip] Composed ${photos.length} photographs into ${width}x${height}`);
    return Object.freeze({ ...createPhotograph(width, height, data), kind: 'strip' as const });
  }

  /** Keeps a JPEG of the strip for the operator. */
  async archive(strip: CompositeStrip, name: string): Promise<string | undefined> {
    if (!this.options.outputDir) return undefined;
    await mkdir(this.options.outputDir, { recursive: true });
    const outputPath = path.join(this.options.outputDir, `${name}.jpg`);
    await sharp(strip.data, rawInput(strip)).jpeg({ quality: 95 }).toFile(outputPath);
    logger.info(`[Strip] Archived strip -> ${outputPath}`);
    return outputPath;
  }

  private async buildBase() {
    const { size, background } = this.layout;
    const template = await this.loadTemplate();
    if (template) {
      return sharp(template);
    }
    return sharp({
      create: { width: size.width, height: size.height, channels: 4, background },
    });
  }

  private loadTemplate(): Promise<Buffer | undefined> {
    const templatePath = this.options.templatePath;
    if (!templatePath) return Promise.resolve(undefined);
    const { size } = this.layout;
    this.template ??= sharp(templatePath)
      .resize(size.width, size.height, { fit: 'fill' })
      .ensureAlpha()
      .png()
      .toBuffer()
      .catch((error: Error) => {
        logger.warn(`[Strip] Template ${templatePath} unusable, using plain canvas: ${error.message}`);
        return undefined;
      });
    return this.template;
  }
}
