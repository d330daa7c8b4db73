// src/core/imageProcessing/strategies/SharpImageProcessor.ts

import sharp from 'sharp';
import type { ImageProcessor, IRasterImage, ResizeKernel } from '../../../@types';
import { config } from '../../../config';
import { DecodeError, errorMessage } from '../../errors';
import { RgbaImage } from '../RgbaImage';

export class SharpImageProcessor implements ImageProcessor {
    constructor(private readonly kernel: ResizeKernel = config.resize.kernel) {}

    /**
     * Decodes an image file into straight-alpha RGBA in the sRGB colour space.
     * Images without an alpha channel get a fully opaque one.
     *
     * @param imagePath - Path of the PNG (or any format sharp reads).
     */
    public async loadImage(imagePath: string): Promise<RgbaImage> {
        try {
            const { data, info } = await sharp(imagePath)
                .ensureAlpha()
                .toColourspace('srgb')
                .raw()
                .toBuffer({ resolveWithObject: true });
            return RgbaImage.fromRgba8(info.width, info.height, data);
        } catch (error) {
            throw new DecodeError(`Failed to decode image: ${errorMessage(error)}`, { file: imagePath, cause: error });
        }
    }

    /**
     * Resamples an image to exactly `width` x `height`, ignoring aspect ratio.
     */
    public async resize(image: IRasterImage, width: number, height: number): Promise<RgbaImage> {
        const source = image instanceof RgbaImage ? image : copyToRgbaImage(image);
        const { data, info } = await sharp(source.toRgba8(), {
            raw: {
                width: source.width,
                height: source.height,
                channels: 4,
            },
        })
            .resize(width, height, { kernel: this.kernel, fit: 'fill' })
            .raw()
            .toBuffer({ resolveWithObject: true });
        return RgbaImage.fromRgba8(info.width, info.height, data);
    }
}

function copyToRgbaImage(image: IRasterImage): RgbaImage {
    const samples = new Uint16Array(image.width * image.height * 4);
    for (let y = 0; y < image.height; y++) {
        for (let x = 0; x < image.width; x++) {
            const { r, g, b, a } = image.pixelAt(x, y);
            samples.set([r, g, b, a], (y * image.width + x) * 4);
        }
    }
    return RgbaImage.fromRgba16(image.width, image.height, samples);
}
