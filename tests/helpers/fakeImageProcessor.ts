import type { ImageProcessor, IRasterImage } from '../../src/@types';
import { DecodeError } from '../../src/core/errors';
import { RgbaImage } from '../../src/core/imageProcessing/RgbaImage';

/**
 * In-memory stand-in for the sharp processor: images are looked up by path and
 * resized with nearest-neighbour sampling.
 */
export class FakeImageProcessor implements ImageProcessor {
    readonly resizeCalls: Array<[number, number]> = [];

    constructor(private readonly images: Record<string, IRasterImage> = {}) {}

    async loadImage(imagePath: string): Promise<IRasterImage> {
        const image = this.images[imagePath];
        if (!image) {
            throw new DecodeError(`No such test image: ${imagePath}`);
        }
        return image;
    }

    async resize(image: IRasterImage, width: number, height: number): Promise<IRasterImage> {
        this.resizeCalls.push([width, height]);
        const samples = new Uint16Array(width * height * 4);
        for (let y = 0; y < height; y++) {
            for (let x = 0; x < width; x++) {
                const { r, g, b, a } = image.pixelAt(
                    Math.floor((x * image.width) / width),
                    Math.floor((y * image.height) / height),
                );
                samples.set([r, g, b, a], (y * width + x) * 4);
            }
        }
        return RgbaImage.fromRgba16(width, height, samples);
    }
}
