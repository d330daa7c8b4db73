// src/core/bitmap/encodeBitmap.ts

import type { IEncodedBitmap, IMaskOptions, IRasterImage } from '../../@types';
import { BITMAP_INFO_HEADER_SIZE, BITS_PER_PIXEL, config } from '../../config';
import { EncodeError } from '../errors';

const BYTES_PER_PIXEL = BITS_PER_PIXEL / 8;
const MASK_VISIBLE = 0x00;
const MASK_TRANSPARENT = 0xff;

/**
 * Writes the 40-byte BITMAPINFOHEADER of an icon DIB. The declared height is doubled:
 * icon readers expect a mask of the same size to follow the colour data.
 *
 * @param width - Pixel width.
 * @param height - Pixel height of the colour data (not doubled).
 */
export function writeBitmapInfoHeader(width: number, height: number): Buffer {
    const header = Buffer.alloc(BITMAP_INFO_HEADER_SIZE);
    header.writeUInt32LE(BITMAP_INFO_HEADER_SIZE, 0);
    header.writeInt32LE(width, 4);
    header.writeInt32LE(height * 2, 8);
    header.writeUInt16LE(1, 12); // planes
    header.writeUInt16LE(BITS_PER_PIXEL, 14);
    header.writeUInt32LE(0, 16); // BI_RGB
    header.writeUInt32LE(width * height * BYTES_PER_PIXEL, 20);
    // pixels per metre, colours used and important colours stay 0
    return header;
}

/**
 * Encodes an image as a 32-bpp DIB plus its mask.
 *
 * Pixels are written bottom row first, each as B, G, R, A taken from the high byte of
 * the 16-bit channel. The mask holds one byte per pixel in the same row order. Under the
 * `constant` policy every mask byte is 0x00 whatever the alpha; `alpha-threshold`
 * sets 0xFF where the 8-bit alpha is below `alphaThreshold`.
 *
 * @param image - Image whose own bounds give the encoded width and height.
 * @param maskOptions - Defaults to `config.mask`.
 */
export function encodeBitmapWithMask(image: IRasterImage, maskOptions: IMaskOptions = config.mask): IEncodedBitmap {
    const { width, height } = image;
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
        throw new EncodeError(`Cannot encode a ${width}x${height} bitmap`);
    }

    const bitmap = Buffer.alloc(BITMAP_INFO_HEADER_SIZE + width * height * BYTES_PER_PIXEL);
    writeBitmapInfoHeader(width, height).copy(bitmap, 0);

    let offset = BITMAP_INFO_HEADER_SIZE;
    for (let y = height - 1; y >= 0; y--) {
        for (let x = 0; x < width; x++) {
            const { r, g, b, a } = image.pixelAt(x, y);
            bitmap[offset++] = b >> 8;
            bitmap[offset++] = g >> 8;
            bitmap[offset++] = r >> 8;
            bitmap[offset++] = a >> 8;
        }
    }

    return { bitmap, mask: encodeMask(image, maskOptions) };
}

/**
 * Builds the mask blob for an image under the given policy. Rows are stored bottom
 * row first so that mask row k describes the same image row as colour row k.
 */
export function encodeMask(image: IRasterImage, { policy, alphaThreshold }: IMaskOptions): Buffer {
    const mask = Buffer.alloc(image.width * image.height, MASK_VISIBLE);
    if (policy === 'constant') {
        return mask;
    }

    let offset = 0;
    for (let y = image.height - 1; y >= 0; y--) {
        for (let x = 0; x < image.width; x++) {
            if (image.pixelAt(x, y).a >> 8 < alphaThreshold) {
                mask[offset] = MASK_TRANSPARENT;
            }
            offset++;
        }
    }
    return mask;
}
