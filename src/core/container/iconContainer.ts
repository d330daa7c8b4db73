// src/core/container/iconContainer.ts

import type { IEncodedBitmap, ILogger, ImageProcessor, IMaskOptions, IRasterImage } from '../../@types';
import { BITS_PER_PIXEL, config, ICON_DIR_ENTRY_SIZE, ICON_HEADER_SIZE, ICON_TYPE } from '../../config';
import { encodeBitmapWithMask } from '../bitmap/encodeBitmap';
import { EncodeError, errorMessage } from '../errors';
import { createVariants, getDefaultImageProcessor } from '../imageProcessing/processor';
import type { IEncodingOverrides } from './encodingOptions';
import { resolveEncodingOptions } from './encodingOptions';
import { MAX_ICON_SIZE } from './targetSizes';

const MAX_ENTRY_COUNT = 0xffff;

export interface IAssembleOptions extends IEncodingOverrides {
    processor?: ImageProcessor;
    logger?: ILogger;
}

/**
 * Maps a pixel dimension onto the single byte a directory entry stores.
 *
 * Domain: positive integers. Range: 1..255 for sizes below 256, and 0 for 256 and
 * above, which is how the format writes its maximum size.
 */
export function clampDimension(size: number): number {
    if (!Number.isInteger(size) || size <= 0) {
        throw new EncodeError(`Icon dimension ${size} must be a positive integer`);
    }
    return size < MAX_ICON_SIZE ? size : 0;
}

function writeIconDir(count: number): Buffer {
    const header = Buffer.alloc(ICON_HEADER_SIZE);
    header.writeUInt16LE(0, 0); // reserved
    header.writeUInt16LE(ICON_TYPE, 2);
    header.writeUInt16LE(count, 4);
    return header;
}

function writeIconDirEntry(image: IRasterImage, bytesInRes: number, imageOffset: number): Buffer {
    const entry = Buffer.alloc(ICON_DIR_ENTRY_SIZE);
    entry.writeUInt8(clampDimension(image.width), 0);
    entry.writeUInt8(clampDimension(image.height), 1);
    entry.writeUInt8(0, 2); // colour count
    entry.writeUInt8(0, 3); // reserved
    entry.writeUInt16LE(1, 4); // planes
    entry.writeUInt16LE(BITS_PER_PIXEL, 6);
    entry.writeUInt32LE(bytesInRes, 8);
    entry.writeUInt32LE(imageOffset, 12);
    return entry;
}

/**
 * Serialises already-resized variants into an icon container: header, one directory
 * entry per variant, then every variant's bitmap followed by its mask, in the order
 * given.
 *
 * @param variants - Images in directory order.
 * @param maskOptions - Mask policy applied to every variant.
 */
export function serializeIcon(variants: readonly IRasterImage[], maskOptions: IMaskOptions = config.mask): Buffer {
    if (variants.length === 0 || variants.length > MAX_ENTRY_COUNT) {
        throw new EncodeError(`An icon holds 1 to ${MAX_ENTRY_COUNT} images, got ${variants.length}`);
    }

    const directory: Buffer[] = [];
    const payload: Buffer[] = [];
    let offset = ICON_HEADER_SIZE + ICON_DIR_ENTRY_SIZE * variants.length;

    for (const variant of variants) {
        let encoded: IEncodedBitmap;
        try {
            encoded = encodeBitmapWithMask(variant, maskOptions);
        } catch (error) {
            if (error instanceof EncodeError) throw error;
            throw new EncodeError(
                `Failed to encode ${variant.width}x${variant.height} bitmap: ${errorMessage(error)}`,
                { cause: error },
            );
        }
        const bytesInRes = encoded.bitmap.length + encoded.mask.length;

        directory.push(writeIconDirEntry(variant, bytesInRes, offset));
        payload.push(encoded.bitmap, encoded.mask);
        offset += bytesInRes;
    }

    return Buffer.concat([writeIconDir(variants.length), ...directory, ...payload]);
}

/**
 * Builds a complete icon from one source image: one square variant per target size,
 * resized by the image processor, then serialised in ascending size order.
 *
 * @param source - Decoded source image.
 * @param options - Processor, sizes and mask policy; each falls back to `config`.
 */
export async function assembleIcon(source: IRasterImage, options: IAssembleOptions = {}): Promise<Buffer> {
    const { processor = getDefaultImageProcessor(), logger } = options;
    const { targetSizes: sizes, maskOptions } = resolveEncodingOptions(options);

    logger?.debug(`Resizing ${source.width}x${source.height} source to ${sizes.join(', ')}`);
    const variants = await createVariants(source, sizes, processor);

    const icon = serializeIcon(variants, maskOptions);
    logger?.debug(`Assembled icon with ${variants.length} images (${icon.length} bytes)`);
    return icon;
}
