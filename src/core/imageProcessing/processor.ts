// src/core/imageProcessing/processor.ts

import type { ImageProcessor, IRasterImage } from '../../@types';
import { SharpImageProcessor } from './strategies/SharpImageProcessor';

let defaultProcessor: ImageProcessor | null = null;

/**
 * Returns the shared sharp-backed processor, created on first use.
 */
export function getDefaultImageProcessor(): ImageProcessor {
    if (!defaultProcessor) {
        defaultProcessor = new SharpImageProcessor();
    }
    return defaultProcessor;
}

/**
 * Produces one square variant per target size, keeping the order of `sizes`.
 * Resizes run concurrently; `Promise.all` re-joins them in input order.
 *
 * @param source - Decoded source image.
 * @param sizes - Edge lengths, in the order the variants are wanted.
 * @param processor - Resizing collaborator.
 */
export async function createVariants(
    source: IRasterImage,
    sizes: readonly number[],
    processor: ImageProcessor = getDefaultImageProcessor(),
): Promise<IRasterImage[]> {
    return await Promise.all(sizes.map((size) => processor.resize(source, size, size)));
}
