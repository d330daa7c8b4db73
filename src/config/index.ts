// src/config/index.ts

import type { IMaskOptions, ResizeKernel } from '../@types';
import { DEFAULT_TARGET_SIZES } from '../core/container/targetSizes';

export const ICON_TYPE = 1;
export const ICON_HEADER_SIZE = 6;
export const ICON_DIR_ENTRY_SIZE = 16;
export const BITMAP_INFO_HEADER_SIZE = 40;
export const BITS_PER_PIXEL = 32;

export interface IIconForgeConfig {
    targetSizes: readonly number[];
    resize: {
        kernel: ResizeKernel;
    };
    mask: IMaskOptions;
    batch: {
        concurrency: number;
        inputExtension: string;
        outputExtension: string;
    };
}

export const config: IIconForgeConfig = {
    targetSizes: DEFAULT_TARGET_SIZES,
    resize: {
        kernel: 'lanczos3',
    },
    mask: {
        policy: 'constant', // existing output keeps every mask byte at 0x00
        alphaThreshold: 128, // 8-bit alpha below this is masked under 'alpha-threshold'
    },
    batch: {
        concurrency: 4,
        inputExtension: '.png',
        outputExtension: '.ico',
    },
};
