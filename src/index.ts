// src/index.ts

export * from './@types';
export { config } from './config';
export { encodeBitmapWithMask, encodeMask, writeBitmapInfoHeader } from './core/bitmap/encodeBitmap';
export { assembleIcon, clampDimension, serializeIcon } from './core/container/iconContainer';
export { entryDimension, parseIcon, readBitmapInfoHeader } from './core/container/parseIcon';
export { DEFAULT_TARGET_SIZES, parseTargetSizes, validateTargetSizes } from './core/container/targetSizes';
export { resolveEncodingOptions } from './core/container/encodingOptions';
export { convert } from './core/converter';
export { convertDirectory } from './core/batch';
export * from './core/errors';
export { RgbaImage } from './core/imageProcessing/RgbaImage';
export { SharpImageProcessor } from './core/imageProcessing/strategies/SharpImageProcessor';
export { getLogger, NoopLogFacility } from './utils/logging/logUtils';
