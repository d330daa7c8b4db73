// src/core/container/encodingOptions.ts

import type { IMaskOptions, MaskPolicy } from '../../@types';
import { config } from '../../config';
import { validateTargetSizes } from './targetSizes';

export interface IEncodingOverrides {
    targetSizes?: readonly number[];
    maskPolicy?: MaskPolicy;
}

export interface IEncodingOptions {
    targetSizes: readonly number[];
    maskOptions: IMaskOptions;
}

/**
 * Fills unset target sizes and mask policy from `config` and validates the sizes.
 *
 * @throws {ConfigurationError} when the resulting sizes are invalid.
 */
export function resolveEncodingOptions(overrides: IEncodingOverrides = {}): IEncodingOptions {
    return {
        targetSizes: validateTargetSizes(overrides.targetSizes ?? config.targetSizes),
        maskOptions: { ...config.mask, policy: overrides.maskPolicy ?? config.mask.policy },
    };
}
