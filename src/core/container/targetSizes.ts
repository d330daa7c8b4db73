// src/core/container/targetSizes.ts

import { ConfigurationError } from '../errors';

export const MAX_ICON_SIZE = 256;

export const DEFAULT_TARGET_SIZES: readonly number[] = Object.freeze([16, 32, 48, 64, 128, 256]);

/**
 * Checks that sizes are non-empty, positive integers no larger than 256 and strictly
 * ascending, and returns them as a frozen copy.
 *
 * @throws {ConfigurationError} naming the first offending value.
 */
export function validateTargetSizes(sizes: readonly number[]): readonly number[] {
    if (sizes.length === 0) {
        throw new ConfigurationError('At least one target size is required');
    }
    sizes.forEach((size, index) => {
        if (!Number.isInteger(size) || size <= 0 || size > MAX_ICON_SIZE) {
            throw new ConfigurationError(`Target size ${size} must be an integer between 1 and ${MAX_ICON_SIZE}`);
        }
        if (index > 0 && size <= sizes[index - 1]) {
            throw new ConfigurationError(`Target sizes must be strictly ascending (${sizes[index - 1]} then ${size})`);
        }
    });
    return Object.freeze([...sizes]);
}

/**
 * Parses a comma separated list such as `16,32,48` and validates it.
 */
export function parseTargetSizes(list: string): readonly number[] {
    const sizes = list
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
        .map((part) => {
            if (!/^\d+$/.test(part)) {
                throw new ConfigurationError(`Invalid target size "${part}"`);
            }
            return Number(part);
        });
    return validateTargetSizes(sizes);
}
