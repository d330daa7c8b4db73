// src/core/converter/index.ts

import type { IConvertOptions, IConvertResult } from '../../@types';

import { ConvertStateMachine } from './stateMachine';

/**
 * Converts one image file into an icon file using the conversion state machine.
 *
 * @param options - Input and output paths plus conversion settings.
 * @return The written path and its size in bytes.
 */
export async function convert(options: IConvertOptions): Promise<IConvertResult> {
    const stateMachine = new ConvertStateMachine(options);
    await stateMachine.run();
    return stateMachine.result;
}
