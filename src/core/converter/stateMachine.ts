// src/core/converter/stateMachine.ts

import path from 'node:path';
import type { IConvertOptions, IConvertResult, ImageProcessor, IMaskOptions, IRasterImage } from '../../@types';
import { config } from '../../config';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine';
import { ConverterStates } from '../../stateMachine/definedStates';
import { ensureOutputDirectory, writeBufferToFileAtomic } from '../../utils/storage/storageUtils';
import { serializeIcon } from '../container/iconContainer';
import { resolveEncodingOptions } from '../container/encodingOptions';
import { DecodeError, EncodeError, errorMessage, IconForgeError, WriteError } from '../errors';
import { createVariants, getDefaultImageProcessor } from '../imageProcessing/processor';

type StageError = typeof DecodeError | typeof EncodeError | typeof WriteError;

export class ConvertStateMachine extends AbstractStateMachine<ConverterStates, IConvertOptions> {
    private readonly processor: ImageProcessor;
    private targetSizes: readonly number[] = [];
    private maskOptions: IMaskOptions = config.mask;
    private source: IRasterImage | null = null;
    private variants: IRasterImage[] = [];
    private icon: Buffer | null = null;

    constructor(options: IConvertOptions) {
        super(ConverterStates.INIT, options);
        this.processor = options.processor ?? getDefaultImageProcessor();

        this.stateTransitions = [
            { state: ConverterStates.INIT, handler: this.init },
            { state: ConverterStates.LOAD_SOURCE, handler: this.loadSource },
            { state: ConverterStates.RESIZE_VARIANTS, handler: this.resizeVariants },
            { state: ConverterStates.ASSEMBLE_CONTAINER, handler: this.assembleContainer },
            { state: ConverterStates.WRITE_OUTPUT, handler: this.writeOutput },
        ];
    }

    get result(): IConvertResult {
        if (this.state !== ConverterStates.COMPLETED || !this.icon) {
            throw new Error(`Conversion of "${this.options.inputFile}" has not completed`);
        }
        return { outputFile: this.options.outputFile, byteLength: this.icon.length };
    }

    protected getCompletionState(): ConverterStates {
        return ConverterStates.COMPLETED;
    }

    protected getErrorState(): ConverterStates {
        return ConverterStates.ERROR;
    }

    /**
     * Resolves target sizes and mask policy from the options, falling back to `config`.
     */
    private init(): void {
        const { targetSizes, maskPolicy, logger, inputFile } = this.options;
        logger.debug(`Initializing conversion of ${inputFile}`);
        const resolved = resolveEncodingOptions({ targetSizes, maskPolicy });
        this.targetSizes = resolved.targetSizes;
        this.maskOptions = resolved.maskOptions;
    }

    private async loadSource(): Promise<void> {
        const { inputFile, logger } = this.options;
        this.source = await this.runStage(DecodeError, 'Failed to decode source image', () =>
            this.processor.loadImage(inputFile),
        );
        logger.debug(`Decoded ${inputFile} (${this.source.width}x${this.source.height})`);
    }

    private async resizeVariants(): Promise<void> {
        const source = this.requireSource();
        this.variants = await this.runStage(EncodeError, 'Failed to resize source image', () =>
            createVariants(source, this.targetSizes, this.processor),
        );
        this.options.logger.debug(`Created ${this.variants.length} variants: ${this.targetSizes.join(', ')}`);
    }

    private async assembleContainer(): Promise<void> {
        this.icon = await this.runStage(EncodeError, 'Failed to encode icon', () =>
            serializeIcon(this.variants, this.maskOptions),
        );
    }

    /**
     * Writes the finished container in one atomic step.
     */
    private async writeOutput(): Promise<void> {
        const { outputFile, logger } = this.options;
        const icon = this.icon;
        if (!icon) {
            throw new EncodeError('No icon was assembled', { file: this.options.inputFile, stage: this.state });
        }
        await this.runStage(WriteError, 'Failed to write icon', async () => {
            await ensureOutputDirectory(path.dirname(outputFile));
            await writeBufferToFileAtomic(outputFile, icon);
        });
        logger.debug(`Wrote ${icon.length} bytes to ${outputFile}`);
    }

    private requireSource(): IRasterImage {
        if (!this.source) {
            throw new DecodeError('Source image was not loaded', { file: this.options.inputFile, stage: this.state });
        }
        return this.source;
    }

    /**
     * Runs one stage, attaching the input file and current state to anything it throws.
     * Errors from this project keep their class; anything else is wrapped in `ErrorClass`.
     */
    private async runStage<T>(ErrorClass: StageError, message: string, work: () => Promise<T> | T): Promise<T> {
        const context = { file: this.options.inputFile, stage: this.state };
        try {
            return await work();
        } catch (error) {
            if (error instanceof IconForgeError) {
                throw error.withContext(context);
            }
            throw new ErrorClass(`${message}: ${errorMessage(error)}`, { ...context, cause: error });
        }
    }
}
