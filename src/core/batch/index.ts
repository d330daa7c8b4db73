// src/core/batch/index.ts

import path from 'node:path';
import pLimit from 'p-limit';
import type { IBatchOptions, IBatchReportEntry } from '../../@types';
import { config } from '../../config';
import { ensureOutputDirectory, listFilesWithExtension, replaceExtension } from '../../utils/storage/storageUtils';
import { resolveEncodingOptions } from '../container/encodingOptions';
import { convert } from '../converter';
import { ConfigurationError, errorMessage, IconForgeError } from '../errors';

/**
 * Maps an input image to its icon path, keeping its folder relative to the input root.
 */
export function resolveOutputPath(inputFile: string, inputFolder: string, outputFolder: string): string {
    const relativeDir = path.relative(inputFolder, path.dirname(inputFile));
    return path.join(outputFolder, relativeDir, replaceExtension(inputFile, config.batch.outputExtension));
}

/**
 * Converts every PNG in a folder into an icon with a bounded number of conversions in
 * flight. A failing file is recorded in the report and never stops the others. When
 * several inputs map to one output path (`logo.png` and `logo.PNG`), only the first in
 * path order is converted and the rest fail without touching the output.
 *
 * @param options - Folders, concurrency and conversion settings.
 * @return One report entry per input file, in path order.
 */
export async function convertDirectory(options: IBatchOptions): Promise<IBatchReportEntry[]> {
    const {
        inputFolder,
        outputFolder,
        logger,
        verbose,
        recursive = false,
        concurrency = config.batch.concurrency,
        maskPolicy,
        processor,
        progressBar,
    } = options;

    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new ConfigurationError(`Concurrency must be a positive integer, got ${concurrency}`);
    }
    const { targetSizes } = resolveEncodingOptions(options);

    const files = await listFilesWithExtension(inputFolder, config.batch.inputExtension, recursive);
    if (files.length === 0) {
        logger.warn(`No ${config.batch.inputExtension} files found in ${inputFolder}`);
        return [];
    }
    logger.info(`Found ${files.length} files in ${inputFolder}`);
    await ensureOutputDirectory(outputFolder);

    progressBar?.start(files.length, 0);
    const limit = pLimit(concurrency);
    const claimedOutputs = new Map<string, string>();

    const report = await Promise.all(
        files.map((file) => {
            const output = resolveOutputPath(file, inputFolder, outputFolder);
            const owner = claimedOutputs.get(output);
            if (owner !== undefined) {
                const reason = `Output ${output} is already produced by ${owner}`;
                logger.error(`Skipping ${file}: ${reason}`);
                progressBar?.increment({ file: path.basename(file) });
                return Promise.resolve<IBatchReportEntry>({ file, output, status: 'failed', reason });
            }
            claimedOutputs.set(output, file);

            return limit(async (): Promise<IBatchReportEntry> => {
                logger.info(`Processing ${file}...`);
                try {
                    await convert({
                        inputFile: file,
                        outputFile: output,
                        logger,
                        verbose,
                        targetSizes,
                        maskPolicy,
                        processor,
                    });
                    logger.success(`Created ${output}`);
                    return { file, output, status: 'success' };
                } catch (error) {
                    // the conversion state machine has already logged the failure
                    const stage = error instanceof IconForgeError ? error.stage : undefined;
                    return { file, output, status: 'failed', stage, reason: errorMessage(error) };
                } finally {
                    progressBar?.increment({ file: path.basename(file) });
                }
            });
        }),
    );

    progressBar?.stop();
    const failed = report.filter((entry) => entry.status === 'failed').length;
    logger.info(`Conversion completed: ${report.length - failed} succeeded, ${failed} failed.`);
    return report;
}
