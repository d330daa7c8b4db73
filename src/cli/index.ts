#!/usr/bin/env node
// src/cli/index.ts

import { Command, InvalidArgumentError } from 'commander';
import path from 'node:path';
import figlet from 'figlet';
import gradient from 'gradient-string';
import cliProgress from 'cli-progress';
import type { IProgressBar, MaskPolicy } from '../@types';
import { config } from '../config';
import { convertDirectory } from '../core/batch';
import { parseTargetSizes } from '../core/container/targetSizes';
import { errorMessage } from '../core/errors';
import { getLogger, NoopLogFacility } from '../utils/logging/logUtils';
import { describeIcon } from './inspect';

interface IConvertCliOptions {
    input: string;
    output: string;
    sizes?: readonly number[];
    mask?: MaskPolicy;
    concurrency?: number;
    recursive?: boolean;
    log?: boolean;
    verbose?: boolean;
}

const MASK_POLICIES: readonly MaskPolicy[] = ['constant', 'alpha-threshold'];

function parseMaskPolicy(value: string): MaskPolicy {
    const policy = MASK_POLICIES.find((candidate) => candidate === value);
    if (!policy) {
        throw new InvalidArgumentError(`Expected one of ${MASK_POLICIES.join(', ')}.`);
    }
    return policy;
}

function parseSizes(value: string): readonly number[] {
    try {
        return parseTargetSizes(value);
    } catch (error) {
        throw new InvalidArgumentError(errorMessage(error));
    }
}

function parseConcurrency(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

export const program = new Command();
program
    .name('ico-forge')
    .description('A CLI tool that converts PNG images into multi-resolution ICO files')
    .version('1.0.0');

program
    .command('convert')
    .description('Convert every PNG in a folder into an ICO file')
    .requiredOption('-i, --input <folder>', 'Folder containing PNG files to convert')
    .requiredOption('-o, --output <folder>', 'Output folder for ICO files')
    .option('-s, --sizes <list>', `Comma separated icon sizes (Default: ${config.targetSizes.join(',')})`, parseSizes)
    .option('-m, --mask <policy>', `Mask policy: ${MASK_POLICIES.join(' | ')} (Default: ${config.mask.policy})`, parseMaskPolicy)
    .option('-c, --concurrency <number>', `Files converted at once (Default: ${config.batch.concurrency})`, parseConcurrency)
    .option('-r, --recursive', 'Also convert PNG files in subfolders')
    .option('-l, --log', 'Enable logging')
    .option('-v, --verbose', 'Enable verbose logging')
    .showHelpAfterError()
    .action(async (options: IConvertCliOptions) => {
        const verbose = options.verbose || false;
        const isLogging = options.log || verbose;

        config.targetSizes = options.sizes ?? config.targetSizes;
        config.mask = { ...config.mask, policy: options.mask ?? config.mask.policy };
        config.batch = { ...config.batch, concurrency: options.concurrency ?? config.batch.concurrency };

        const logger = getLogger('converter', isLogging ? console : NoopLogFacility, verbose);
        let progressBar: IProgressBar | undefined;
        if (!isLogging) {
            progressBar = new cliProgress.SingleBar(
                {
                    format: 'Converting |{bar}| {percentage}% || {value}/{total} Files',
                    barCompleteChar: '█',
                    barIncompleteChar: '░',
                    hideCursor: true,
                },
                cliProgress.Presets.shades_grey,
            );
        }

        try {
            const report = await convertDirectory({
                inputFolder: path.resolve(options.input),
                outputFolder: path.resolve(options.output),
                recursive: options.recursive || false,
                verbose,
                logger,
                progressBar,
            });
            const failures = report.filter((entry) => entry.status === 'failed');
            for (const failure of failures) {
                const stage = failure.stage ? ` [${failure.stage}]` : '';
                console.error(`Failed: ${failure.file}${stage} ${failure.reason}`);
            }
            process.exitCode = failures.length > 0 ? 1 : 0;
        } catch (error) {
            progressBar?.stop();
            console.error(`Conversion failed: ${errorMessage(error)}`);
            process.exitCode = 1;
        }
    });

program
    .command('inspect')
    .description('Print the directory of an ICO file')
    .argument('<file>', 'ICO file to inspect')
    .action(async (file: string) => {
        try {
            const lines = await describeIcon(path.resolve(file));
            console.log(lines.join('\n'));
        } catch (error) {
            console.error(`Inspection failed: ${errorMessage(error)}`);
            process.exitCode = 1;
        }
    });

if (require.main === module) {
    console.log(
        gradient.rainbow.multiline(
            figlet.textSync('ico-forge', {
                font: 'Standard',
                horizontalLayout: 'default',
                verticalLayout: 'default',
                width: 80,
            }),
        ),
    );
    program.parseAsync(process.argv).catch((error: unknown) => {
        console.error(errorMessage(error));
        process.exitCode = 1;
    });
}
