// src/cli/program.ts

import { Command } from 'commander';
import path from 'node:path';
import chalk from 'chalk';
import cliProgress from 'cli-progress';
import type { ILogFacility, IPngReport, IVerifyResult } from '../@types/index.ts';
import { config } from '../config/index.ts';
import { inspect } from '../core/inspector/index.ts';
import { collectPngFiles, verifyPngFiles } from '../core/inspector/lib/verifyFiles.ts';
import { ChunkType } from '../core/chunk/chunkType.ts';
import { formatCrc } from '../core/chunk/chunk.ts';
import { readPng, writePng } from '../core/png/pngUtils.ts';
import { createLogger, NoopLogFacility } from '../utils/logging/logUtils.ts';
import { ensureOutputDirectory } from '../utils/storage/storageUtils.ts';

export interface IProgramOptions {
    logFacility?: ILogFacility;
    exit?: (code: number) => void;
}

const flag = (value: boolean, set: string, unset: string): string => (value ? set : unset);

/**
 * Renders an inspection report as table lines.
 */
export function formatReport(report: IPngReport): string[] {
    const lines = [`${report.file} (${report.size} bytes, ${report.chunks.length} chunks)`];
    for (const chunk of report.chunks) {
        const properties = [
            flag(chunk.critical, 'critical', 'ancillary'),
            flag(chunk.public, 'public', 'private'),
            flag(chunk.reservedBitValid, 'reserved-ok', 'reserved-set'),
            flag(chunk.safeToCopy, 'safe-to-copy', 'unsafe-to-copy'),
        ];
        lines.push(`  #${chunk.index} ${chunk.type} length=${chunk.length} crc=${formatCrc(chunk.crc)} ${properties.join(',')}`);
    }
    const header = report.imageHeader;
    if (header) {
        lines.push(
            `  image: ${header.width}x${header.height} bitDepth=${header.bitDepth} colorType=${header.colorType} interlace=${header.interlaceMethod}`,
        );
    }
    return lines;
}

function formatVerifyResult(result: IVerifyResult): string {
    return result.valid
        ? chalk.green(`OK      ${result.file} (${result.chunkCount} chunks)`)
        : chalk.red(`INVALID ${result.file} [${result.kind}] ${result.message}`);
}

export function createProgram(programOptions: IProgramOptions = {}): Command {
    const logFacility = programOptions.logFacility ?? console;
    const exit = programOptions.exit ?? ((code: number) => {
        process.exitCode = code;
    });

    const program = new Command();
    program
        .name('pngchunk')
        .description('Inspect, verify and edit the chunks of PNG files')
        .version('1.0.0')
        .option('-v, --verbose', 'Enable verbose logging');

    program
        .command('inspect')
        .description('List the chunks of a PNG file and decode its image header')
        .argument('<file>', 'PNG file to inspect')
        .showHelpAfterError()
        .action(async (file: string) => {
            const verbose = Boolean(program.opts().verbose);
            const logger = createLogger('inspect', logFacility, verbose);
            try {
                const report = await inspect({ inputFile: path.resolve(file), verbose, logger });
                formatReport(report).forEach((line) => logFacility.log(line));
            } catch (error) {
                logger.error(`Inspection failed: ${error}`);
                exit(1);
            }
        });

    program
        .command('verify')
        .description('Check that every chunk of the given PNG files (or folders of PNG files) decodes')
        .argument('<inputs...>', 'PNG files or folders')
        .option('-c, --concurrency <number>', 'Files decoded in parallel', (value: string) => parseInt(value, 10))
        .option('-l, --log', 'Log each file instead of showing a progress bar')
        .showHelpAfterError()
        .action(async (inputs: string[], options: { concurrency?: number; log?: boolean }) => {
            const verbose = Boolean(program.opts().verbose);
            const isLogging = options.log || false;
            if (options.concurrency !== undefined) {
                if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
                    logFacility.error('Concurrency must be a positive integer.');
                    exit(1);
                    return;
                }
                config.verification.concurrency = options.concurrency;
            }

            const logger = createLogger('verify', isLogging ? logFacility : NoopLogFacility, verbose);
            const progressBar = isLogging
                ? undefined
                : new cliProgress.SingleBar({
                      format: 'Verifying |{bar}| {percentage}% || {value}/{total} file: {file}',
                      barCompleteChar: '█',
                      barIncompleteChar: '░',
                      hideCursor: true,
                  }, cliProgress.Presets.shades_grey);
            try {
                const files = collectPngFiles(inputs);
                const results = await verifyPngFiles(files, {
                    logger,
                    concurrency: config.verification.concurrency,
                    progressBar,
                });
                results.forEach((result) => logFacility.log(formatVerifyResult(result)));
                const invalid = results.filter((result) => !result.valid).length;
                logFacility.log(`${results.length - invalid}/${results.length} files valid`);
                if (invalid > 0) exit(1);
            } catch (error) {
                logFacility.error(chalk.red(`Verification failed: ${error}`));
                exit(1);
            }
        });

    program
        .command('remove')
        .description('Remove the first chunk of the given type and write the result')
        .argument('<file>', 'PNG file to edit')
        .argument('<chunkType>', 'Four-letter chunk type, e.g. tEXt')
        .requiredOption('-o, --output <file>', 'Where to write the edited PNG')
        .showHelpAfterError()
        .action((file: string, chunkType: string, options: { output: string }) => {
            const verbose = Boolean(program.opts().verbose);
            const logger = createLogger('remove', logFacility, verbose);
            try {
                const type = ChunkType.fromString(chunkType);
                const png = readPng(path.resolve(file));
                const removed = png.removeFirstChunk(type.toString());
                logger.debug(`Removed ${removed}`);
                const outputFile = path.resolve(options.output);
                ensureOutputDirectory(path.dirname(outputFile));
                writePng(outputFile, png);
                logger.success(`Removed "${type}" chunk, wrote "${outputFile}".`);
            } catch (error) {
                logger.error(`Removing chunk failed: ${error}`);
                exit(1);
            }
        });

    return program;
}
