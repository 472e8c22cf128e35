// src/core/inspector/lib/verifyFiles.ts

import type { IVerifyOptions, IVerifyResult } from '../../../@types/index.ts';
import path from 'node:path';
import pLimit from 'p-limit';
import { config } from '../../../config/index.ts';
import { isPngError } from '../../errors.ts';
import { readPngAsync } from '../../png/pngUtils.ts';
import { hasExtension, isDirectory, readDirectory } from '../../../utils/storage/storageUtils.ts';

/**
 * Expands the given paths into a list of PNG files. Directories contribute the
 * files carrying the PNG extension directly inside them; files are kept as given.
 *
 * @param inputs - Files and directories.
 * @return Resolved file paths in input order, each directory's files sorted by name.
 */
export function collectPngFiles(inputs: string[]): string[] {
    return inputs.flatMap((input) => {
        const resolved = path.resolve(input);
        if (!isDirectory(resolved)) {
            return [resolved];
        }
        return readDirectory(resolved)
            .filter((name) => hasExtension(name, config.fileExtension))
            .map((name) => path.join(resolved, name));
    });
}

/**
 * Decodes every file, a bounded number at a time. A codec failure is recorded for
 * its file; any other failure rejects the whole batch.
 *
 * @param files - Paths of the files to verify.
 * @param options - Logger, concurrency and optional progress bar.
 * @return One result per file, in the order of `files`.
 */
export async function verifyPngFiles(files: string[], options: IVerifyOptions): Promise<IVerifyResult[]> {
    const { logger, progressBar } = options;
    const concurrency = options.concurrency ?? config.verification.concurrency;
    const limit = pLimit(Math.max(1, concurrency));

    progressBar?.start(files.length, 0);
    try {
        return await Promise.all(
            files.map((file) =>
                limit(async (): Promise<IVerifyResult> => {
                    const result = await verifyPngFile(file);
                    if (result.valid) {
                        logger.debug(`"${file}" holds ${result.chunkCount} valid chunks.`);
                    } else {
                        logger.warn(`"${file}" is invalid (${result.kind}): ${result.message}`);
                    }
                    progressBar?.increment({ file: path.basename(file) });
                    return result;
                })
            ),
        );
    } catch (error) {
        limit.clearQueue();
        throw error;
    } finally {
        progressBar?.stop();
    }
}

async function verifyPngFile(file: string): Promise<IVerifyResult> {
    try {
        const png = await readPngAsync(file);
        return { file, valid: true, chunkCount: png.chunks().length };
    } catch (error) {
        if (!isPngError(error)) throw error;
        return { file, valid: false, kind: error.kind, message: error.message };
    }
}
