// src/utils/storage/storageUtils.ts

import fs from 'node:fs';
import path from 'node:path';

/**
 * Ensures that the specified output directory exists, creating it and any missing
 * parents.
 *
 * @param outputFolder - Directory to create.
 */
export async function ensureOutputDirectory(outputFolder: string): Promise<void> {
    await fs.promises.mkdir(outputFolder, { recursive: true });
}

/**
 * Writes a buffer so that `filePath` either keeps its previous content or holds the
 * complete new content of exactly one writer: the data goes to a file inside a
 * freshly created hidden sibling directory, which is then renamed over the target.
 * Concurrent writers to the same path never share a temporary file.
 *
 * @param filePath - Final location of the file.
 * @param data - Complete file content.
 */
export async function writeBufferToFileAtomic(filePath: string, data: Uint8Array): Promise<void> {
    const tempDir = await fs.promises.mkdtemp(path.join(path.dirname(filePath), `.${path.basename(filePath)}-`));
    const tempPath = path.join(tempDir, path.basename(filePath));
    try {
        await fs.promises.writeFile(tempPath, data);
        await fs.promises.rename(tempPath, filePath);
    } finally {
        await fs.promises.rm(tempDir, { recursive: true, force: true });
    }
}

/**
 * Reads the entire contents of a file into a buffer.
 */
export async function readBufferFromFile(filePath: string): Promise<Buffer> {
    return await fs.promises.readFile(filePath);
}

/**
 * Collects files with the given extension (case-insensitive) from a directory,
 * sorted by path. Subdirectories are searched only when `recursive` is set.
 *
 * @param dir - Directory to search.
 * @param extension - Extension including the dot, e.g. `.png`.
 * @param recursive - Whether to descend into subdirectories.
 */
export async function listFilesWithExtension(dir: string, extension: string, recursive = false): Promise<string[]> {
    let files: string[] = [];
    const items = await fs.promises.readdir(dir, { withFileTypes: true });
    for (const item of items) {
        const fullPath = path.join(dir, item.name);
        if (item.isDirectory()) {
            if (recursive) {
                files = files.concat(await listFilesWithExtension(fullPath, extension, recursive));
            }
        } else if (item.isFile() && path.extname(item.name).toLowerCase() === extension.toLowerCase()) {
            files.push(fullPath);
        }
    }
    return files.sort();
}

/**
 * Replaces the extension of a file name, e.g. `logo.png` -> `logo.ico`.
 */
export function replaceExtension(fileName: string, extension: string): string {
    const base = path.basename(fileName, path.extname(fileName));
    return `${base}${extension}`;
}
