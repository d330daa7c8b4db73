// src/cli/inspect.ts

import path from 'node:path';
import { entryDimension, parseIcon, readBitmapInfoHeader } from '../core/container/parseIcon';
import { readBufferFromFile } from '../utils/storage/storageUtils';

/**
 * Renders a human readable summary of an icon file, one line per directory entry.
 *
 * @param iconPath - Icon file to describe.
 */
export async function describeIcon(iconPath: string): Promise<string[]> {
    const { entries, images } = parseIcon(await readBufferFromFile(iconPath));
    const lines = [`${path.basename(iconPath)}: ${entries.length} images`];
    entries.forEach((entry, index) => {
        const dib = readBitmapInfoHeader(images[index]);
        lines.push(
            `  #${index} ${entryDimension(entry.width)}x${entryDimension(entry.height)} ` +
                `${entry.bitCount}bpp ${entry.bytesInRes} bytes @ ${entry.imageOffset} ` +
                `(DIB ${dib.width}x${dib.height}, compression ${dib.compression})`,
        );
    });
    return lines;
}
