// src/core/container/parseIcon.ts

import type { IBitmapInfoHeader, IIconDir, IIconDirEntry, IParsedIcon } from '../../@types';
import { BITMAP_INFO_HEADER_SIZE, ICON_DIR_ENTRY_SIZE, ICON_HEADER_SIZE, ICON_TYPE } from '../../config';
import { DecodeError } from '../errors';

function readIconDir(data: Buffer): IIconDir {
    return {
        reserved: data.readUInt16LE(0),
        type: data.readUInt16LE(2),
        count: data.readUInt16LE(4),
    };
}

function readIconDirEntry(data: Buffer, offset: number): IIconDirEntry {
    return {
        width: data.readUInt8(offset),
        height: data.readUInt8(offset + 1),
        colorCount: data.readUInt8(offset + 2),
        reserved: data.readUInt8(offset + 3),
        planes: data.readUInt16LE(offset + 4),
        bitCount: data.readUInt16LE(offset + 6),
        bytesInRes: data.readUInt32LE(offset + 8),
        imageOffset: data.readUInt32LE(offset + 12),
    };
}

/**
 * Reads the header and directory of an icon container. Each returned image is a view
 * into `data` covering exactly the bytes its entry declares.
 *
 * @throws {DecodeError} when the header is invalid or an entry points past the end.
 */
export function parseIcon(data: Buffer): IParsedIcon {
    if (data.length < ICON_HEADER_SIZE) {
        throw new DecodeError(`Icon data too short: ${data.length} bytes`);
    }

    const header = readIconDir(data);
    if (header.reserved !== 0) {
        throw new DecodeError('Invalid icon file: reserved field must be 0');
    }
    if (header.type !== ICON_TYPE) {
        throw new DecodeError(`Invalid icon file: unsupported type ${header.type}`);
    }

    const directoryEnd = ICON_HEADER_SIZE + header.count * ICON_DIR_ENTRY_SIZE;
    if (data.length < directoryEnd) {
        throw new DecodeError(`Icon directory of ${header.count} entries is truncated`);
    }

    const entries: IIconDirEntry[] = [];
    const images: Buffer[] = [];
    for (let i = 0; i < header.count; i++) {
        const entry = readIconDirEntry(data, ICON_HEADER_SIZE + i * ICON_DIR_ENTRY_SIZE);
        const end = entry.imageOffset + entry.bytesInRes;
        if (entry.imageOffset < directoryEnd || end > data.length) {
            throw new DecodeError(
                `Entry ${i} spans bytes ${entry.imageOffset}..${end} outside the ${data.length} byte payload`,
            );
        }
        entries.push(entry);
        images.push(data.subarray(entry.imageOffset, end));
    }

    return { header, entries, images };
}

/**
 * Decodes the 40-byte BITMAPINFOHEADER at the start of an icon image blob.
 */
export function readBitmapInfoHeader(blob: Buffer): IBitmapInfoHeader {
    if (blob.length < BITMAP_INFO_HEADER_SIZE) {
        throw new DecodeError(`Bitmap header needs ${BITMAP_INFO_HEADER_SIZE} bytes, got ${blob.length}`);
    }
    return {
        headerSize: blob.readUInt32LE(0),
        width: blob.readInt32LE(4),
        height: blob.readInt32LE(8),
        planes: blob.readUInt16LE(12),
        bitCount: blob.readUInt16LE(14),
        compression: blob.readUInt32LE(16),
        imageSize: blob.readUInt32LE(20),
        xPixelsPerMeter: blob.readInt32LE(24),
        yPixelsPerMeter: blob.readInt32LE(28),
        colorsUsed: blob.readUInt32LE(32),
        colorsImportant: blob.readUInt32LE(36),
    };
}

/**
 * Edge length an entry stands for, reading the 0 sentinel back as 256.
 */
export function entryDimension(value: number): number {
    return value === 0 ? 256 : value;
}
