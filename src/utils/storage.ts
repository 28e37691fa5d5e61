/**
 * @fileoverview Safe flat-file helpers.
 * @module utils/storage
 * @version 1.0.0
 *
 * Home directories can be read-only or missing. These helpers treat the
 * record files as optional and never throw.
 */

import fs from 'node:fs';
import path from 'node:path';

export function safeReadTextFile(filePath: string): string | null {
    try {
        return fs.readFileSync(filePath, 'utf8');
    } catch {
        return null;
    }
}

/**
 * Write a file, creating its parent directory.
 * Writes to a sibling temp file first so a failed write never truncates the original.
 */
export function safeWriteTextFile(filePath: string, value: string): boolean {
    const tempPath = `${filePath}.tmp`;
    try {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(tempPath, value, 'utf8');
        fs.renameSync(tempPath, filePath);
        return true;
    } catch {
        safeRemoveFile(tempPath);
        return false;
    }
}

export function safeRemoveFile(filePath: string): boolean {
    try {
        fs.rmSync(filePath, { force: true });
        return true;
    } catch {
        return false;
    }
}

/**
 * Read and parse a JSON file.
 * @returns `missing` when the file cannot be read, `corrupt` when it is not JSON
 */
export function safeReadJsonFile(
    filePath: string
): { status: 'ok'; value: unknown } | { status: 'missing' } | { status: 'corrupt' } {
    const text = safeReadTextFile(filePath);
    if (text === null) {
        return { status: 'missing' };
    }
    try {
        const value: unknown = JSON.parse(text);
        return { status: 'ok', value };
    } catch {
        return { status: 'corrupt' };
    }
}
