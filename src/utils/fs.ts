/**
 * File system utility functions
 * Every failure surfaces as an IoError naming the path involved.
 */

import { mkdir, readdir, rm, writeFile } from 'node:fs/promises';

import { IoError, describeError } from '../services/errors';

/**
 * Ensures a directory exists, creating it recursively if needed
 *
 * @param dirPath - The directory path to ensure exists
 */
export async function ensureDir(dirPath: string): Promise<void> {
    try {
        await mkdir(dirPath, { recursive: true });
    } catch (error) {
        throw new IoError(`Cannot create directory ${dirPath}: ${describeError(error)}`, dirPath, {
            cause: error,
        });
    }
}

/**
 * Writes raw bytes to a file, replacing any previous content
 */
export async function writeBytes(filePath: string, data: Uint8Array): Promise<void> {
    try {
        await writeFile(filePath, data);
    } catch (error) {
        throw new IoError(`Cannot write ${filePath}: ${describeError(error)}`, filePath, {
            cause: error,
        });
    }
}

/**
 * Lists the regular files directly inside a directory, sorted by name
 */
export async function listFiles(dirPath: string): Promise<string[]> {
    try {
        const entries = await readdir(dirPath, { withFileTypes: true });
        return entries
            .filter((e) => e.isFile())
            .map((e) => e.name)
            .sort();
    } catch (error) {
        throw new IoError(`Cannot read directory ${dirPath}: ${describeError(error)}`, dirPath, {
            cause: error,
        });
    }
}

/**
 * Removes a directory and everything in it
 */
export async function removeDir(dirPath: string): Promise<void> {
    try {
        await rm(dirPath, { recursive: true, force: true });
    } catch (error) {
        throw new IoError(`Cannot remove ${dirPath}: ${describeError(error)}`, dirPath, {
            cause: error,
        });
    }
}
