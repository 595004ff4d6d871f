/**
 * CBZ packaging of downloaded chapter folders
 */

import { basename, dirname, join } from 'node:path';
import { readFile } from 'node:fs/promises';
import JSZip from 'jszip';

import { PATHS } from '../config/constants';
import { listFiles, removeDir, writeBytes } from '../utils/fs';
import { zeroPad } from '../utils/text';
import { IoError, describeError } from './errors';

export interface CbzOptions {
    /** Archive file name, written in the parent folder of the first chapter */
    fileName?: string;
    /** Delete the chapter folders once the archive is written (default true) */
    removeSources?: boolean;
}

/**
 * Packs chapter folders into a single CBZ archive.
 * Each folder becomes `{position:05}_{folder name}` inside the archive so
 * readers list chapters in download order.
 *
 * @param dirs - Chapter folders, in reading order
 * @returns Path of the archive, or null when there was nothing to pack
 */
export async function packCbz(dirs: readonly string[], options: CbzOptions = {}): Promise<string | null> {
    const first = dirs[0];
    if (first === undefined) {
        return null;
    }

    const zip = new JSZip();
    for (const [position, dir] of dirs.entries()) {
        const folder = `${zeroPad(position, 5)}_${basename(dir)}`;
        for (const file of await listFiles(dir)) {
            const path = join(dir, file);
            try {
                zip.file(`${folder}/${file}`, await readFile(path));
            } catch (error) {
                throw new IoError(`Cannot read ${path}: ${describeError(error)}`, path, { cause: error });
            }
        }
    }

    const archivePath = join(dirname(first), options.fileName ?? PATHS.CBZ_FILE);
    const content = await zip.generateAsync({ type: 'nodebuffer', compression: 'STORE' });
    await writeBytes(archivePath, content);

    if (options.removeSources ?? true) {
        for (const dir of dirs) {
            await removeDir(dir);
        }
    }
    return archivePath;
}
