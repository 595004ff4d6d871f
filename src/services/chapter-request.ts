/**
 * Chapter download request
 */

import { PATHS } from '../config/constants';
import { resolveChapterId } from './resolver';

/**
 * What to download and where. Instances never change: the `with*`
 * methods return a copy with one field replaced.
 */
export class ChapterDownloadRequest {
    private constructor(
        /** Chapter identifier */
        readonly id: string,
        /** true for compressed pages, false for original quality */
        readonly dataSaver: boolean,
        /** Destination directory */
        readonly path: string
    ) {}

    /**
     * Compressed quality into the current directory by default
     */
    static create(id: string): ChapterDownloadRequest {
        return new ChapterDownloadRequest(id, true, PATHS.OUTPUT_DIR);
    }

    /**
     * @param reference - Chapter id or `https://mangadex.org/chapter/{id}` link
     * @throws InvalidReferenceError
     */
    static fromReference(reference: string): ChapterDownloadRequest {
        return ChapterDownloadRequest.create(resolveChapterId(reference));
    }

    withDataSaver(dataSaver: boolean): ChapterDownloadRequest {
        return new ChapterDownloadRequest(this.id, dataSaver, this.path);
    }

    withPath(path: string): ChapterDownloadRequest {
        return new ChapterDownloadRequest(this.id, this.dataSaver, path);
    }

    toString(): string {
        return `ChapterDownloadRequest(${this.id}, ${this.dataSaver ? 'data-saver' : 'original'}, ${this.path})`;
    }
}
