/**
 * Naming helpers for downloaded files and folders
 */

/**
 * Number of decimal digits needed to write `count`, at least 1
 */
export function digitCount(count: number): number {
    if (!Number.isFinite(count) || count < 10) {
        return 1;
    }
    return Math.floor(Math.log10(count)) + 1;
}

/**
 * Left-pads a value with zeros to the given width.
 * Values already wider are left untouched.
 */
export function zeroPad(value: number, width: number): string {
    if (value < 0) {
        return `-${String(-value).padStart(width - 1, '0')}`;
    }
    return String(value).padStart(width, '0');
}

/**
 * File extension for a page: `.png` when the source filename mentions png, `.jpg` otherwise
 */
export function pageExtension(filename: string): '.png' | '.jpg' {
    return filename.includes('.png') ? '.png' : '.jpg';
}

/**
 * Page file name, e.g. `page_007.jpg`
 *
 * @param index - 0-based page index
 * @param width - Padding width for the index
 * @param filename - Source filename, used for the extension
 */
export function pageFileName(index: number, width: number, filename: string): string {
    return `page_${zeroPad(index, width)}${pageExtension(filename)}`;
}

/**
 * Padding width for chapter folders: integer digits of the largest label, at least 1
 */
export function chapterLabelWidth(maxLabel: number | undefined): number {
    if (maxLabel === undefined || !Number.isFinite(maxLabel) || maxLabel < 1) {
        return 1;
    }
    return Math.floor(Math.log10(maxLabel)) + 1;
}

/**
 * Chapter folder name, e.g. `chapter_012`, `chapter_12.5` or `chapter_none`
 */
export function chapterDirName(label: number | undefined, width: number): string {
    return label === undefined ? 'chapter_none' : `chapter_${zeroPad(label, width)}`;
}
