// src/utils/storage/storageUtils.ts

import fs from 'node:fs';
import path from 'node:path';

/**
 * Ensures that the specified output directory exists, creating any missing parents.
 *
 * @param outputFolder - The path of the output directory to ensure.
 */
export function ensureOutputDirectory(outputFolder: string): void {
    fs.mkdirSync(outputFolder, { recursive: true });
}

/**
 * File name without directory and extension, used to name exported sizes.
 */
export function baseNameWithoutExtension(filePath: string): string {
    return path.basename(filePath, path.extname(filePath));
}
