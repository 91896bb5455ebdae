import path from 'path';
import { access, constants, mkdir } from 'fs/promises';
import * as log4js from 'log4js';

import { OutputError } from '../enrolltypes/EnrollError';
import { FileOps, defaultFileOps } from './atomicWrite';
import { exists } from './exists';

const logger = log4js.getLogger('output');

/**
 * A version of the common name suitable to use as a filename (no blanks, slashes or wildcards)
 */
export function sanitizeName(name: string): string {
    return name.replace(/[^A-Za-z0-9_.=+-]/g, '_');
}

export function certificateFilename(directory: string, commonName: string): string {
    return path.join(directory, sanitizeName(commonName) + '.pem');
}

export function keyFilename(directory: string, commonName: string): string {
    return path.join(directory, sanitizeName(commonName) + '_key.pem');
}

/**
 * Create the output directory if needed and check it can be written to.
 *
 * @throws OutputError when the directory cannot be created or is not writable
 */
export async function ensureOutputDirectory(directory: string): Promise<void> {
    try {
        await mkdir(directory, { recursive: true });
        await access(directory, constants.W_OK);
    }
    catch (err) {
        throw new OutputError(directory, `Output directory ${directory} is not writable: ${err instanceof Error ? err.message : err}`);
    }
}

/**
 * Move an existing file out of the way. The first of <target>.bak, <target>.bak.1,
 * <target>.bak.2 ... that does not exist receives it.
 *
 * @param target Path that is about to be written
 * @returns Where the old file went, or null if there was nothing at target
 */
export async function relocateExisting(target: string, fileOps: FileOps = defaultFileOps): Promise<string | null> {
    if (!await exists(target)) {
        return null;
    }

    let candidate = `${target}.bak`;

    for (let i = 1; await exists(candidate); i++) {
        candidate = `${target}.bak.${i}`;
    }

    try {
        await fileOps.rename(target, candidate);
    }
    catch (err) {
        throw new OutputError(target, `Unable to move ${target} aside: ${err instanceof Error ? err.message : err}`);
    }

    logger.info(`Moved existing ${path.basename(target)} to ${path.basename(candidate)}`);

    return candidate;
}
