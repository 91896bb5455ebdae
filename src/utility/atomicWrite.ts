import path from 'path';
import { randomBytes } from 'crypto';
import { open, rename, rm } from 'fs/promises';
import * as log4js from 'log4js';

import { OutputError } from '../enrolltypes/EnrollError';

const logger = log4js.getLogger('output');

/** File system calls that can be replaced by tests */
export type FileOps = {
    rename: (from: string, to: string) => Promise<void>;
    remove: (filename: string) => Promise<void>;
};

export const defaultFileOps: FileOps = {
    rename,
    remove: (filename) => rm(filename, { force: true }),
};

export type AtomicWriteOptions = {
    /** Permissions for a newly created file - default 0644 */
    mode?: number;
    fileOps?: FileOps;
};

/**
 * Write a file so that readers only ever see the old content or the complete new content.
 * The data goes to a temporary file in the same directory which is synced and then renamed
 * over the target.
 *
 * @param target Final path
 * @param data File content
 * @throws OutputError if any step fails - the target is left as it was
 */
export async function writeFileAtomic(target: string, data: string, options: AtomicWriteOptions = {}): Promise<void> {
    let ops = options.fileOps ?? defaultFileOps;
    let temp = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`);

    try {
        let handle = await open(temp, 'wx', options.mode ?? 0o644);

        try {
            await handle.writeFile(data, { encoding: 'utf8' });
            await handle.sync();
        }
        finally {
            await handle.close();
        }

        await ops.rename(temp, target);
    }
    catch (err) {
        try {
            await ops.remove(temp);
        }
        catch (cleanupErr) {
            logger.warn(`Unable to remove temporary file ${temp}: ${cleanupErr instanceof Error ? cleanupErr.message : cleanupErr}`);
        }

        throw new OutputError(target, `Unable to write ${target}: ${err instanceof Error ? err.message : err}`);
    }
}
