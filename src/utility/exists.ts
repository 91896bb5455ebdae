import { access, constants } from 'fs/promises';

/**
 * Async version of the fs exists function that is not provided by the standard node package
 * 
 * @param filename The name of the file to check for existence
 * @returns True if it exists otherwise false
 */
export async function exists(filename: string): Promise<boolean> {
    try {
        await access(filename, constants.F_OK);
        return true;
    }
    catch (_err) {
        return false;
    }
}

/**
 * Check that a file exists and this process may read it.
 */
export async function readable(filename: string): Promise<boolean> {
    try {
        await access(filename, constants.R_OK);
        return true;
    }
    catch (_err) {
        return false;
    }
}
