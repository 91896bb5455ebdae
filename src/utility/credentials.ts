import path from 'path';
import { readFile } from 'fs/promises';
import { pem } from 'node-forge';

import { CredentialError } from '../enrolltypes/EnrollError';
import { readable } from './exists';

export type CredentialPaths = {
    cert: string;
    key: string;
};

export type UserCredentials = CredentialPaths & {
    certPem: string;
    keyPem: string;
};

/**
 * Decide where the user certificate and key live: explicit options first, then
 * X509_USER_CERT and X509_USER_KEY, then ~/.globus/usercert.pem and ~/.globus/userkey.pem.
 */
export function resolveCredentialPaths(explicit: Partial<CredentialPaths>, env: NodeJS.ProcessEnv, home: string): CredentialPaths {
    return {
        cert: explicit.cert || env['X509_USER_CERT'] || path.join(home, '.globus', 'usercert.pem'),
        key: explicit.key || env['X509_USER_KEY'] || path.join(home, '.globus', 'userkey.pem'),
    };
}

/**
 * Read and sanity check the credential files.
 *
 * @throws CredentialError when a file is missing, unreadable or not the expected PEM type
 */
export async function loadCredentials(paths: CredentialPaths): Promise<UserCredentials> {
    let certPem = await readPem(paths.cert, 'certificate', (type) => type == 'CERTIFICATE');
    let keyPem = await readPem(paths.key, 'private key', (type) => type.endsWith('PRIVATE KEY'));

    return { ...paths, certPem, keyPem };
}

async function readPem(filename: string, description: string, typeMatches: (type: string) => boolean): Promise<string> {
    if (!await readable(filename)) {
        throw new CredentialError(`User ${description} ${filename} does not exist or cannot be read`);
    }

    let text = await readFile(filename, { encoding: 'utf8' });
    let messages: { type: string }[];

    try {
        messages = pem.decode(text);
    }
    catch (err) {
        throw new CredentialError(`User ${description} ${filename} is not valid PEM: ${err instanceof Error ? err.message : err}`);
    }

    if (!messages.some((msg) => typeMatches(msg.type))) {
        throw new CredentialError(`User ${description} ${filename} does not contain a ${description}`);
    }

    return text;
}
