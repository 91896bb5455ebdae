import { readFile } from 'fs/promises';

import { HostSpec } from '../enrolltypes/HostSpec';
import { ArgumentError } from '../enrolltypes/EnrollError';

/**
 * Make a host from its common name and alternative names. Repeated alternative
 * names are dropped, keeping the first occurrence.
 */
export function hostSpec(commonName: string, altNames: readonly string[] = []): HostSpec {
    if (!commonName) {
        throw new ArgumentError('A host requires a common name');
    }

    return { commonName: commonName, altNames: [ ...new Set(altNames) ] };
}

/**
 * Parse host file text: one host per line, the common name followed by any alternative
 * names, separated by white space. Blank lines and lines starting with # are skipped.
 */
export function parseHostFile(text: string): HostSpec[] {
    let hosts: HostSpec[] = [];

    for (let line of text.split(/\r?\n/)) {
        let tokens = line.trim().split(/\s+/).filter((t) => t.length > 0);

        if (tokens.length == 0 || tokens[0].startsWith('#')) {
            continue;
        }

        hosts.push(hostSpec(tokens[0], tokens.slice(1)));
    }

    return hosts;
}

export async function readHostFile(filename: string): Promise<HostSpec[]> {
    let text: string;

    try {
        text = await readFile(filename, { encoding: 'utf8' });
    }
    catch (err) {
        throw new ArgumentError(`Unable to read host file ${filename}: ${err instanceof Error ? err.message : err}`);
    }

    return parseHostFile(text);
}

/**
 * Remove hosts whose common name and alternative names (in order) match an earlier one.
 */
export function dedupeHostSpecs(hosts: readonly HostSpec[]): HostSpec[] {
    let seen = new Set<string>();

    return hosts.filter((host) => {
        let key = JSON.stringify([ host.commonName, ...host.altNames ]);

        if (seen.has(key)) {
            return false;
        }

        seen.add(key);
        return true;
    });
}
