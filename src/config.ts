import path from 'path';
import { readFile } from 'fs/promises';
import deepmerge from 'deepmerge';
import { load } from 'js-yaml';
import * as log4js from 'log4js';

import { Config } from './enrolltypes/Config';
import { ConfigError } from './enrolltypes/EnrollError';
import { defaultConfig } from './defaultConfig';

const logger = log4js.getLogger('config');

const mergeOptions: deepmerge.Options = { arrayMerge: (_target, source) => source };

/** Deeply partial form of Config as found in a configuration file */
export type ConfigOverrides = {
    [K in keyof Config]?: Partial<{ [P in keyof Config[K]]: Partial<Config[K][P]> }>;
};

/**
 * Merge layers of options over the default configuration, validate the result and freeze it.
 * Later layers win.
 *
 * @param layers Values read from a configuration file or given on the command line
 * @returns The frozen configuration
 * @throws ConfigError when a required setting is missing or a value is out of range
 */
export function buildConfig(...layers: ConfigOverrides[]): Readonly<Config> {
    let config = layers.reduce<Config>(
        (merged, layer) => deepmerge<Config, ConfigOverrides>(merged, layer, mergeOptions),
        deepmerge<Config>(defaultConfig, {}, mergeOptions));

    validateConfig(config);

    return deepFreeze(config);
}

/**
 * Read a YAML configuration file and merge it, then any overrides, over the defaults.
 *
 * @param filename Path to the YAML file - defaults only when undefined
 * @param overrides Applied after the file
 */
export async function loadConfig(filename: string | undefined, overrides: ConfigOverrides = {}): Promise<Readonly<Config>> {
    if (filename == undefined) {
        return buildConfig(overrides);
    }

    let text: string;

    try {
        text = await readFile(path.resolve(filename), { encoding: 'utf8' });
    }
    catch (err) {
        throw new ConfigError(`Unable to read configuration file ${filename}: ${err instanceof Error ? err.message : err}`);
    }

    let options: unknown;

    try {
        options = load(text);
    }
    catch (err) {
        throw new ConfigError(`Invalid YAML in ${filename}: ${err instanceof Error ? err.message : err}`);
    }

    if (options == null) {
        logger.debug(`Configuration file ${filename} is empty`);
        return buildConfig(overrides);
    }

    if (!isMapping(options)) {
        throw new ConfigError(`Configuration file ${filename} must contain a mapping`);
    }

    logger.debug(`Loaded configuration from ${filename}`);

    return buildConfig(options, overrides);
}

/** Individual settings are checked once merged, by validateConfig */
function isMapping(value: unknown): value is ConfigOverrides {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateConfig(config: Config): void {
    let issuer = config.issuer;

    try {
        new URL(issuer.baseUrl);
    }
    catch (_err) {
        throw new ConfigError(`Invalid issuer base URL ${issuer.baseUrl}`);
    }

    if (!Number.isInteger(issuer.orgId) || issuer.orgId <= 0) {
        throw new ConfigError('issuer.orgId must be set to the numeric organization id');
    }

    for (let [name, value] of Object.entries({
        'issuer.certTypes.singleDomain': issuer.certTypes.singleDomain,
        'issuer.certTypes.multiDomain': issuer.certTypes.multiDomain,
        'issuer.serverType': issuer.serverType,
        'issuer.term': issuer.term,
    })) {
        if (!Number.isInteger(value)) {
            throw new ConfigError(`${name} must be an integer`);
        }
    }

    for (let [name, value] of Object.entries({
        'issuer.term': issuer.term,
        'issuer.timeout': issuer.timeout,
        'csr.keySize': config.csr.keySize,
        'timing.maxRetry': config.timing.maxRetry,
    })) {
        if (!Number.isInteger(value) || value <= 0) {
            throw new ConfigError(`${name} must be a positive integer`);
        }
    }

    for (let [name, value] of Object.entries({
        'timing.retrievalWait': config.timing.retrievalWait,
        'timing.approvalWait': config.timing.approvalWait,
    })) {
        if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
            throw new ConfigError(`${name} must be a number of milliseconds`);
        }
    }

    if (config.csr.subject.C && config.csr.subject.C.length != 2) {
        throw new ConfigError(`Invalid country code ${config.csr.subject.C} - must be two characters`);
    }

    if (!config.output.directory) {
        throw new ConfigError('output.directory must not be empty');
    }
}

function deepFreeze<T extends object>(o: T): Readonly<T> {
    const values: unknown[] = Object.values(o);

    for (let value of values) {
        if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
            deepFreeze(value);
        }
    }

    return Object.freeze(o);
}
