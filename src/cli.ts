import os from 'os';
import minimist from 'minimist';
import * as log4js from 'log4js';

import { Config } from './enrolltypes/Config';
import { ArgumentError, EnrollError, ExitCode } from './enrolltypes/EnrollError';
import { HostSpec } from './enrolltypes/HostSpec';
import { loadConfig } from './config';
import { CsrBuilder } from './crypto/csrBuilder';
import { BatchOrchestrator, formatSummary } from './batch/batchOrchestrator';
import { IssuerClient, IssuerHeaders, buildIssuerHeaders } from './issuer/issuerClient';
import { HttpsIssuerClient, TransportConfig } from './issuer/httpsIssuerClient';
import { testConnection } from './issuer/connectivity';
import { loadCredentials, resolveCredentialPaths } from './utility/credentials';
import { hostSpec, readHostFile } from './utility/hostFile';
import { Sleeper, sleep } from './utility/sleep';

const logger = log4js.getLogger('certbatch');

export const usage = `Usage: certbatch --username <login> (--hostname <cn> [--altname <san>]... | --hostfile <file>) [options]
       certbatch --username <login> --test [options]

  -n, --hostname <cn>     Request a certificate for one host
  -a, --altname <san>     Subject alternative name for --hostname (repeatable)
  -f, --hostfile <file>   Request certificates for every host in file
  -o, --outdir <dir>      Directory keys and certificates are written to
  -u, --username <login>  Issuer account login
  -c, --config <file>     YAML configuration merged over the defaults
      --usercert <pem>    User certificate (default $X509_USER_CERT or ~/.globus/usercert.pem)
      --userkey <pem>     User private key (default $X509_USER_KEY or ~/.globus/userkey.pem)
      --test              Only check that the issuer accepts the credentials
      --debug             Debug logging
  -h, --help              Show this text`;

export type CliOptions = {
    hostname?: string;
    altnames: string[];
    hostfile?: string;
    outdir?: string;
    usercert?: string;
    userkey?: string;
    username?: string;
    config?: string;
    test: boolean;
    debug: boolean;
    help: boolean;
};

/** Closable issuer client as created by the command line */
export type CliClient = IssuerClient & { close?: () => void };

/** Outside world the command line runs against */
export type CliEnvironment = {
    env: NodeJS.ProcessEnv;
    home: string;
    createClient: (headers: IssuerHeaders, transport: TransportConfig) => CliClient;
    wait: Sleeper;
};

const defaultEnvironment: CliEnvironment = {
    env: process.env,
    home: os.homedir(),
    createClient: (headers, transport) => new HttpsIssuerClient(headers, transport),
    wait: sleep,
};

const stringOptions = [ 'hostname', 'altname', 'hostfile', 'outdir', 'usercert', 'userkey', 'username', 'config' ];
const booleanOptions = [ 'test', 'debug', 'help' ];
const aliases: { [key: string]: string } = { n: 'hostname', a: 'altname', f: 'hostfile', o: 'outdir', u: 'username', c: 'config', h: 'help' };

/**
 * Parse and validate command line arguments.
 *
 * @param args Arguments without the node executable and script
 * @throws ArgumentError on unknown options or an invalid combination
 */
export function parseArgs(args: string[]): CliOptions {
    let unknown: string[] = [];
    let mArgs = minimist(args, {
        string: stringOptions,
        boolean: booleanOptions,
        alias: aliases,
        unknown: (arg) => {
            if (arg.startsWith('-')) unknown.push(arg);
            return true;
        },
    });

    if (unknown.length > 0) throw new ArgumentError(`Unknown option: ${unknown.join(' ')}`);
    if (mArgs['_'].length > 0) throw new ArgumentError(`Unexpected arguments: ${mArgs['_'].join(' ')}`);

    let single = (name: string): string | undefined => {
        let value: unknown = mArgs[name];
        if (value == undefined || value === '') return undefined;
        if (Array.isArray(value)) throw new ArgumentError(`--${name} may only be given once`);
        if (typeof value !== 'string') throw new ArgumentError(`--${name} must be a string`);
        return value;
    };

    let altValue: unknown = mArgs['altname'];
    let altList: unknown[] = Array.isArray(altValue) ? altValue : [ altValue ];
    let altnames: string[] = altList.filter((a): a is string => typeof a === 'string' && a.length > 0);

    let options: CliOptions = {
        hostname: single('hostname'),
        altnames: altnames,
        hostfile: single('hostfile'),
        outdir: single('outdir'),
        usercert: single('usercert'),
        userkey: single('userkey'),
        username: single('username'),
        config: single('config'),
        test: mArgs['test'] === true,
        debug: mArgs['debug'] === true,
        help: mArgs['help'] === true,
    };

    if (options.help) return options;

    if (!options.username) throw new ArgumentError('Missing required argument: --username');
    if (options.altnames.length > 0 && !options.hostname) throw new ArgumentError('--altname requires --hostname');
    if (!options.test && !options.hostname && !options.hostfile) throw new ArgumentError('Missing required argument: --hostname or --hostfile');

    return options;
}

/**
 * Set up log4js for the command line. Debug logging includes the requests made to the issuer.
 */
export function configureLogging(debug: boolean): void {
    log4js.configure({
        appenders: { out: { type: 'stdout', layout: { type: 'pattern', pattern: '%[[%d{hh:mm:ss}] [%p] %c -%] %m' } } },
        categories: { default: { appenders: [ 'out' ], level: debug ? 'debug' : 'info' } },
    });
}

async function collectHosts(options: CliOptions): Promise<HostSpec[]> {
    let hosts: HostSpec[] = [];

    if (options.hostname) {
        hosts.push(hostSpec(options.hostname, options.altnames));
    }

    if (options.hostfile) {
        hosts.push(...await readHostFile(options.hostfile));
    }

    if (hosts.length == 0) {
        throw new ArgumentError('No hosts were specified');
    }

    return hosts;
}

async function createClient(config: Readonly<Config>, options: CliOptions, environment: CliEnvironment): Promise<CliClient> {
    let credentials = await loadCredentials(resolveCredentialPaths({ cert: options.usercert, key: options.userkey }, environment.env, environment.home));
    logger.debug(`Using certificate ${credentials.cert} and key ${credentials.key}`);

    let headers = buildIssuerHeaders(config.issuer.contentType, options.username, config.issuer.customerUri);

    return environment.createClient(headers, {
        cert: credentials.certPem,
        key: credentials.keyPem,
        ca: config.issuer.ca,
        rejectUnauthorized: config.issuer.rejectUnauthorized ?? true,
        timeout: config.issuer.timeout,
    });
}

/**
 * Run the command line.
 *
 * @param args Arguments without the node executable and script
 * @param environment Replaced by tests
 * @returns The process exit code
 */
export async function main(args: string[], environment: CliEnvironment = defaultEnvironment): Promise<ExitCode> {
    let client: CliClient | undefined = undefined;

    try {
        let options = parseArgs(args);

        if (options.help) {
            console.log(usage);
            return ExitCode.Success;
        }

        configureLogging(options.debug);

        let config = await loadConfig(options.config, options.outdir ? { output: { directory: options.outdir } } : {});
        client = await createClient(config, options, environment);

        if (options.test) {
            let outcome = await testConnection(config, client);
            return outcome.status == 'connected' ? ExitCode.Success : ExitCode.ConnectivityFailed;
        }

        let hosts = await collectHosts(options);
        let orchestrator = new BatchOrchestrator({
            config: config,
            client: client,
            builder: new CsrBuilder(config.csr),
            wait: environment.wait,
        });
        let result = await orchestrator.run(hosts);

        logger.info(`Certificates: ${formatSummary(result)}`);

        return ExitCode.Success;
    }
    catch (err) {
        let enrollError = EnrollError.getEnrollError(err);

        if (enrollError.exitCode == ExitCode.BadArguments && err instanceof ArgumentError) {
            console.error(`${enrollError.message}\n\n${usage}`);
        }
        else {
            logger.error(enrollError.message);
            if (enrollError.exitCode == ExitCode.Unexpected && err instanceof Error) logger.debug(err.stack);
        }

        return enrollError.exitCode;
    }
    finally {
        client?.close?.();
    }
}
