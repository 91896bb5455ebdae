import { pki } from 'node-forge';
import * as log4js from 'log4js';

import { CertificateRequest, EnrollmentRecord } from '../enrolltypes/CertificateRequest';
import { Config } from '../enrolltypes/Config';
import { HostSpec } from '../enrolltypes/HostSpec';
import { BatchResult, HostOutcome, HostState } from '../enrolltypes/Outcomes';
import { CsrBuilder } from '../crypto/csrBuilder';
import { ArgumentError } from '../enrolltypes/EnrollError';
import { IssuerClient } from '../issuer/issuerClient';
import { submit } from '../issuer/submission';
import { retrieve } from '../issuer/retrieval';
import { FileOps, defaultFileOps, writeFileAtomic } from '../utility/atomicWrite';
import { certificateFilename, ensureOutputDirectory, keyFilename, relocateExisting, sanitizeName } from '../utility/outputFiles';
import { dedupeHostSpecs } from '../utility/hostFile';
import { Sleeper, sleep } from '../utility/sleep';

const logger = log4js.getLogger('batch');

export type BatchOrchestratorOptions = {
    config: Readonly<Config>;
    client: IssuerClient;
    builder: CsrBuilder;
    /** Used for the approval wait and the pauses between retrieval attempts */
    wait?: Sleeper;
    fileOps?: FileOps;
};

/**
 * Runs a batch of hosts through key generation, enrollment, the approval wait and retrieval,
 * writing keys and certificates to the output directory.
 */
export class BatchOrchestrator {
    private readonly _config: Readonly<Config>;
    private readonly _client: IssuerClient;
    private readonly _builder: CsrBuilder;
    private readonly _wait: Sleeper;
    private readonly _fileOps: FileOps;

    constructor(options: BatchOrchestratorOptions) {
        this._config = options.config;
        this._client = options.client;
        this._builder = options.builder;
        this._wait = options.wait ?? sleep;
        this._fileOps = options.fileOps ?? defaultFileOps;
    }

    /**
     * Process a batch. Duplicate hosts are requested once.
     *
     * @param hosts Hosts to request certificates for
     * @returns Counts and per host outcomes
     * @throws ArgumentError if two hosts would be written to the same files
     * @throws CryptoError if any request cannot be built - nothing has been submitted at that point
     * @throws TransportError if the issuer cannot be reached or refuses our credentials during submission
     * @throws OutputError if a key or certificate cannot be written
     */
    public async run(hosts: readonly HostSpec[]): Promise<BatchResult> {
        let directory = this._config.output.directory;
        let unique = dedupeHostSpecs(hosts);

        if (unique.length < hosts.length) {
            logger.info(`Ignored ${hosts.length - unique.length} duplicate host entries`);
        }

        checkFilenameCollisions(unique);
        await ensureOutputDirectory(directory);

        let requests: CertificateRequest[] = unique.map((host) => this._builder.build(host.commonName, host.altNames));
        logger.info(`Built ${requests.length} signing requests`);

        let result: BatchResult = { requested: requests.length, submitted: 0, retrieved: 0, hosts: [] };
        let enrollments: { record: EnrollmentRecord, request: CertificateRequest, outcome: HostOutcome }[] = [];

        for (let request of requests) {
            let outcome: HostOutcome = { commonName: request.commonName, state: HostState.Rejected };
            result.hosts.push(outcome);

            let submitted = await submit(this._config, this._client, request.subject, request.csrPem, request.altNames);

            if (submitted.status == 'transportError') {
                throw submitted.error;
            }

            if (submitted.status == 'rejected') {
                continue;
            }

            request.enrollmentId = submitted.enrollmentId;
            request.keyPath = keyFilename(directory, request.commonName);

            let keyRelocated = await relocateExisting(request.keyPath, this._fileOps);
            await writeFileAtomic(request.keyPath, pki.privateKeyToPem(request.privateKey), { mode: 0o600, fileOps: this._fileOps });
            logger.info(`Written key ${request.keyPath}`);

            outcome.state = HostState.NotRetrieved;
            outcome.enrollmentId = submitted.enrollmentId;
            outcome.keyPath = request.keyPath;
            if (keyRelocated) outcome.keyRelocatedTo = keyRelocated;
            enrollments.push({ record: { enrollmentId: submitted.enrollmentId, subject: request.subject }, request: request, outcome: outcome });
            result.submitted++;
        }

        if (enrollments.length == 0) {
            logger.warn('No requests were accepted by the issuer');
            return result;
        }

        logger.info(`Waiting ${this._config.timing.approvalWait / 1000} seconds for approval of ${enrollments.length} requests`);
        await this._wait(this._config.timing.approvalWait);

        for (let { record, request, outcome } of enrollments) {
            let retrieved = await retrieve(this._config, this._client, record.enrollmentId, this._wait);

            if (retrieved.status == 'exhausted') {
                logger.error(`Certificate for ${record.subject} was not retrieved after ${retrieved.attempts} attempts` +
                    (retrieved.lastStatus == undefined ? ' - no response from issuer' : ` - last status ${retrieved.lastStatus}`));
                continue;
            }

            if (retrieved.document.trim() == '') {
                logger.error(`Issuer returned an empty certificate for ${record.subject} (enrollment ${record.enrollmentId})`);
                continue;
            }

            let certificatePath = certificateFilename(directory, CsrBuilder.commonNameOf(record.subject) ?? outcome.commonName);
            let relocated = await relocateExisting(certificatePath, this._fileOps);

            await writeFileAtomic(certificatePath, retrieved.document, { fileOps: this._fileOps });
            logger.info(`Written certificate ${certificatePath}`);

            request.certificatePath = certificatePath;
            outcome.state = HostState.Retrieved;
            outcome.certificatePath = certificatePath;
            if (relocated) outcome.relocatedTo = relocated;
            result.retrieved++;
        }

        return result;
    }
}

/**
 * Output files are named after the sanitized common name, so two hosts that differ only
 * in their alternative names, or in characters the sanitizing replaces, cannot share a batch.
 */
function checkFilenameCollisions(hosts: readonly HostSpec[]): void {
    let seen = new Map<string, string>();

    for (let host of hosts) {
        let name = sanitizeName(host.commonName);
        let earlier = seen.get(name);

        if (earlier != undefined) {
            throw new ArgumentError(`Hosts ${earlier} and ${host.commonName} would both be written to ${name}.pem - request them in separate runs`);
        }

        seen.set(name, host.commonName);
    }
}

/** The closing line of a run, e.g. "3 specified / 2 retrieved" */
export function formatSummary(result: BatchResult): string {
    return `${result.requested} specified / ${result.retrieved} retrieved`;
}
