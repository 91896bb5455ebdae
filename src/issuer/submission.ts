import * as log4js from 'log4js';

import { Config } from '../enrolltypes/Config';
import { TransportError } from '../enrolltypes/EnrollError';
import { SubmitOutcome } from '../enrolltypes/Outcomes';
import { IssuerClient, IssuerResponse, issuerUrl } from './issuerClient';

const logger = log4js.getLogger('submit');

/** Body posted to the enroll endpoint */
export type EnrollmentPayload = {
    csr: string;
    orgId: number;
    certType: number;
    numberServers: number;
    serverType: number;
    term: number;
    comments: string;
    subjAltNames?: string;
};

/**
 * Build the enrollment body. The certificate type depends on whether the request
 * carries alternative names.
 */
export function buildEnrollmentPayload(config: Readonly<Config>, subject: string, csrPem: string, sans: readonly string[] = []): EnrollmentPayload {
    let payload: EnrollmentPayload = {
        csr: csrPem,
        orgId: config.issuer.orgId,
        certType: sans.length > 0 ? config.issuer.certTypes.multiDomain : config.issuer.certTypes.singleDomain,
        numberServers: 0,
        serverType: config.issuer.serverType,
        term: config.issuer.term,
        comments: `certbatch request for ${subject}`,
    };

    if (sans.length > 0) {
        payload.subjAltNames = sans.join(',');
    }

    return payload;
}

/**
 * Post one enrollment request.
 *
 * @param config Issuer settings
 * @param client Issuer client
 * @param subject Subject string, echoed in the request comment
 * @param csrPem Wire encoded signing request
 * @param sans Alternative names carried by the request
 * @returns Submitted with the enrollment id, Rejected for any other answer, or the transport failure
 */
export async function submit(config: Readonly<Config>, client: IssuerClient, subject: string, csrPem: string, sans: readonly string[] = []): Promise<SubmitOutcome> {
    let url = issuerUrl(config.issuer.baseUrl, config.issuer.enrollPath);
    let response: IssuerResponse;

    try {
        response = await client.post(url, buildEnrollmentPayload(config, subject, csrPem, sans));
    }
    catch (err) {
        if (err instanceof TransportError) {
            logger.error(`Enrollment for ${subject} failed: ${err.message}`);
            return { status: 'transportError', kind: err.kind, error: err };
        }
        throw err;
    }

    if (response.statusCode != 200) {
        logger.warn(`Enrollment for ${subject} rejected with status ${response.statusCode}`);
        logger.debug(response.body);
        return { status: 'rejected', httpStatus: response.statusCode, reason: response.body };
    }

    let enrollmentId = extractEnrollmentId(response.body);

    if (enrollmentId == null) {
        logger.warn(`Enrollment for ${subject} returned no sslId`);
        return { status: 'rejected', httpStatus: response.statusCode, reason: 'Response did not contain an sslId' };
    }

    logger.info(`Submitted ${subject} - enrollment id ${enrollmentId}`);

    return { status: 'submitted', enrollmentId: enrollmentId };
}

function extractEnrollmentId(body: string): string | null {
    let parsed: unknown;

    try {
        parsed = JSON.parse(body);
    }
    catch (_err) {
        return null;
    }

    if (typeof parsed !== 'object' || parsed === null || !('sslId' in parsed)) {
        return null;
    }

    let sslId = parsed.sslId;

    return (typeof sslId === 'number' && Number.isFinite(sslId)) || (typeof sslId === 'string' && sslId.length > 0)
        ? String(sslId)
        : null;
}
