import * as log4js from 'log4js';

import { Config } from '../enrolltypes/Config';
import { TransportError } from '../enrolltypes/EnrollError';
import { RetrieveOutcome } from '../enrolltypes/Outcomes';
import { Sleeper, sleep } from '../utility/sleep';
import { IssuerClient, issuerUrl } from './issuerClient';

const logger = log4js.getLogger('retrieve');

/**
 * Poll the issuer for a signed certificate.
 *
 * Makes at most timing.maxRetry attempts and waits timing.retrievalWait after every
 * attempt that does not return the certificate, the last one included. Authentication
 * and connection failures count as an attempt and are otherwise ignored.
 *
 * @param config Issuer and timing settings
 * @param client Issuer client
 * @param enrollmentId Id returned when the request was submitted
 * @param wait Used for the pause between attempts
 */
export async function retrieve(config: Readonly<Config>, client: IssuerClient, enrollmentId: string, wait: Sleeper = sleep): Promise<RetrieveOutcome> {
    let url = issuerUrl(config.issuer.baseUrl, config.issuer.retrievePath, enrollmentId, config.issuer.formatSuffix);
    let lastStatus: number | undefined = undefined;
    let attempts = 0;

    while (attempts < config.timing.maxRetry) {
        attempts++;

        try {
            let response = await client.get(url);

            if (response.statusCode == 200) {
                logger.info(`Retrieved certificate for enrollment ${enrollmentId} on attempt ${attempts}`);
                return { status: 'success', document: response.body, attempts: attempts };
            }

            lastStatus = response.statusCode;
            logger.debug(`Enrollment ${enrollmentId} attempt ${attempts}: status ${response.statusCode}`);
        }
        catch (err) {
            if (!(err instanceof TransportError)) {
                throw err;
            }
            logger.debug(`Enrollment ${enrollmentId} attempt ${attempts}: ${err.message}`);
        }

        await wait(config.timing.retrievalWait);
    }

    logger.warn(`Gave up on enrollment ${enrollmentId} after ${attempts} attempts`);

    return lastStatus == undefined
        ? { status: 'exhausted', attempts: attempts }
        : { status: 'exhausted', attempts: attempts, lastStatus: lastStatus };
}
