import * as log4js from 'log4js';

import { Config } from '../enrolltypes/Config';
import { TransportError } from '../enrolltypes/EnrollError';
import { ConnectivityOutcome } from '../enrolltypes/Outcomes';
import { IssuerClient, issuerUrl } from './issuerClient';

const logger = log4js.getLogger('issuer');

/**
 * Fetch the listing endpoint to check that the issuer accepts our credentials.
 */
export async function testConnection(config: Readonly<Config>, client: IssuerClient): Promise<ConnectivityOutcome> {
    let url = issuerUrl(config.issuer.baseUrl, config.issuer.listingPath);

    try {
        let response = await client.get(url);

        if (response.statusCode == 200) {
            logger.info(`Connected to ${url}`);
            return { status: 'connected', httpStatus: response.statusCode };
        }

        logger.error(`Connection test to ${url} returned status ${response.statusCode}`);
        return { status: 'rejected', httpStatus: response.statusCode };
    }
    catch (err) {
        if (err instanceof TransportError) {
            logger.error(`Connection test to ${url} failed: ${err.message}`);
            return { status: 'transportError', kind: err.kind, error: err };
        }
        throw err;
    }
}
