import { Config } from './enrolltypes/Config';

export const defaultConfig: Config = {
    issuer: {
        baseUrl: 'https://cert-manager.com/api/ssl/v1/',
        listingPath: 'types',
        enrollPath: 'enroll',
        retrievePath: 'collect/',
        formatSuffix: '/x509CO',
        customerUri: 'InCommon',
        contentType: 'application/json',
        orgId: 0,
        certTypes: {
            singleDomain: 215,
            multiDomain: 226,
        },
        serverType: -1,
        term: 365,
        timeout: 60000,
        rejectUnauthorized: true,
    },
    csr: {
        keySize: 2048,
        subject: {},
    },
    output: {
        directory: '.',
    },
    timing: {
        maxRetry: 20,
        retrievalWait: 5000,
        approvalWait: 30000,
    },
};
