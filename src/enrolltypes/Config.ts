import { SubjectFields } from './CertificateSubject';

/**
 * Represents the configuration options for certbatch.
 */
export type Config = {
    issuer: {
        /** Base URL of the issuer's SSL API - default https://cert-manager.com/api/ssl/v1/ */
        baseUrl: string;
        /** Path fetched by the connectivity test */
        listingPath: string;
        /** Path enrollments are posted to */
        enrollPath: string;
        /** Prefix the enrollment id is appended to when collecting a certificate */
        retrievePath: string;
        /** Appended after the enrollment id - selects the certificate format */
        formatSuffix: string;
        /** Tenant identifier sent as the customerUri header */
        customerUri: string;
        /** Sent as the Content-type header */
        contentType: string;
        /** Organization (or department) id - required */
        orgId: number;
        certTypes: {
            /** Certificate type code used when the request has no alternative names */
            singleDomain: number;
            /** Certificate type code used when the request has alternative names */
            multiDomain: number;
        };
        serverType: number;
        /** Validity term in days */
        term: number;
        /** Per request timeout in milliseconds */
        timeout: number;
        /** When false the issuer's server certificate is not verified - default true */
        rejectUnauthorized?: boolean;
        /** Extra CA bundle used to verify the issuer - default none */
        ca?: string;
    };
    csr: {
        keySize: number;
        subject: SubjectFields;
    };
    output: {
        directory: string;
    };
    timing: {
        /** Maximum number of retrieval attempts per certificate */
        maxRetry: number;
        /** Milliseconds between retrieval attempts */
        retrievalWait: number;
        /** Milliseconds waited once after the whole batch is submitted */
        approvalWait: number;
    };
};
