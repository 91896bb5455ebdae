import http from 'http';
import https from 'https';
import * as log4js from 'log4js';

import { TransportError, TransportErrorKind } from '../enrolltypes/EnrollError';
import { IssuerClient, IssuerHeaders, IssuerResponse } from './issuerClient';

const logger = log4js.getLogger('issuer');

/** Client side TLS settings, fixed for the lifetime of the client */
export type TransportConfig = {
    /** User certificate in PEM format */
    cert: string;
    /** User private key in PEM format */
    key: string;
    /** Extra trust anchors for the issuer's server certificate */
    ca?: string;
    rejectUnauthorized: boolean;
    /** Milliseconds before a request is abandoned */
    timeout: number;
};

const authenticationCodes = new Set<string>([
    'EPROTO',
    'ERR_SSL_SSLV3_ALERT_BAD_CERTIFICATE',
    'ERR_SSL_SSLV3_ALERT_CERTIFICATE_UNKNOWN',
    'ERR_SSL_SSLV3_ALERT_HANDSHAKE_FAILURE',
    'ERR_SSL_TLSV13_ALERT_CERTIFICATE_REQUIRED',
    'ERR_SSL_TLSV1_ALERT_UNKNOWN_CA',
    'ERR_SSL_TLSV1_ALERT_ACCESS_DENIED',
    'ERR_TLS_CERT_ALTNAME_INVALID',
    'CERT_HAS_EXPIRED',
    'CERT_NOT_YET_VALID',
    'DEPTH_ZERO_SELF_SIGNED_CERT',
    'SELF_SIGNED_CERT_IN_CHAIN',
    'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
    'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
]);

/**
 * Sort a low level request error into one of the two transport failure kinds.
 *
 * @param err Error emitted by the request or its socket
 */
export function classifyTransportError(err: Error): TransportError {
    let code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    let kind: TransportErrorKind = code != undefined && (authenticationCodes.has(code) || code.startsWith('ERR_SSL_') || code.startsWith('ERR_TLS_'))
        ? 'authentication'
        : 'connection';

    return new TransportError(kind, `${kind} failure: ${err.message}`, code);
}

/**
 * Issuer client over HTTPS that authenticates with the user's certificate.
 */
export class HttpsIssuerClient implements IssuerClient {
    private readonly _headers: IssuerHeaders;
    private readonly _agent: https.Agent;
    private readonly _timeout: number;

    /**
     * @constructor
     * @param headers Sent unchanged with every request
     * @param transport Client certificate and TLS options
     */
    constructor(headers: IssuerHeaders, transport: TransportConfig) {
        this._headers = headers;
        this._timeout = transport.timeout;
        this._agent = new https.Agent({
            cert: transport.cert,
            key: transport.key,
            ca: transport.ca,
            rejectUnauthorized: transport.rejectUnauthorized,
            keepAlive: true,
        });
    }

    public async get(url: string): Promise<IssuerResponse> {
        return this._request('GET', url);
    }

    public async post(url: string, payload: unknown): Promise<IssuerResponse> {
        return this._request('POST', url, JSON.stringify(payload));
    }

    /** Release pooled sockets so the process can exit */
    public close(): void {
        this._agent.destroy();
    }

    private _request(method: 'GET' | 'POST', url: string, body?: string): Promise<IssuerResponse> {
        return new Promise<IssuerResponse>((resolve, reject) => {
            let urlObject: URL;

            try {
                urlObject = new URL(url);
            }
            catch (_err) {
                return reject(new TransportError('connection', `Invalid url ${url}`));
            }

            let headers: http.OutgoingHttpHeaders = { ...this._headers };

            if (body != undefined) {
                headers['Content-Length'] = Buffer.byteLength(body);
            }

            if (urlObject.protocol != 'https:') {
                return reject(new TransportError('connection', `Issuer url must use https: ${url}`));
            }

            logger.debug(`${method} ${url}`);

            const clientRequest = https.request(urlObject, {
                method: method,
                headers: headers,
                agent: this._agent,
                timeout: this._timeout,
            }, (incomingMessage) => {
                let chunks: Buffer[] = [];

                incomingMessage.on('data', (chunk: Buffer) => chunks.push(chunk));
                incomingMessage.on('error', (err) => reject(classifyTransportError(err)));
                incomingMessage.on('end', () => {
                    let response: IssuerResponse = {
                        statusCode: incomingMessage.statusCode ?? 0,
                        headers: incomingMessage.headers,
                        body: Buffer.concat(chunks).toString('utf8'),
                    };
                    logger.debug(`${method} ${url} returned ${response.statusCode}`);
                    resolve(response);
                });
            });

            clientRequest.on('timeout', () => {
                clientRequest.destroy(Object.assign(new Error(`Request timed out after ${this._timeout}ms`), { code: 'ETIMEDOUT' }));
            });
            clientRequest.on('error', (err) => reject(classifyTransportError(err)));

            if (body != undefined) {
                clientRequest.write(body);
            }

            clientRequest.end();
        });
    }
}
