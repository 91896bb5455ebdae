export type IssuerResponse = {
    statusCode: number;
    headers: Readonly<Record<string, string | string[] | undefined>>;
    body: string;
};

/**
 * Request/response contract the enrollment engines depend on. Implementations throw
 * TransportError when no HTTP response could be obtained.
 */
export interface IssuerClient {
    get(url: string): Promise<IssuerResponse>;
    post(url: string, payload: unknown): Promise<IssuerResponse>;
}

/** Headers sent with every request to the issuer */
export type IssuerHeaders = Readonly<{
    'Content-type': string;
    login: string;
    customerUri: string;
}>;

/**
 * Build the header map once for a client. Values are coerced to strings.
 */
export function buildIssuerHeaders(contentType: unknown, login: unknown, customerUri: unknown): IssuerHeaders {
    return Object.freeze({
        'Content-type': String(contentType),
        login: String(login),
        customerUri: String(customerUri),
    });
}

/**
 * Join the issuer base URL with a relative path.
 */
export function issuerUrl(baseUrl: string, ...parts: (string | number)[]): string {
    let base = baseUrl.endsWith('/') ? baseUrl : baseUrl + '/';
    let rest = parts.map(String).join('');
    return base + (rest.startsWith('/') ? rest.slice(1) : rest);
}
