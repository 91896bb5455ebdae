/**
 * One host to request a certificate for. The common name is first, then the
 * subject alternative names in the order they were given.
 */
export type HostSpec = {
    readonly commonName: string;
    readonly altNames: readonly string[];
};
