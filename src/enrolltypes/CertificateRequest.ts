import { pki } from 'node-forge';

/**
 * A single host's request while it is in flight. The private key belongs to this
 * record until it has been written to the output directory.
 */
export type CertificateRequest = {
    readonly commonName: string;
    readonly altNames: readonly string[];
    /** Subject rendered as a string, e.g. "O=Example, CN=host.example.org" */
    readonly subject: string;
    readonly privateKey: pki.rsa.PrivateKey;
    readonly csr: pki.CertificateSigningRequest;
    /** The CSR in the wire encoding the issuer expects (PEM) */
    readonly csrPem: string;
    /** Assigned once the issuer accepts the enrollment */
    enrollmentId?: string;
    keyPath?: string;
    certificatePath?: string;
};

/** Pairs an enrollment id with the subject it was requested for */
export type EnrollmentRecord = {
    readonly enrollmentId: string;
    readonly subject: string;
};
