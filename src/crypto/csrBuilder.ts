import { md, pki } from 'node-forge';
import * as log4js from 'log4js';

import { CertificateRequest } from '../enrolltypes/CertificateRequest';
import { SubjectFields } from '../enrolltypes/CertificateSubject';
import { CryptoError } from '../enrolltypes/EnrollError';
import { ExtensionSubjectAltName } from '../extensions/ExtensionSubjectAltName';

const logger = log4js.getLogger('csr');

export type CsrBuilderOptions = {
    keySize: number;
    subject?: SubjectFields;
};

// Printable ASCII without blanks - names outside this must be punycoded before use
const printableName = /^[\x21-\x7e]+$/;
const dnsLabel = '[A-Za-z0-9_](?:[A-Za-z0-9_-]{0,61}[A-Za-z0-9_])?';
const dnsName = new RegExp(`^(?:\\*\\.)?${dnsLabel}(?:\\.${dnsLabel})*\\.?$`);
const subjectOrder: (keyof SubjectFields)[] = [ 'C', 'ST', 'L', 'O', 'OU' ];

/**
 * Generates key pairs and signing requests for hosts.
 */
export class CsrBuilder {
    private _keySize: number;
    private _subject: SubjectFields;

    constructor(options: CsrBuilderOptions) {
        this._keySize = options.keySize;
        this._subject = options.subject ?? {};
    }

    /**
     * Generate a key pair and a signing request for one host.
     *
     * @param commonName Becomes the subject's CN exactly as given
     * @param altNames Subject alternative names, in the order they should appear
     * @returns The request, not yet submitted
     * @throws CryptoError when a name cannot be encoded or key generation fails
     */
    public build(commonName: string, altNames: readonly string[] = []): CertificateRequest {
        if (!commonName || !printableName.test(commonName)) {
            throw new CryptoError(`Invalid common name '${commonName}'`);
        }

        for (let name of altNames) {
            if (!dnsName.test(name) && !ExtensionSubjectAltName.isIPAddress(name)) {
                throw new CryptoError(`Invalid subject alternative name '${name}' for ${commonName}`);
            }
        }

        let subject: pki.CertificateField[] = [
            ...subjectOrder
                .filter((shortName) => this._subject[shortName])
                .map((shortName) => ({ shortName, value: this._subject[shortName] })),
            { shortName: 'CN', value: commonName },
        ];

        try {
            logger.debug(`Generating ${this._keySize} bit key for ${commonName}`);
            let keys = pki.rsa.generateKeyPair({ bits: this._keySize, e: 0x10001 });
            let csr = pki.createCertificationRequest();
            csr.publicKey = keys.publicKey;
            csr.setSubject(subject);

            if (altNames.length > 0) {
                let san = new ExtensionSubjectAltName(altNames);
                logger.debug(`Extension for ${commonName}\r\n${san.toString()}`);
                let extensionRequest = { name: 'extensionRequest', extensions: [ san.getObject() ] };
                csr.addAttribute(extensionRequest);
            }

            csr.sign(keys.privateKey, md.sha256.create());

            return {
                commonName: commonName,
                altNames: [ ...altNames ],
                subject: CsrBuilder.subjectToString(subject),
                privateKey: keys.privateKey,
                csr: csr,
                csrPem: pki.certificationRequestToPem(csr),
            };
        }
        catch (err) {
            throw new CryptoError(`Unable to create signing request for ${commonName}: ${err instanceof Error ? err.message : err}`);
        }
    }

    /**
     * Render subject fields as "O=Org, CN=name".
     */
    public static subjectToString(fields: pki.CertificateField[]): string {
        return fields.map((f) => `${f.shortName}=${f.value}`).join(', ');
    }

    /**
     * Pull the common name back out of a subject string produced by subjectToString.
     *
     * @returns The CN value, or null when the subject has none
     */
    public static commonNameOf(subject: string): string | null {
        let cn = subject.split(', ').reverse().find((part) => part.startsWith('CN='));
        return cn ? cn.slice(3) : null;
    }

    /**
     * Read the subject alternative names back from a signing request.
     */
    public static getAltNames(csr: pki.CertificateSigningRequest): string[] {
        let extensionRequest = csr.getAttribute({ name: 'extensionRequest' });
        let extensions: unknown[] = extensionRequest && 'extensions' in extensionRequest && Array.isArray(extensionRequest.extensions)
            ? extensionRequest.extensions
            : [];
        let san = extensions.find(isSubjectAltName);

        return san ? san.altNames.map((entry) => entry.ip ?? entry.value ?? '') : [];
    }
}

type ParsedAltNames = { name: 'subjectAltName', altNames: { value?: string, ip?: string }[] };

function isSubjectAltName(e: unknown): e is ParsedAltNames {
    return typeof e === 'object'
        && e !== null
        && 'name' in e
        && e.name === ExtensionSubjectAltName.extensionName
        && 'altNames' in e
        && Array.isArray(e.altNames);
}
