import { isIP } from 'net';
import { ExtensionParent, ExtensionParentObject } from './ExtensionParent';

/** GeneralName tags used by node-forge */
export enum AltNameType { DNS = 2, IP = 7 };

export type SubjectAltName = {
    type: AltNameType,
    value?: string,
    ip?: string,
}

type ExtensionSubjectAltNameObject = ExtensionParentObject & { altNames: SubjectAltName[] }

export class ExtensionSubjectAltName extends ExtensionParent<ExtensionSubjectAltNameObject> {
    static readonly extensionName: string = 'subjectAltName';
    protected _options: ExtensionSubjectAltNameObject;
    /**
     * @constructor
     * @param names Host names or IP addresses, kept in the order given
     */
    constructor(names: readonly string[]) {
        super();
        this._options = {
            name: ExtensionSubjectAltName.extensionName,
            altNames: names.map((name) => ExtensionSubjectAltName.isIPAddress(name)
                ? { type: AltNameType.IP, ip: name }
                : { type: AltNameType.DNS, value: name })
        };
    }

    static isIPAddress(name: string): boolean {
        return isIP(name) != 0;
    }

    toString(): string {
        let alts: string = this._options.altNames.map((entry) => {
            return entry.type == AltNameType.DNS
                ? `DNS:${entry.value}`
                : `IP:${entry.ip}`;
        }).join(', ');
        return '            Name: ' + this._options.name + '\r\n                ' + alts;
    }
}
