export type ExtensionParentObject = {
    name: string;
    critical?: boolean;
};

/**
 * Base for the extensions placed in a certificate request's extensionRequest attribute
 */
export abstract class ExtensionParent<T extends ExtensionParentObject = ExtensionParentObject> {
    protected abstract _options: T;
    /** The object node-forge expects in an extensions array */
    getObject(): T {
        return this._options;
    }
    /** Multi-line description for debug output */
    abstract toString(): string;
}
