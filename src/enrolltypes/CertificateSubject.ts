/**
 * Optional subject fields placed ahead of the common name in every request
 */
export type SubjectFields = {
    /** Country - must be two characters */
    C?: string;
    /** State or province */
    ST?: string;
    /** Location (city/town) */
    L?: string;
    /** Organization */
    O?: string;
    /** Organizational unit */
    OU?: string;
};
