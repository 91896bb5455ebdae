import { TransportError, TransportErrorKind } from './EnrollError';

export type TransportFailure = {
    status: 'transportError';
    kind: TransportErrorKind;
    error: TransportError;
};

/** Result of posting one enrollment */
export type SubmitOutcome =
    | { status: 'submitted'; enrollmentId: string }
    | { status: 'rejected'; httpStatus: number; reason: string }
    | TransportFailure;

/** Result of polling for one signed certificate */
export type RetrieveOutcome =
    | { status: 'success'; document: string; attempts: number }
    /** lastStatus is absent when no attempt produced a response at all */
    | { status: 'exhausted'; attempts: number; lastStatus?: number };

/** Result of the connectivity test */
export type ConnectivityOutcome =
    | { status: 'connected'; httpStatus: number }
    | { status: 'rejected'; httpStatus: number }
    | TransportFailure;

export enum HostState { Rejected, Retrieved, NotRetrieved };

export type HostOutcome = {
    commonName: string;
    state: HostState;
    enrollmentId?: string;
    keyPath?: string;
    /** Path an older key was moved to before the new one was written */
    keyRelocatedTo?: string;
    certificatePath?: string;
    /** Path an older certificate was moved to before the new one was written */
    relocatedTo?: string;
};

export type BatchResult = {
    requested: number;
    submitted: number;
    retrieved: number;
    hosts: HostOutcome[];
};
