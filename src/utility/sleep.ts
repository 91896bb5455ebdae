export type Sleeper = (milliseconds: number) => Promise<void>;

/** Resolve after the given number of milliseconds */
export const sleep: Sleeper = (milliseconds: number) =>
    new Promise<void>((resolve) => setTimeout(() => resolve(), milliseconds));
