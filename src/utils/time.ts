/** Millisecond clock; services take one so tests can move time. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export const isoNow = (): string => new Date().toISOString();
