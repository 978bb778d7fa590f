/**
 * Millisecond time source. Injected so tests can drive time explicitly.
 */
export type Clock = () => number;

export const CLOCK = Symbol('CLOCK');

export const systemClock: Clock = () => Date.now();
