/**
 * Injectable wall clock. Services take one so window and expiry logic can be driven in tests.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
