/** Source of the current time, injectable for tests */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
