export const CLOCK = 'CLOCK';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
