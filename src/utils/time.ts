import dayjs from 'dayjs';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const toIsoString = (value: Date): string => dayjs(value).toISOString();

export const nowIso = (clock: Clock): string => toIsoString(clock());

export const isOlderThan = (value: Date, seconds: number, clock: Clock): boolean =>
  dayjs(clock()).diff(dayjs(value), 'millisecond') >= seconds * 1000;

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
