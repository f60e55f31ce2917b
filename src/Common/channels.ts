export type Channel = 'left' | 'right';

export const CHANNELS: readonly Channel[] = ['left', 'right'];

export type PerChannel<T> = Record<Channel, T>;

export const perChannel = <T>(build: (channel: Channel) => T): PerChannel<T> => ({
  left: build('left'),
  right: build('right'),
});
