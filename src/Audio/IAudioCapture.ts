import type { Channel } from '../Common/channels';

export interface IAudioCapture {
  /** Start streaming from both devices. Safe to call more than once. */
  open(): void;
  /**
   * Most recent level for `channel` (mean absolute sample value, >= 0).
   * Rejects with `CaptureError` when the channel cannot be read.
   */
  readLevel(channel: Channel): Promise<number>;
  /** Release devices and child processes. Safe to call more than once. */
  close(): void;
}
