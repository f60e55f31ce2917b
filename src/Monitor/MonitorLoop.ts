import { CHANNELS, type Channel, type PerChannel, perChannel } from '../Common/channels';
import type { IAudioCapture } from '../Audio/IAudioCapture';
import type { ConnectionManager } from '@mqtt/ConnectionManager';
import { describeError } from '@utils/errors';
import { createEpochClock } from '@utils/getUnixEpoch';
import { logInfo, logWarnDedup } from '@utils/logger';
import { PeriodicTask, type TickResult } from '@utils/PeriodicTask';
import { buildChannelMessage } from './channelMessage';
import { EdgeTrigger } from './EdgeTrigger';
import type { SharedStatus } from './SharedStatus';

export const CAPTURE_ERROR_COOLDOWN_MS = 1_000;

export type MonitorConnection = Pick<ConnectionManager, 'publish' | 'snapshot'>;

export interface MonitorLoopOptions {
  capture: IAudioCapture;
  connection: MonitorConnection;
  status: SharedStatus;
  threshold: number;
  topics: PerChannel<string>;
  intervalMs: number;
  errorCooldownMs?: number;
  /** Epoch seconds for message timestamps. */
  clock?: () => number;
}

/**
 * Samples both channels, publishes their state through the edge trigger and mirrors
 * everything into SharedStatus for the dashboard.
 */
export class MonitorLoop {
  private readonly triggers: PerChannel<EdgeTrigger> = perChannel(() => new EdgeTrigger());
  private readonly clock: () => number;
  private readonly task: PeriodicTask;

  constructor(private readonly options: MonitorLoopOptions) {
    this.clock = options.clock ?? createEpochClock();
    this.task = new PeriodicTask({
      name: 'Monitor',
      intervalMs: options.intervalMs,
      errorDelayMs: options.errorCooldownMs ?? CAPTURE_ERROR_COOLDOWN_MS,
      run: () => this.tick(),
    });
  }

  lastPublishedActive(channel: Channel): boolean {
    return this.triggers[channel].lastPublishedActive;
  }

  start() {
    logInfo(`[Monitor] Started (threshold ${this.options.threshold}, every ${this.options.intervalMs}ms)`);
    this.task.start();
  }

  stop(graceMs?: number): Promise<void> {
    return this.task.stop(graceMs);
  }

  async tick(): Promise<TickResult> {
    const { connection, status, threshold, topics } = this.options;
    const [left, right] = await Promise.all(CHANNELS.map((channel) => this.readChannel(channel)));
    const readings: PerChannel<number | undefined> = { left, right };
    const timestamp = this.clock();

    const views = perChannel((channel) => {
      const level = readings[channel] ?? 0;
      const active = level > threshold;
      if (this.triggers[channel].evaluate(active)) {
        connection.publish(topics[channel], buildChannelMessage(active, level, timestamp));
      }
      return { level, active };
    });

    status.updateChannels(views);
    status.updateConnection(connection.snapshot());

    if (left === undefined || right === undefined) {
      return { delayMs: this.options.errorCooldownMs ?? CAPTURE_ERROR_COOLDOWN_MS };
    }
  }

  /** `undefined` when the channel could not be read this tick. */
  private async readChannel(channel: Channel): Promise<number | undefined> {
    try {
      return await this.options.capture.readLevel(channel);
    } catch (error) {
      const message = `Error reading ${channel} microphone: ${describeError(error)}`;
      logWarnDedup(`capture:${channel}`, 30_000, `[Monitor] ${message}`);
      this.options.status.reportError('capture', message);
      return undefined;
    }
  }
}
