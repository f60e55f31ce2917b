import { ExponentialBackoff } from '@utils/backoff';
import { TransportError, describeError } from '@utils/errors';
import { logDebug, logInfo, logWarn } from '@utils/logger';
import { withTimeout } from '@utils/wait';
import EventEmitter from 'events';
import type { IMQTTConnection, PublishCallback, PublishOptions, QoS, ReconnectWindow } from './IMQTTConnection';

/** The slice of mqtt.js's `MqttClient` this wrapper drives. */
export interface MQTTClientHandle {
  readonly connected: boolean;
  on(event: 'connect', listener: () => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'offline', listener: () => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  publish(
    topic: string,
    message: string,
    options: { qos: QoS; retain: boolean },
    callback: (error?: Error) => void
  ): unknown;
  end(force: boolean, callback?: () => void): unknown;
  reconnect(): unknown;
  removeAllListeners(): unknown;
}

export class MQTTConnection extends EventEmitter implements IMQTTConnection {
  private readonly backoff: ExponentialBackoff;
  private reconnectTimer?: NodeJS.Timeout;
  private hasConnected = false;
  private closing = false;
  private lastErrorMessage?: string;

  constructor(
    private client: MQTTClientHandle,
    readonly clientId: string,
    reconnect: ReconnectWindow
  ) {
    super();
    this.backoff = new ExponentialBackoff({
      initialDelayMs: reconnect.minDelayMs,
      maxDelayMs: reconnect.maxDelayMs,
    });

    client.on('connect', () => {
      this.hasConnected = true;
      this.lastErrorMessage = undefined;
      this.backoff.reset();
      this.emit('connect');
    });

    client.on('error', (error) => {
      this.lastErrorMessage = error.message;
      this.emit('error', error);
    });

    client.on('offline', () => logDebug(`[MQTT] Client ${clientId} went offline`));

    client.on('close', () => {
      if (this.closing) return;
      this.emit('close', this.lastErrorMessage ?? 'connection closed');
      this.scheduleReconnect();
    });
  }

  isConnected(): boolean {
    return this.client.connected && !this.closing;
  }

  publish(topic: string, message: string | object, options?: PublishOptions, callback?: PublishCallback): boolean {
    if (!this.isConnected()) return false;

    const payload = typeof message === 'string' ? message : JSON.stringify(message);
    try {
      this.client.publish(
        topic,
        payload,
        { qos: options?.qos ?? 0, retain: options?.retain ?? false },
        (error) => callback?.(error)
      );
      return true;
    } catch (error) {
      callback?.(new TransportError(`Publish to ${topic} failed: ${describeError(error)}`, { cause: error }));
      return false;
    }
  }

  async end(timeoutMs: number): Promise<void> {
    this.closing = true;
    this.clearReconnect();
    const ended = new Promise<boolean>((resolve) => {
      this.client.end(false, () => resolve(true));
    });
    if (!(await withTimeout(ended, timeoutMs, false))) {
      logWarn(`[MQTT] Graceful close of ${this.clientId} timed out after ${timeoutMs}ms, forcing`);
    }
    this.disconnect();
  }

  disconnect(): void {
    this.closing = true;
    this.clearReconnect();
    try {
      // Force-close immediately (don't wait for inflight acks).
      this.client.end(true);
    } catch (error) {
      logDebug(`[MQTT] Force-close of ${this.clientId} failed: ${describeError(error)}`);
    }
    this.client.removeAllListeners();
    // A late socket error on a discarded client must not become an uncaught 'error' event.
    this.client.on('error', (error) => logDebug(`[MQTT] Error on discarded client ${this.clientId}: ${error.message}`));
    this.removeAllListeners();
  }

  private scheduleReconnect() {
    if (!this.hasConnected || this.closing || this.reconnectTimer) return;

    const delayMs = this.backoff.next();
    const attempt = this.backoff.attempts;
    logInfo(`[MQTT] Reconnecting in ${delayMs / 1000}s (attempt ${attempt})...`);
    this.emit('reconnect', attempt, delayMs);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      if (this.closing) return;
      this.client.reconnect();
    }, delayMs);
  }

  private clearReconnect() {
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    this.reconnectTimer = undefined;
  }
}
