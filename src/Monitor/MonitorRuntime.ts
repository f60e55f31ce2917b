import type { IAudioCapture } from '../Audio/IAudioCapture';
import type { Dashboard } from '../UI/Dashboard';
import type { ConnectionManager } from '@mqtt/ConnectionManager';
import type { StatusProbe } from '@mqtt/StatusProbe';
import { logDebug, logInfo } from '@utils/logger';
import type { MonitorLoop } from './MonitorLoop';
import type { SharedStatus } from './SharedStatus';

export const SHUTDOWN_GRACE_MS = 500;

export interface MonitorRuntimeOptions {
  capture: IAudioCapture;
  connection: ConnectionManager;
  status: SharedStatus;
  probe: StatusProbe;
  monitor: MonitorLoop;
  dashboard?: Pick<Dashboard, 'start' | 'stop'>;
  /** How long `stop()` waits for a tick already running in either loop. */
  graceMs?: number;
}

/**
 * Owns the start and shutdown order of a running monitor.
 *
 * Shutdown stops both loops first, so nothing publishes after the offline status,
 * then closes the MQTT session and only then releases the microphones.
 */
export class MonitorRuntime {
  private unsubscribe?: () => void;
  private started = false;
  private stopping?: Promise<void>;

  constructor(private readonly options: MonitorRuntimeOptions) {}

  start() {
    if (this.started || this.stopping) return;
    this.started = true;
    const { capture, connection, status, probe, monitor, dashboard } = this.options;

    this.unsubscribe = connection.onChange((snapshot) => status.updateConnection(snapshot));
    capture.open();
    connection.connect();
    probe.start();
    monitor.start();
    dashboard?.start();
  }

  /** Idempotent: every call returns the same shutdown. */
  stop(): Promise<void> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  private async shutdown() {
    const { capture, connection, probe, monitor, dashboard } = this.options;
    const graceMs = this.options.graceMs ?? SHUTDOWN_GRACE_MS;
    logInfo('[Runtime] Shutting down');

    await Promise.all([monitor.stop(graceMs), probe.stop(graceMs)]);
    await dashboard?.stop();
    await connection.disconnect();
    capture.close();
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    logDebug('[Runtime] Stopped');
  }
}
