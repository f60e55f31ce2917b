import { describeError } from '@utils/errors';
import { logInfo, logWarn, logWarnDedup } from '@utils/logger';
import { PeriodicTask } from '@utils/PeriodicTask';
import type { ConnectionManager } from './ConnectionManager';

export const PROBE_INTERVAL_MS = 2_000;
/** Consecutive failures before the link is reported as down. */
export const LINK_DOWN_AFTER_FAILURES = 3;
/** Consecutive failures that trigger a forced reconnection. */
export const FORCE_RECONNECT_AFTER_FAILURES = 5;

/**
 * Active liveness check for the broker session.
 *
 * mqtt.js keeps `connected === true` on a half-open TCP socket until the keepalive
 * runs out, so every `PROBE_INTERVAL_MS` we ask for a QoS 0 ping publish. Failures are
 * debounced: the link is only reported down after `LINK_DOWN_AFTER_FAILURES` in a row,
 * and the transport is rebuilt at exactly `FORCE_RECONNECT_AFTER_FAILURES`.
 */
export class StatusProbe {
  private readonly task: PeriodicTask;

  constructor(
    private readonly connection: ConnectionManager,
    intervalMs = PROBE_INTERVAL_MS
  ) {
    this.task = new PeriodicTask({
      name: 'Probe',
      intervalMs,
      run: () => this.check(),
      onError: (error) => {
        const message = `Connection check error: ${describeError(error)}`;
        logWarnDedup('probe:error', 30_000, `[Probe] ${message}`);
        this.connection.reportError('probe', message);
      },
    });
  }

  start() {
    logInfo('[Probe] Started');
    this.task.start({ immediate: false });
  }

  stop(graceMs?: number): Promise<void> {
    return this.task.stop(graceMs);
  }

  async check(): Promise<void> {
    const result = this.connection.probe();
    if (result === 'ok') {
      this.connection.recordProbeSuccess();
      return;
    }

    const failures = this.connection.recordProbeFailure();
    if (failures >= LINK_DOWN_AFTER_FAILURES) {
      this.connection.markLinkDown('Disconnected from MQTT broker');
    }

    if (failures === FORCE_RECONNECT_AFTER_FAILURES) {
      logWarn(`[Probe] ${failures} consecutive failed probes (${result}), forcing reconnection`);
      // Reset first so the ticks that run while the new session is establishing start from zero.
      this.connection.resetProbeFailures();
      await this.connection.forceReconnect();
    }
  }
}
