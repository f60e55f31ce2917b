import type { ErrorComponent } from '@utils/errors';
import { describeError } from '@utils/errors';
import { isNetworkError } from '@utils/backoff';
import { logDebug, logErrorDedup, logInfo, logWarn, logWarnDedup } from '@utils/logger';
import { wait } from '@utils/wait';
import { connectToMQTT } from './connectToMQTT';
import { type ConnectionEvent, type ConnectionState, nextState } from './connectionState';
import type { IMQTTConnection, MQTTConnectionFactory, ReconnectWindow } from './IMQTTConnection';
import { PING_PAYLOAD, PING_TOPIC, STATUS_TOPIC, availabilityPayload } from './topics';

export const KEEPALIVE_SEC = 60;
export const CONNECT_TIMEOUT_MS = 30_000;
export const CLOSE_TIMEOUT_MS = 2_000;
export const SOCKET_SETTLE_MS = 1_000;

const DEFAULT_RECONNECT: ReconnectWindow = { minDelayMs: 1_000, maxDelayMs: 10_000 };
const FORCED_RECONNECT: ReconnectWindow = { minDelayMs: 1_000, maxDelayMs: 30_000 };

export type LastMessage = Readonly<{ topic: string; payload: string; timestamp: number }>;

export type ComponentError = Readonly<{ component: ErrorComponent; message: string }>;

export type ProbeResult = 'ok' | 'rejected' | 'notConnected';

export type ConnectionSnapshot = Readonly<{
  state: ConnectionState;
  /** Bumped on every state transition. */
  version: number;
  /** What the outside world should believe: `connected` and not failing liveness probes. */
  connected: boolean;
  reconnecting: boolean;
  brokerAddress: string;
  port: number;
  clientId: string;
  consecutiveProbeFailures: number;
  reconnectAttempts: number;
  messagesSent: number;
  lastMessage: LastMessage | null;
  lastError: ComponentError | null;
}>;

export interface ConnectionManagerOptions {
  brokerAddress: string;
  port: number;
  clientId: string;
  username?: string;
  password?: string;
  createConnection?: MQTTConnectionFactory;
  socketSettleMs?: number;
  closeTimeoutMs?: number;
  /** Epoch milliseconds. */
  now?: () => number;
}

/**
 * Owns the one broker session of the process.
 *
 * Transport callbacks are turned into `ConnectionEvent`s and applied through
 * `nextState`; everything outside (monitor loop, status probe, dashboard) goes
 * through this class and never touches the transport.
 */
export class ConnectionManager {
  private readonly brokerAddress: string;
  private readonly port: number;
  private readonly baseClientId: string;
  private readonly createConnection: MQTTConnectionFactory;
  private readonly socketSettleMs: number;
  private readonly closeTimeoutMs: number;
  private readonly now: () => number;
  private readonly listeners = new Set<(snapshot: ConnectionSnapshot) => void>();

  private transport?: IMQTTConnection;
  private state: ConnectionState = 'disconnected';
  private version = 0;
  private clientId: string;
  private consecutiveProbeFailures = 0;
  private reconnectAttempts = 0;
  private linkDown = false;
  private lastError: ComponentError | null = null;
  private messagesSent = 0;
  private lastMessage: LastMessage | null = null;
  private forcedReconnect?: Promise<void>;
  private closed = false;

  constructor(private readonly options: ConnectionManagerOptions) {
    this.brokerAddress = options.brokerAddress;
    this.port = options.port;
    this.baseClientId = options.clientId;
    this.clientId = options.clientId;
    this.createConnection = options.createConnection ?? connectToMQTT;
    this.socketSettleMs = options.socketSettleMs ?? SOCKET_SETTLE_MS;
    this.closeTimeoutMs = options.closeTimeoutMs ?? CLOSE_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  snapshot(): ConnectionSnapshot {
    return {
      state: this.state,
      version: this.version,
      connected: this.state === 'connected' && !this.linkDown,
      reconnecting: this.state === 'reconnecting' || (this.state !== 'connected' && this.reconnectAttempts > 0),
      brokerAddress: this.brokerAddress,
      port: this.port,
      clientId: this.clientId,
      consecutiveProbeFailures: this.consecutiveProbeFailures,
      reconnectAttempts: this.reconnectAttempts,
      messagesSent: this.messagesSent,
      lastMessage: this.lastMessage,
      lastError: this.lastError,
    };
  }

  onChange(listener: (snapshot: ConnectionSnapshot) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Begin connecting. Only valid from `disconnected`; any other state already has a
   * session (or a forced reconnection) in progress.
   */
  connect(): void {
    if (this.state !== 'disconnected' || this.forcedReconnect) {
      logDebug(`[MQTT] connect() ignored in state ${this.state}`);
      return;
    }
    this.closed = false;
    this.openTransport(DEFAULT_RECONNECT);
  }

  /**
   * Publish a channel message. Rejected without sending unless the session is
   * `connected` and the status probe currently trusts the link.
   */
  publish(topic: string, payload: string | object): boolean {
    const transport = this.transport;
    if (!transport || this.state !== 'connected' || this.linkDown) return false;

    const message = typeof payload === 'string' ? payload : JSON.stringify(payload);
    const accepted = transport.publish(topic, message, { qos: 0 }, (error) => {
      if (error) this.setError('mqtt', `Error publishing to MQTT: ${error.message}`);
    });
    if (!accepted) {
      this.setError('mqtt', `MQTT publish to ${topic} was rejected`);
      return false;
    }

    this.messagesSent++;
    this.lastMessage = { topic, payload: message, timestamp: this.now() / 1000 };
    this.notify();
    return true;
  }

  /**
   * Liveness check: the transport must claim to be connected *and* accept a QoS 0 ping.
   */
  probe(): ProbeResult {
    const transport = this.transport;
    if (!transport || !transport.isConnected()) return 'notConnected';
    return transport.publish(PING_TOPIC, PING_PAYLOAD, { qos: 0 }) ? 'ok' : 'rejected';
  }

  recordProbeSuccess() {
    const recovered = this.linkDown;
    this.consecutiveProbeFailures = 0;
    this.linkDown = false;
    if (recovered) logInfo('[MQTT] Link verified again by status probe');
    if (this.state !== 'connected') this.apply({ type: 'probeConfirmed' });
    else this.notify();
  }

  recordProbeFailure(): number {
    this.consecutiveProbeFailures++;
    this.notify();
    return this.consecutiveProbeFailures;
  }

  resetProbeFailures() {
    this.consecutiveProbeFailures = 0;
    this.notify();
  }

  /**
   * Mark the link as unusable from the outside even though the transport may still
   * claim otherwise. Cleared by the next successful probe or CONNACK.
   */
  markLinkDown(message: string) {
    this.linkDown = true;
    this.setError('probe', message);
  }

  reportError(component: ErrorComponent, message: string) {
    this.setError(component, message);
  }

  /**
   * Tear down the transport and build a new one under a fresh client id.
   *
   * Used when the transport's own reconnect cannot see the problem (half-open socket,
   * broker still holding the old session). Concurrent calls share one run.
   */
  forceReconnect(): Promise<void> {
    if (!this.forcedReconnect) {
      this.forcedReconnect = this.runForcedReconnect().finally(() => {
        this.forcedReconnect = undefined;
      });
    }
    return this.forcedReconnect;
  }

  /**
   * Announce `offline` (retained), close the session and stop its network loop.
   * Safe from any state and never throws; repeated calls do nothing.
   */
  async disconnect(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const transport = this.transport;
    this.transport = undefined;
    try {
      if (transport) {
        const sent = transport.publish(STATUS_TOPIC, availabilityPayload('offline'), { qos: 1, retain: true });
        if (!sent) logDebug('[MQTT] Offline status not sent: session not connected');
        await transport.end(this.closeTimeoutMs);
      } else {
        logDebug('[MQTT] Offline status not sent: no active transport');
      }
    } catch (error) {
      logWarn(`[MQTT] Error while disconnecting: ${describeError(error)}`);
    }
    this.linkDown = false;
    this.apply({ type: 'teardown' });
    logInfo('[MQTT] Disconnected');
  }

  private async runForcedReconnect(): Promise<void> {
    if (this.closed) return;
    const previousClientId = this.clientId;
    this.teardownTransport();
    this.reconnectAttempts++;
    this.linkDown = false;
    this.lastError = { component: 'mqtt', message: `Forcing reconnection (attempt ${this.reconnectAttempts})...` };
    logWarn(`[MQTT] Forcing reconnection (attempt ${this.reconnectAttempts})`);
    this.apply({ type: 'teardown' });

    await wait(this.socketSettleMs);
    if (this.closed) return;

    this.clientId = this.nextClientId(previousClientId);
    this.openTransport(FORCED_RECONNECT);
  }

  private nextClientId(previous: string): string {
    const candidate = `${this.baseClientId}_${Math.floor(this.now() / 1000)}`;
    return candidate === previous ? `${candidate}_${this.reconnectAttempts}` : candidate;
  }

  private openTransport(reconnect: ReconnectWindow) {
    this.apply({ type: 'connectRequested' });

    const transport = this.createConnection({
      host: this.brokerAddress,
      port: this.port,
      clientId: this.clientId,
      username: this.options.username,
      password: this.options.password,
      keepaliveSec: KEEPALIVE_SEC,
      connectTimeoutMs: CONNECT_TIMEOUT_MS,
      will: { topic: STATUS_TOPIC, payload: availabilityPayload('offline'), qos: 1, retain: true },
      reconnect,
    });
    this.transport = transport;

    transport.on('connect', () => {
      if (transport === this.transport) this.handleConnack(transport);
    });
    transport.on('close', (reason) => {
      if (transport === this.transport) this.handleClose(reason);
    });
    transport.on('error', (error) => {
      if (transport === this.transport) this.handleTransportError(error);
    });
    transport.on('reconnect', (attempt, delayMs) => {
      logDebug(`[MQTT] Transport reconnect ${attempt} scheduled in ${delayMs}ms`);
    });
  }

  private teardownTransport() {
    const transport = this.transport;
    this.transport = undefined;
    transport?.disconnect();
  }

  private handleConnack(transport: IMQTTConnection) {
    this.consecutiveProbeFailures = 0;
    this.reconnectAttempts = 0;
    this.lastError = null;
    this.linkDown = false;
    this.apply({ type: 'connackReceived' });
    logInfo(`[MQTT] Connected to ${this.brokerAddress}:${this.port} as ${this.clientId}`);

    // Exactly one announcement per successful (re)connection.
    const sent = transport.publish(STATUS_TOPIC, availabilityPayload('online'), { qos: 1, retain: true }, (error) => {
      if (error) this.setError('mqtt', `Failed to publish online status: ${error.message}`);
    });
    if (!sent) this.setError('mqtt', 'Failed to publish online status');
  }

  private handleClose(reason: string) {
    const message =
      this.state === 'connecting'
        ? `Failed to connect to MQTT broker: ${reason}`
        : `Disconnected from MQTT broker: ${reason}`;
    logWarnDedup(`mqtt:close:${message}`, 30_000, `[MQTT] ${message}`);
    this.lastError = { component: 'mqtt', message };
    this.apply({ type: 'transportClosed', reason });
  }

  private handleTransportError(error: Error) {
    if (isNetworkError(error)) {
      logWarnDedup(`mqtt:error:${error.message}`, 30_000, `[MQTT] Connection error: ${error.message}`);
    } else {
      logErrorDedup(`mqtt:error:${error.message}`, 30_000, `[MQTT] Client error: ${error.message}`);
    }
    this.setError('mqtt', `MQTT error: ${error.message}`);
  }

  private setError(component: ErrorComponent, message: string) {
    this.lastError = { component, message };
    this.notify();
  }

  private apply(event: ConnectionEvent) {
    const next = nextState(this.state, event);
    if (next !== this.state) {
      logDebug(`[MQTT] ${this.state} -> ${next} (${event.type})`);
      this.state = next;
      this.version++;
    }
    this.notify();
  }

  private notify() {
    if (this.listeners.size === 0) return;
    const snapshot = this.snapshot();
    for (const listener of this.listeners) listener(snapshot);
  }
}
