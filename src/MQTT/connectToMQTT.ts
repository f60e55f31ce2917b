import { logInfo } from '@utils/logger';
import mqtt from 'mqtt';
import type { MQTTConnectionFactory } from './IMQTTConnection';
import { MQTTConnection } from './MQTTConnection';

/**
 * Start an asynchronous connect and return the session wrapper right away.
 *
 * mqtt.js' fixed-period reconnect is disabled (`reconnectPeriod: 0`); `MQTTConnection`
 * drives reconnects itself with a bounded exponential backoff. QoS 0 messages are not
 * queued while offline, so a publish on a dead session is rejected instead of piling up.
 */
export const connectToMQTT: MQTTConnectionFactory = (options) => {
  logInfo(`[MQTT] Connecting to ${options.host}:${options.port} as ${options.clientId}...`);

  const client = mqtt.connect({
    protocol: 'mqtt',
    host: options.host,
    port: options.port,
    clientId: options.clientId,
    username: options.username,
    password: options.password,
    clean: true,
    keepalive: options.keepaliveSec,
    connectTimeout: options.connectTimeoutMs,
    reconnectPeriod: 0,
    queueQoSZero: false,
    will: {
      topic: options.will.topic,
      payload: options.will.payload,
      qos: options.will.qos,
      retain: options.will.retain,
    },
  });

  // Wrap immediately so the initial connect event is never missed.
  return new MQTTConnection(client, options.clientId, options.reconnect);
};
