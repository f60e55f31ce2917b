import type { ChalkInstance } from 'chalk';
import { CHANNELS, type PerChannel } from '../Common/channels';
import type { StatusSnapshot } from '../Monitor/SharedStatus';

export const TITLE = 'Dual Microphone MQTT Monitor';
export const BAR_WIDTH = 40;
/** The bar is full at this multiple of the threshold. */
const BAR_SCALE = 4;

export type DashboardContext = Readonly<{
  brokerAddress: string;
  port: number;
  threshold: number;
  deviceNames: PerChannel<string>;
}>;

export const levelBar = (level: number, threshold: number, width = BAR_WIDTH): string => {
  const max = Math.max(threshold * BAR_SCALE, 1);
  const filled = Math.round((Math.min(Math.max(level, 0), max) / max) * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
};

export const connectionLabel = (snapshot: Pick<StatusSnapshot, 'connected' | 'reconnecting' | 'reconnectAttempts'>) => {
  if (snapshot.reconnecting) return `RECONNECTING (attempt ${snapshot.reconnectAttempts})`;
  return snapshot.connected ? 'CONNECTED' : 'DISCONNECTED';
};

/**
 * One frame of the dashboard as plain lines. `nowSeconds` is epoch seconds, used for
 * the age of the last message.
 */
export const renderStatus = (
  snapshot: StatusSnapshot,
  context: DashboardContext,
  nowSeconds: number,
  chalk: ChalkInstance
): string[] => {
  const label = connectionLabel(snapshot);
  const colorStatus = snapshot.reconnecting ? chalk.yellow : snapshot.connected ? chalk.green : chalk.red;
  const lines = [
    `${chalk.bold(TITLE)} | MQTT Broker: ${context.brokerAddress}:${context.port} | Status: ${colorStatus(label)} | Messages Sent: ${snapshot.messagesSent}`,
    '',
  ];

  for (const channel of CHANNELS) {
    const { level, active } = snapshot.channels[channel];
    const color = active ? chalk.green : chalk.blue;
    lines.push(
      `${channel.toUpperCase()} MICROPHONE: ${context.deviceNames[channel]}`,
      `  State: ${color(active ? 'ACTIVE' : 'INACTIVE')}`,
      `  Level: ${level.toFixed(2)}`,
      `  ${(level > context.threshold ? chalk.green : chalk.blue)(levelBar(level, context.threshold))}`,
      ''
    );
  }

  if (snapshot.lastMessage && snapshot.lastMessageTimestamp !== null) {
    const age = Math.max(nowSeconds - snapshot.lastMessageTimestamp, 0);
    lines.push(`Last Message (${age.toFixed(1)}s ago): ${snapshot.lastMessage}`);
  } else {
    lines.push('No messages sent yet');
  }
  if (snapshot.lastError) {
    lines.push(chalk.bold.red(`STATUS: [${snapshot.lastError.component}] ${snapshot.lastError.message}`));
  }
  return lines;
};
