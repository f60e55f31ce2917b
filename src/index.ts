import { Command, InvalidArgumentError } from 'commander';
import { createInterface } from 'readline/promises';
import { ArecordCapture } from './Audio/ArecordCapture';
import { type InputDevice, listInputDevices } from './Audio/listInputDevices';
import { formatDeviceList, microphoneIndices, selectMicrophones } from './Audio/selectMicrophones';
import { type PerChannel, perChannel } from './Common/channels';
import { MonitorLoop } from './Monitor/MonitorLoop';
import { MonitorRuntime } from './Monitor/MonitorRuntime';
import { SharedStatus } from './Monitor/SharedStatus';
import { Dashboard } from './UI/Dashboard';
import { ConnectionManager } from '@mqtt/ConnectionManager';
import { StatusProbe } from '@mqtt/StatusProbe';
import { ConfigurationError, describeError } from '@utils/errors';
import { flushLogs, logError, logInfo, logWarn, redirectLogsToFile } from '@utils/logger';
import {
  DEFAULT_CONFIG_FILE,
  USER_CONFIG_FILE,
  createDefaultConfigFile,
  loadOptions,
  saveOptions,
} from '@utils/options';
import type { Options } from '@utils/options.schema';

const DEFAULT_LOG_FILE = 'mic-level-monitor.log';

type CliOptions = {
  broker?: string;
  port?: number;
  leftMic?: number;
  rightMic?: number;
  threshold?: number;
  listDevices?: boolean;
  config: string;
  createDefaultConfig?: boolean;
  ui: boolean;
  logFile: string;
};

const parseInteger = (value: string): number => {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError('Not a non-negative integer.');
  return Number(value);
};

const parseNumber = (value: string): number => {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) throw new InvalidArgumentError('Not a number.');
  return parsed;
};

const program = new Command()
  .name('mic-level-mqtt')
  .description('Dual Microphone MQTT Monitor')
  .option('--broker <address>', 'MQTT broker address')
  .option('--port <port>', 'MQTT broker port', parseInteger)
  .option('--left-mic <index>', 'index of the left microphone', parseInteger)
  .option('--right-mic <index>', 'index of the right microphone', parseInteger)
  .option('--threshold <level>', 'audio level threshold', parseNumber)
  .option('--list-devices', 'list available input devices and exit')
  .option('--config <path>', 'path to the config file', USER_CONFIG_FILE)
  .option('--create-default-config', `write ${DEFAULT_CONFIG_FILE} and exit`)
  .option('--no-ui', 'run without the terminal dashboard, logging to stdout')
  .option('--log-file <path>', 'where logs go while the dashboard is shown', DEFAULT_LOG_FILE);

/** Command-line values that override the config files. */
const cliOverrides = (cli: CliOptions): Record<string, unknown> => {
  const mqtt: Record<string, unknown> = {};
  if (cli.broker !== undefined) mqtt.broker = cli.broker;
  if (cli.port !== undefined) mqtt.port = cli.port;
  const overrides: Record<string, unknown> = {};
  if (Object.keys(mqtt).length > 0) overrides.mqtt = mqtt;
  if (cli.threshold !== undefined) overrides.audio = { threshold: cli.threshold };
  return overrides;
};

const ask = async (question: string): Promise<string> => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
};

const chooseMicrophones = async (options: Options, cli: CliOptions): Promise<PerChannel<InputDevice>> => {
  const devices = await listInputDevices();
  const preset = {
    left: cli.leftMic ?? options.microphones.left_index,
    right: cli.rightMic ?? options.microphones.right_index,
  };
  if (preset.left === undefined || preset.right === undefined) {
    process.stdout.write(`${formatDeviceList(devices).join('\n')}\n`);
  }
  const chosen = await selectMicrophones(devices, preset, ask);

  const indices = microphoneIndices(chosen);
  if (indices.left_index !== options.microphones.left_index || indices.right_index !== options.microphones.right_index) {
    if (saveOptions({ ...options, microphones: indices }, cli.config)) {
      logInfo(`[Config] Saved microphone selection to ${cli.config}`);
    }
  }
  return chosen;
};

/**
 * Wire the components together and run until SIGINT/SIGTERM.
 */
const runMonitor = async (options: Options, microphones: PerChannel<InputDevice>, cli: CliOptions) => {
  const status = new SharedStatus();
  const connection = new ConnectionManager({
    brokerAddress: options.mqtt.broker,
    port: options.mqtt.port,
    clientId: options.mqtt.client_id,
    username: options.mqtt.username,
    password: options.mqtt.password,
  });
  const capture = new ArecordCapture({
    devices: perChannel((channel) => microphones[channel].id),
    rate: options.audio.rate,
    channels: options.audio.channels,
    chunkSize: options.audio.chunk_size,
  });
  const dashboard = cli.ui
    ? new Dashboard({
        status,
        refreshMs: options.ui.refresh_rate * 1000,
        context: {
          brokerAddress: options.mqtt.broker,
          port: options.mqtt.port,
          threshold: options.audio.threshold,
          deviceNames: perChannel((channel) => microphones[channel].name),
        },
      })
    : undefined;
  const runtime = new MonitorRuntime({
    capture,
    connection,
    status,
    dashboard,
    probe: new StatusProbe(connection),
    monitor: new MonitorLoop({
      capture,
      connection,
      status,
      threshold: options.audio.threshold,
      topics: options.mqtt.topics,
      intervalMs: options.audio.check_interval * 1000,
    }),
  });

  try {
    if (dashboard) {
      logInfo(`[Main] Dashboard active, logging to ${cli.logFile}`);
      redirectLogsToFile(cli.logFile);
    }
    runtime.start();
  } catch (error) {
    await runtime.stop();
    throw error;
  }

  await new Promise<void>((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      logInfo(`[Main] Received ${signal}`);
      runtime.stop().then(resolve, (error: unknown) => {
        logError(`[Main] Error during shutdown: ${describeError(error)}`);
        resolve();
      });
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  });
};

const main = async (): Promise<number> => {
  const cli = program.parse().opts<CliOptions>();

  if (cli.createDefaultConfig) {
    if (createDefaultConfigFile()) {
      logInfo(`[Config] Default configuration created in ${DEFAULT_CONFIG_FILE}`);
      return 0;
    }
    logWarn(`[Config] ${DEFAULT_CONFIG_FILE} was not created (it may already exist)`);
    return 1;
  }

  const options = loadOptions({ configFile: cli.config, overrides: cliOverrides(cli) });

  if (cli.listDevices) {
    process.stdout.write(`${formatDeviceList(await listInputDevices()).join('\n')}\n`);
    return 0;
  }

  const microphones = await chooseMicrophones(options, cli);
  await runMonitor(options, microphones, cli);
  return 0;
};

process.on('unhandledRejection', (reason: unknown) => {
  logError(`[Main] Unhandled promise rejection: ${describeError(reason)}`);
});

void main()
  .then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      if (error instanceof ConfigurationError) {
        logError(`[Config] ${error.message}`);
        for (const issue of error.issues) logError(`[Config]   ${issue}`);
      } else {
        logError(`[Main] ${describeError(error)}`);
      }
      process.exitCode = 1;
    }
  )
  .finally(flushLogs);
