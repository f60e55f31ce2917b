import { spawn } from 'child_process';
import type { Readable } from 'stream';
import { CHANNELS, type Channel, type PerChannel, perChannel } from '../Common/channels';
import { CaptureError } from '@utils/errors';
import { logDebug, logInfo, logWarnDedup } from '@utils/logger';
import type { IAudioCapture } from './IAudioCapture';
import { FrameAccumulator } from './levels';

export const STALE_AFTER_MS = 1_000;

/**
 * The parts of a child process the recorder uses. `ChildProcess` with piped
 * stdout/stderr satisfies it.
 */
export interface RecorderProcess {
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  on(event: 'error', listener: (error: Error) => void): this;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnRecorder = (command: string, args: string[]) => RecorderProcess;

export interface ArecordCaptureOptions {
  /** ALSA PCM names, e.g. `plughw:1,0`. */
  devices: PerChannel<string>;
  rate: number;
  channels: number;
  chunkSize: number;
  staleAfterMs?: number;
  spawnRecorder?: SpawnRecorder;
  now?: () => number;
}

const defaultSpawn: SpawnRecorder = (command, args) => spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

export const arecordArgs = (device: string, options: Pick<ArecordCaptureOptions, 'rate' | 'channels'>): string[] => [
  '-D',
  device,
  '-f',
  'S16_LE',
  '-c',
  String(options.channels),
  '-r',
  String(options.rate),
  '-t',
  'raw',
  '-q',
];

/**
 * One `arecord` process per microphone, streaming raw PCM on stdout.
 */
class ChannelRecorder {
  private readonly frames: FrameAccumulator;
  private process?: RecorderProcess;
  private level = 0;
  private startedAt = 0;
  private lastFrameAt?: number;
  private failure?: string;
  private lastStderr = '';

  constructor(
    private readonly channel: Channel,
    private readonly device: string,
    private readonly options: ArecordCaptureOptions,
    private readonly spawnRecorder: SpawnRecorder,
    private readonly now: () => number
  ) {
    this.frames = new FrameAccumulator(options.chunkSize, options.channels);
  }

  start() {
    this.startedAt = this.now();
    const child = this.spawnRecorder('arecord', arecordArgs(this.device, this.options));
    this.process = child;
    logInfo(`[Audio] Recording ${this.channel} channel from ${this.device}`);

    child.stdout.on('data', (chunk: Buffer) => {
      const levels = this.frames.push(chunk);
      if (levels.length === 0) return;
      this.level = levels[levels.length - 1];
      this.lastFrameAt = this.now();
    });
    child.stderr.on('data', (chunk: Buffer) => {
      const text = chunk.toString().trim();
      if (text) this.lastStderr = text;
    });
    child.on('error', (error) => {
      this.failure = `${this.device}: ${error.message}`;
    });
    child.on('exit', (code, signal) => {
      if (this.process !== child) return;
      const how = signal ? `signal ${signal}` : `code ${code}`;
      this.failure = `${this.device} recorder exited with ${how}${this.lastStderr ? `: ${this.lastStderr}` : ''}`;
      logWarnDedup(`capture:exit:${this.channel}`, 60_000, `[Audio] ${this.channel}: ${this.failure}`);
    });
  }

  read(): number {
    if (this.failure) throw new CaptureError(this.failure);
    const reference = this.lastFrameAt ?? this.startedAt;
    const silentFor = this.now() - reference;
    const staleAfterMs = this.options.staleAfterMs ?? STALE_AFTER_MS;
    if (silentFor > staleAfterMs) {
      throw new CaptureError(`No audio from ${this.device} for ${silentFor}ms`);
    }
    return this.level;
  }

  stop() {
    const child = this.process;
    this.process = undefined;
    if (!child) return;
    child.stdout.removeAllListeners('data');
    if (child.exitCode === null && child.signalCode === null) {
      logDebug(`[Audio] Stopping ${this.channel} recorder`);
      child.kill('SIGTERM');
    }
  }
}

/**
 * Two-microphone capture through ALSA's `arecord`.
 */
export class ArecordCapture implements IAudioCapture {
  private readonly recorders: PerChannel<ChannelRecorder>;
  private opened = false;

  constructor(options: ArecordCaptureOptions) {
    const spawnRecorder = options.spawnRecorder ?? defaultSpawn;
    const now = options.now ?? Date.now;
    this.recorders = perChannel(
      (channel) => new ChannelRecorder(channel, options.devices[channel], options, spawnRecorder, now)
    );
  }

  open() {
    if (this.opened) return;
    this.opened = true;
    for (const channel of CHANNELS) this.recorders[channel].start();
  }

  async readLevel(channel: Channel): Promise<number> {
    if (!this.opened) throw new CaptureError('Audio capture is not open');
    return this.recorders[channel].read();
  }

  close() {
    if (!this.opened) return;
    this.opened = false;
    for (const channel of CHANNELS) this.recorders[channel].stop();
  }
}
