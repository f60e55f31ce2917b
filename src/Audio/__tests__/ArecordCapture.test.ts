import EventEmitter from 'events';
import { PassThrough } from 'stream';
import { describe, expect, it } from 'vitest';
import { CaptureError } from '@utils/errors';
import { ArecordCapture, type SpawnRecorder } from '../ArecordCapture';
import { pcm } from './pcm';

class FakeRecorder extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  readonly kills: NodeJS.Signals[] = [];

  constructor(readonly args: string[]) {
    super();
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.kills.push(signal);
    this.signalCode = signal;
    return true;
  }
}

const setup = () => {
  let now = 0;
  const recorders: FakeRecorder[] = [];
  const spawnRecorder: SpawnRecorder = (command, args) => {
    expect(command).toBe('arecord');
    const recorder = new FakeRecorder(args);
    recorders.push(recorder);
    return recorder;
  };
  const capture = new ArecordCapture({
    devices: { left: 'plughw:1,0', right: 'plughw:2,0' },
    rate: 16_000,
    channels: 1,
    chunkSize: 2,
    spawnRecorder,
    now: () => now,
  });
  return {
    capture,
    recorders,
    setNow: (ms: number) => {
      now = ms;
    },
  };
};

describe('ArecordCapture', () => {
  it('starts one raw 16-bit recorder per channel', () => {
    const { capture, recorders } = setup();
    capture.open();

    expect(recorders.map((recorder) => recorder.args)).toEqual([
      ['-D', 'plughw:1,0', '-f', 'S16_LE', '-c', '1', '-r', '16000', '-t', 'raw', '-q'],
      ['-D', 'plughw:2,0', '-f', 'S16_LE', '-c', '1', '-r', '16000', '-t', 'raw', '-q'],
    ]);
  });

  it('reads the level of the latest complete frame', async () => {
    const { capture, recorders } = setup();
    capture.open();
    recorders[0].stdout.emit('data', pcm(100, -300, 40, -40));
    recorders[1].stdout.emit('data', pcm(7, 7));

    await expect(capture.readLevel('left')).resolves.toBe(40);
    await expect(capture.readLevel('right')).resolves.toBe(7);
  });

  it('rejects when a channel has produced nothing for over a second', async () => {
    const { capture, recorders, setNow } = setup();
    capture.open();
    recorders[0].stdout.emit('data', pcm(5, 5));
    setNow(1_500);

    await expect(capture.readLevel('left')).rejects.toThrow(new CaptureError('No audio from plughw:1,0 for 1500ms'));
  });

  it('rejects once the recorder has exited, with its last complaint', async () => {
    const { capture, recorders } = setup();
    capture.open();
    recorders[1].stderr.emit('data', Buffer.from('arecord: audio open error: Device or resource busy\n'));
    recorders[1].emit('exit', 1, null);

    await expect(capture.readLevel('right')).rejects.toThrow(
      'plughw:2,0 recorder exited with code 1: arecord: audio open error: Device or resource busy'
    );
    await expect(capture.readLevel('left')).resolves.toBe(0);
  });

  it('rejects when the recorder cannot be started', async () => {
    const { capture, recorders } = setup();
    capture.open();
    recorders[0].emit('error', new Error('spawn arecord ENOENT'));

    await expect(capture.readLevel('left')).rejects.toBeInstanceOf(CaptureError);
  });

  it('stops both recorders once, however often it is closed', async () => {
    const { capture, recorders } = setup();
    capture.open();
    capture.close();
    capture.close();

    expect(recorders.map((recorder) => recorder.kills)).toEqual([['SIGTERM'], ['SIGTERM']]);
    await expect(capture.readLevel('left')).rejects.toThrow('Audio capture is not open');
  });
});
