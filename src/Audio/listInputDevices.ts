import { execFile } from 'child_process';
import { promisify } from 'util';
import { CaptureError, describeError } from '@utils/errors';

const execFileAsync = promisify(execFile);

export type InputDevice = {
  /** Position in the listing; this is what the config stores. */
  index: number;
  card: number;
  device: number;
  name: string;
  /** ALSA PCM name to record from. */
  id: string;
};

const CAPTURE_LINE = /^card (\d+): [^[]*\[([^\]]*)\], device (\d+): [^[]*\[([^\]]*)\]/;

/**
 * Parse the output of `arecord -l`, e.g.
 * `card 1: Device [USB PnP Sound Device], device 0: USB Audio [USB Audio]`.
 */
export const parseCaptureDevices = (output: string): InputDevice[] => {
  const devices: InputDevice[] = [];
  for (const line of output.split('\n')) {
    const match = CAPTURE_LINE.exec(line.trim());
    if (!match) continue;
    const card = Number(match[1]);
    const device = Number(match[3]);
    devices.push({
      index: devices.length,
      card,
      device,
      name: match[2],
      id: `plughw:${card},${device}`,
    });
  }
  return devices;
};

export const listInputDevices = async (): Promise<InputDevice[]> => {
  try {
    const { stdout } = await execFileAsync('arecord', ['-l'], { timeout: 5_000 });
    return parseCaptureDevices(stdout);
  } catch (error) {
    throw new CaptureError(`Unable to list input devices: ${describeError(error)}`, { cause: error });
  }
};
