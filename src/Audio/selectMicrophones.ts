import { CHANNELS, type Channel, type PerChannel } from '../Common/channels';
import { CaptureError } from '@utils/errors';
import { logWarn } from '@utils/logger';
import type { InputDevice } from './listInputDevices';

export type Ask = (question: string) => Promise<string>;

export const formatDeviceList = (devices: InputDevice[]): string[] => [
  'Available input devices:',
  ...devices.map((device) => `  ${device.index}: ${device.name} (${device.id})`),
];

const findDevice = (devices: InputDevice[], index: number | undefined) =>
  index === undefined ? undefined : devices.find((device) => device.index === index);

/**
 * Resolve a device for each channel from the preset indices, asking for any that are
 * missing or no longer present. Unparseable answers are asked again.
 */
export const selectMicrophones = async (
  devices: InputDevice[],
  preset: Partial<PerChannel<number>>,
  ask: Ask
): Promise<PerChannel<InputDevice>> => {
  if (devices.length === 0) throw new CaptureError('No audio input devices found');

  const chosen: Partial<PerChannel<InputDevice>> = {};
  for (const channel of CHANNELS) {
    const presetIndex = preset[channel];
    let device = findDevice(devices, presetIndex);
    if (presetIndex !== undefined && !device) {
      logWarn(`[Audio] Configured ${channel} microphone index ${presetIndex} is not available`);
    }
    while (!device) {
      const answer = (await ask(`Enter the index for ${channel.toUpperCase()} microphone: `)).trim();
      device = /^\d+$/.test(answer) ? findDevice(devices, Number(answer)) : undefined;
    }
    chosen[channel] = device;
  }

  const { left, right } = chosen;
  if (!left || !right) throw new CaptureError('Microphone selection incomplete');
  return { left, right };
};

export const microphoneIndices = (devices: PerChannel<InputDevice>): Record<`${Channel}_index`, number> => ({
  left_index: devices.left.index,
  right_index: devices.right.index,
});
