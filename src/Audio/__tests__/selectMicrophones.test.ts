import { describe, expect, it, vi } from 'vitest';
import { CaptureError } from '@utils/errors';
import type { InputDevice } from '../listInputDevices';
import { formatDeviceList, microphoneIndices, selectMicrophones } from '../selectMicrophones';

const DEVICES: InputDevice[] = [
  { index: 0, card: 1, device: 0, name: 'Mic A', id: 'plughw:1,0' },
  { index: 1, card: 2, device: 0, name: 'Mic B', id: 'plughw:2,0' },
];

describe('selectMicrophones', () => {
  it('uses preset indices without asking', async () => {
    const ask = vi.fn(async () => '0');
    const chosen = await selectMicrophones(DEVICES, { left: 1, right: 0 }, ask);

    expect(chosen.left.name).toBe('Mic B');
    expect(chosen.right.name).toBe('Mic A');
    expect(ask).not.toHaveBeenCalled();
    expect(microphoneIndices(chosen)).toEqual({ left_index: 1, right_index: 0 });
  });

  it('asks again until the answer names a listed device', async () => {
    const answers = ['x', '7', ' 1 '];
    const ask = vi.fn(async () => answers.shift() ?? '');
    const chosen = await selectMicrophones(DEVICES, { left: 0 }, ask);

    expect(chosen.right.id).toBe('plughw:2,0');
    expect(ask).toHaveBeenCalledTimes(3);
    expect(ask).toHaveBeenCalledWith('Enter the index for RIGHT microphone: ');
  });

  it('asks for a preset index that is no longer present', async () => {
    const ask = vi.fn(async () => '0');
    const chosen = await selectMicrophones(DEVICES, { left: 9, right: 1 }, ask);

    expect(chosen.left.index).toBe(0);
    expect(ask).toHaveBeenCalledTimes(1);
  });

  it('fails without any input device', async () => {
    await expect(selectMicrophones([], {}, async () => '0')).rejects.toBeInstanceOf(CaptureError);
  });
});

describe('formatDeviceList', () => {
  it('prints one line per device', () => {
    expect(formatDeviceList(DEVICES)).toEqual([
      'Available input devices:',
      '  0: Mic A (plughw:1,0)',
      '  1: Mic B (plughw:2,0)',
    ]);
  });
});
