import { describe, expect, it } from 'vitest';
import { parseCaptureDevices } from '../listInputDevices';

const ARECORD_OUTPUT = `**** List of CAPTURE Hardware Devices ****
card 1: Device [USB PnP Sound Device], device 0: USB Audio [USB Audio]
  Subdevices: 1/1
  Subdevice #0: subdevice #0
card 2: Microphone [Desk Microphone], device 0: USB Audio [USB Audio]
  Subdevices: 1/1
  Subdevice #0: subdevice #0
`;

describe('parseCaptureDevices', () => {
  it('lists each capture device with its ALSA name', () => {
    expect(parseCaptureDevices(ARECORD_OUTPUT)).toEqual([
      { index: 0, card: 1, device: 0, name: 'USB PnP Sound Device', id: 'plughw:1,0' },
      { index: 1, card: 2, device: 0, name: 'Desk Microphone', id: 'plughw:2,0' },
    ]);
  });

  it('returns nothing when no cards are present', () => {
    expect(parseCaptureDevices('**** List of CAPTURE Hardware Devices ****\n')).toEqual([]);
  });
});
