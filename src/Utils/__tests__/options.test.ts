import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors';
import { createDefaultConfigFile, loadOptions, mergeOptions, parseOptions, saveOptions } from '../options';

describe('mergeOptions', () => {
  it('merges nested objects key by key and replaces everything else', () => {
    expect(
      mergeOptions(
        { mqtt: { broker: 'a', port: 1 }, tags: ['x'] },
        { mqtt: { port: 2 }, tags: ['y'], audio: { threshold: 3 } }
      )
    ).toEqual({ mqtt: { broker: 'a', port: 2 }, tags: ['y'], audio: { threshold: 3 } });
  });
});

describe('parseOptions', () => {
  it('fills in the built-in defaults', () => {
    expect(parseOptions({})).toEqual({
      mqtt: {
        broker: 'localhost',
        port: 1883,
        client_id: 'mic_monitor',
        topics: { left: 'microphones/left', right: 'microphones/right' },
      },
      audio: { chunk_size: 1024, channels: 1, rate: 44100, threshold: 500, check_interval: 0.2 },
      ui: { refresh_rate: 0.1 },
      microphones: {},
    });
  });

  it('lists every invalid field', () => {
    try {
      parseOptions({ mqtt: { port: 70000 }, audio: { threshold: 'loud' } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (!(error instanceof ConfigurationError)) return;
      expect(error.message).toBe('Invalid configuration');
      expect(error.issues).toHaveLength(2);
      expect(error.issues[0]).toMatch(/^mqtt\.port: /);
      expect(error.issues[1]).toMatch(/^audio\.threshold: /);
    }
  });
});

describe('config files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'mic-level-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('layers defaults, the default file, the user file and overrides', () => {
    const defaultConfigFile = join(dir, 'default_config.json');
    const configFile = join(dir, 'config.json');
    writeFileSync(defaultConfigFile, JSON.stringify({ mqtt: { broker: 'broker.lan', port: 1884 } }));
    writeFileSync(configFile, JSON.stringify({ mqtt: { port: 1885 }, microphones: { left_index: 2 } }));

    const options = loadOptions({ configFile, defaultConfigFile, overrides: { audio: { threshold: 800 } } });

    expect(options.mqtt).toMatchObject({ broker: 'broker.lan', port: 1885, client_id: 'mic_monitor' });
    expect(options.audio.threshold).toBe(800);
    expect(options.microphones).toEqual({ left_index: 2 });
  });

  it('skips missing files', () => {
    const options = loadOptions({ configFile: join(dir, 'none.json'), defaultConfigFile: join(dir, 'nope.json') });
    expect(options.mqtt.broker).toBe('localhost');
  });

  it('refuses a file that is not valid JSON', () => {
    const configFile = join(dir, 'config.json');
    writeFileSync(configFile, '{ mqtt: ');
    expect(() => loadOptions({ configFile, defaultConfigFile: join(dir, 'nope.json') })).toThrow(ConfigurationError);
  });

  it('saves settings that load back unchanged', () => {
    const configFile = join(dir, 'config.json');
    const options = parseOptions({ microphones: { left_index: 0, right_index: 1 } });

    expect(saveOptions(options, configFile)).toBe(true);
    expect(loadOptions({ configFile, defaultConfigFile: join(dir, 'nope.json') })).toEqual(options);
  });

  it('reports a failed save instead of throwing', () => {
    expect(saveOptions(parseOptions({}), join(dir, 'missing', 'config.json'))).toBe(false);
  });

  it('writes the default file once, without microphone choices', () => {
    const defaultConfigFile = join(dir, 'default_config.json');

    expect(createDefaultConfigFile(defaultConfigFile)).toBe(true);
    expect(createDefaultConfigFile(defaultConfigFile)).toBe(false);

    const written: unknown = JSON.parse(readFileSync(defaultConfigFile, 'utf8'));
    expect(written).toEqual({
      mqtt: {
        broker: 'localhost',
        port: 1883,
        client_id: 'mic_monitor',
        topics: { left: 'microphones/left', right: 'microphones/right' },
      },
      audio: { chunk_size: 1024, channels: 1, rate: 44100, threshold: 500, check_interval: 0.2 },
      ui: { refresh_rate: 0.1 },
    });
  });
});
