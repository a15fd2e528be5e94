import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { LocalPty } from '../src/backend/LocalPty';
import { createBackend, isTerminalBackend } from '../src/backendFactory';
import { ConfigurationError } from '../src/errors';
import { Keywire } from '../src/keywire';
import { MockBackend } from './utils/MockBackend';

vi.mock('@lydell/node-pty', () => {
  return {
    spawn: vi.fn(),
  };
});

describe('Keywire', () => {
  let backend: MockBackend;
  let keywire: Keywire;

  beforeEach(async () => {
    backend = new MockBackend();
    keywire = await Keywire.launch({ cols: 40, rows: 10, backend });
  });

  afterEach(() => {
    keywire.dispose();
  });

  describe('launch', () => {
    it('should spawn the backend instance as-is', () => {
      expect(keywire.backend).toBe(backend);
      expect(backend.spawn).toHaveBeenCalledTimes(1);
    });

    it('should reject an unsupported charset before spawning', async () => {
      const other = new MockBackend();
      await expect(Keywire.launch({ backend: other, encoding: 'EBCDIC' })).rejects.toThrow(ConfigurationError);
      expect(other.spawn).not.toHaveBeenCalled();
    });

    it('should refuse a non-UTF-8 charset for a local pty', async () => {
      await expect(
        Keywire.launch({ backend: { type: 'localPty', file: 'sh' }, encoding: 'ISO-8859-1' }),
      ).rejects.toThrow('localPty only carries UTF-8 input (requested: latin1)');
    });

    it('should encode batches with the configured charset', async () => {
      const other = new MockBackend();
      const latin = await Keywire.launch({ backend: other, encoding: 'ISO-8859-1' });

      latin.type('é');
      expect(other.writtenBytes()).toEqual([0xe9]);
      latin.dispose();
    });
  });

  describe('Key input', () => {
    it('should route keys to the backend', () => {
      keywire.applyModifier('shift');
      expect(keywire.getModifierState().shift.on).toBe(true);

      keywire.press('KeyH');
      keywire.press('KeyI');
      keywire.press('Enter');

      expect(backend.writtenBytes()).toEqual([0x48, 0x69, 0x0d]);
    });

    it('should pass host settings to the listener', async () => {
      const other = new MockBackend();
      const ctrlA = await Keywire.launch({
        backend: other,
        settings: { deviceShortcutPreference: () => 'ctrla' },
      });

      ctrlA.press('Camera');
      expect(other.writtenBytes()).toEqual([0x01]);
      ctrlA.dispose();
    });

    it('should stop handling keys once disconnected', () => {
      const onDisconnect = vi.fn();
      keywire.onDisconnect(onDisconnect);

      backend.emitExit(0);

      expect(onDisconnect).toHaveBeenCalledTimes(1);
      expect(keywire.onKeyEvent('test', 'KeyA', { action: 'down' })).toBe(false);
    });
  });

  describe('Screen', () => {
    it('should expose the screen once output is drained', async () => {
      backend.emitData('build ok\r\nnext');
      await keywire.drain();

      expect(keywire.getSnapshot().text.split('\n').slice(0, 2)).toEqual(['build ok', 'next']);
    });

    it('should copy a selection through the clipboard', async () => {
      const other = new MockBackend();
      const clipboard = { setText: vi.fn<(text: string) => void>() };
      const kw = await Keywire.launch({ backend: other, cols: 20, rows: 4, clipboard });
      other.emitData('abc\r\ndef');
      await kw.drain();

      kw.startSelection({ col: 1, row: 0 });
      kw.press('Center');
      kw.press('ArrowDown');
      kw.press('Center');

      expect(clipboard.setText).toHaveBeenCalledWith('b\ne');
      kw.dispose();
    });
  });
});

describe('createBackend', () => {
  it('should build a LocalPty from config', () => {
    const backend = createBackend({ type: 'localPty', file: 'sh' }, { cols: 80, rows: 24, encoding: 'utf8' });
    expect(backend).toBeInstanceOf(LocalPty);
    expect(isTerminalBackend(backend)).toBe(true);
  });

  it('should reject charsets a local pty cannot carry', () => {
    expect(() => createBackend({ type: 'localPty' }, { encoding: 'latin1' })).toThrow(ConfigurationError);
    expect(createBackend({ type: 'localPty' }, {})).toBeInstanceOf(LocalPty);
  });

  it('should recognize backend instances by shape', () => {
    expect(isTerminalBackend(new MockBackend())).toBe(true);
    expect(isTerminalBackend({ write: () => {} })).toBe(false);
    expect(isTerminalBackend(null)).toBe(false);
  });
});
