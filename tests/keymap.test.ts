import { describe, it, expect } from 'vitest';
import { ctrlMap, getCtrlChar, sequenceFor, TerminalKeySequences, xtermModifierParam } from '../src/keymap';
import { EmulationModifier, TerminalKey } from '../src/types';

const { None, Control, Shift, Alt } = EmulationModifier;

describe('Keymap', () => {
  describe('TerminalKeySequences', () => {
    it('should map common keys correctly', () => {
      expect(TerminalKeySequences[TerminalKey.Enter].plain).toBe('\r');
      expect(TerminalKeySequences[TerminalKey.Backspace].plain).toBe('\x7f');
      expect(TerminalKeySequences[TerminalKey.Tab].plain).toBe('\t');
      expect(TerminalKeySequences[TerminalKey.Escape].plain).toBe('\x1b');
    });

    it('should map function keys correctly', () => {
      expect(TerminalKeySequences[TerminalKey.F1].plain).toBe('\x1bOP');
      expect(TerminalKeySequences[TerminalKey.F12].plain).toBe('\x1b[24~');
    });
  });

  describe('sequenceFor', () => {
    it('should map arrow keys correctly', () => {
      expect(sequenceFor(TerminalKey.Up, None)).toBe('\x1b[A');
      expect(sequenceFor(TerminalKey.Down, None)).toBe('\x1b[B');
      expect(sequenceFor(TerminalKey.Right, None)).toBe('\x1b[C');
      expect(sequenceFor(TerminalKey.Left, None)).toBe('\x1b[D');
    });

    it('should use SS3 arrows in application cursor mode', () => {
      expect(sequenceFor(TerminalKey.Up, None, { applicationCursor: true })).toBe('\x1bOA');
      expect(sequenceFor(TerminalKey.Enter, None, { applicationCursor: true })).toBe('\r');
    });

    it('should encode modifiers as an xterm parameter', () => {
      expect(sequenceFor(TerminalKey.Up, Control)).toBe('\x1b[1;5A');
      expect(sequenceFor(TerminalKey.Left, Shift | Alt)).toBe('\x1b[1;4D');
      expect(sequenceFor(TerminalKey.F3, Shift)).toBe('\x1b[1;2R');
      expect(sequenceFor(TerminalKey.F5, Control | Shift | Alt)).toBe('\x1b[15;8~');
    });

    it('should ignore application mode when modifiers are present', () => {
      expect(sequenceFor(TerminalKey.Up, Shift, { applicationCursor: true })).toBe('\x1b[1;2A');
    });

    it('should handle backspace, tab and escape modifiers', () => {
      expect(sequenceFor(TerminalKey.Backspace, Control)).toBe('\b');
      expect(sequenceFor(TerminalKey.Backspace, Alt)).toBe('\x1b\x7f');
      expect(sequenceFor(TerminalKey.Tab, Shift)).toBe('\x1b[Z');
      expect(sequenceFor(TerminalKey.Escape, Alt)).toBe('\x1b\x1b');
      expect(sequenceFor(TerminalKey.Enter, Control)).toBe('\r');
    });
  });

  describe('xtermModifierParam', () => {
    it('should sum modifier weights', () => {
      expect(xtermModifierParam(None)).toBe(1);
      expect(xtermModifierParam(Shift)).toBe(2);
      expect(xtermModifierParam(Alt)).toBe(3);
      expect(xtermModifierParam(Control)).toBe(5);
      expect(xtermModifierParam(Control | Shift)).toBe(6);
    });
  });

  describe('ctrlMap', () => {
    it('should map the control range', () => {
      expect(ctrlMap(0x61)).toBe(0x01); // a
      expect(ctrlMap(0x7a)).toBe(0x1a); // z
      expect(ctrlMap(0x40)).toBe(0x40); // @ unchanged
      expect(ctrlMap(0x5f)).toBe(0x1f); // _
      expect(ctrlMap(0x20)).toBe(0x00); // space
      expect(ctrlMap(0x3f)).toBe(0x7f); // ?
    });

    it('should leave other code points unchanged', () => {
      expect(ctrlMap(0x31)).toBe(0x31);
      expect(ctrlMap(0x7b)).toBe(0x7b);
      expect(ctrlMap(0xe9)).toBe(0xe9);
    });
  });

  describe('getCtrlChar', () => {
    it('should convert lowercase letters to control codes', () => {
      expect(getCtrlChar('c')).toBe('\x03'); // ^C
      expect(getCtrlChar('d')).toBe('\x04'); // ^D
      expect(getCtrlChar('z')).toBe('\x1a'); // ^Z
    });

    it('should convert uppercase letters to control codes', () => {
      expect(getCtrlChar('C')).toBe('\x03'); // ^C
      expect(getCtrlChar('D')).toBe('\x04'); // ^D
    });

    it('should handle special control characters', () => {
      expect(getCtrlChar('[')).toBe('\x1b'); // ^[ (Escape)
      expect(getCtrlChar('\\')).toBe('\x1c'); // ^\
      expect(getCtrlChar('?')).toBe('\x7f');
    });

    it('should return char as is for non-control characters', () => {
      expect(getCtrlChar('1')).toBe('1');
      expect(getCtrlChar('!')).toBe('!');
      expect(getCtrlChar('')).toBe('');
    });
  });
});
