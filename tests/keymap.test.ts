import { describe, expect, test } from 'vitest';
import type { KeyEvent } from '../src/fleet/ui.ts';
import { editFilter, translateKey } from '../src/tui/keymap.ts';
import { toKeyEvent } from '../src/tui/input.ts';

function key(sequence: string, name?: string, ctrl = false): KeyEvent {
  return { type: 'key', sequence, name, ctrl, shift: false };
}

describe('translateKey', () => {
  test('maps letters to fleet commands', () => {
    expect(translateKey(key('f', 'f'))).toEqual({
      type: 'command',
      command: { type: 'fetch-selected' },
    });
    expect(translateKey(key('S', 's'))).toEqual({
      type: 'command',
      command: { type: 'cancel-all' },
    });
    expect(translateKey(key('s', 's'))).toEqual({
      type: 'command',
      command: { type: 'sync-selected' },
    });
  });

  test('maps named keys', () => {
    expect(translateKey(key('\x1b[A', 'up'))).toEqual({
      type: 'command',
      command: { type: 'navigate-up' },
    });
    expect(translateKey(key('\x1b', 'escape'))).toEqual({
      type: 'command',
      command: { type: 'quit' },
    });
  });

  test('Ctrl-C always quits', () => {
    expect(translateKey(key('\x03', 'c', true))).toEqual({
      type: 'command',
      command: { type: 'quit' },
    });
  });

  test('opens the filter, help and error views', () => {
    expect(translateKey(key('/'))).toEqual({ type: 'start-filter' });
    expect(translateKey(key('?'))).toEqual({ type: 'toggle-help' });
    expect(translateKey(key('E', 'e'))).toEqual({ type: 'show-errors' });
  });

  test('opens details and the hidden list, and hides with i', () => {
    expect(translateKey(key('\r', 'return'))).toEqual({ type: 'show-details' });
    expect(translateKey(key('I', 'i'))).toEqual({ type: 'show-hidden' });
    expect(translateKey(key('i', 'i'))).toEqual({
      type: 'command',
      command: { type: 'hide-current' },
    });
  });

  test('ignores unbound keys', () => {
    expect(translateKey(key('z', 'z'))).toBeUndefined();
    expect(translateKey(key('\x1b[15~', 'f5'))).toBeUndefined();
  });
});

describe('editFilter', () => {
  test('appends printable characters and deletes with backspace', () => {
    expect(editFilter('ap', key('i', 'i'))).toEqual({ type: 'update', text: 'api' });
    expect(editFilter('api', key('\x7f', 'backspace'))).toEqual({
      type: 'update',
      text: 'ap',
    });
  });

  test('Ctrl-U clears, Enter commits, Escape cancels', () => {
    expect(editFilter('api', key('\x15', 'u', true))).toEqual({ type: 'update', text: '' });
    expect(editFilter('api', key('\r', 'return'))).toEqual({ type: 'commit' });
    expect(editFilter('api', key('\x1b', 'escape'))).toEqual({ type: 'cancel' });
  });

  test('ignores other control keys', () => {
    expect(editFilter('api', key('\t', 'tab'))).toBeUndefined();
  });
});

describe('toKeyEvent', () => {
  test('prefers the readline key description', () => {
    expect(toKeyEvent('j', { name: 'j', sequence: 'j', ctrl: false, shift: false })).toEqual({
      type: 'key',
      name: 'j',
      sequence: 'j',
      ctrl: false,
      shift: false,
    });
  });

  test('falls back to the raw string', () => {
    expect(toKeyEvent('é', undefined)).toEqual({
      type: 'key',
      name: undefined,
      sequence: 'é',
      ctrl: false,
      shift: false,
    });
  });
});
