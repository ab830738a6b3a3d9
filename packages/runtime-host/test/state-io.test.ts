/**
 * Entitle Runtime Host — StateIO Contract Tests
 *
 *   SIO-U1: MemoryStateIO returns undefined for a file never written
 *   SIO-U2: MemoryStateIO round-trips values through JSON
 *   SIO-U3: FileStateIO returns undefined on ENOENT and on malformed JSON
 *   SIO-U4: FileStateIO writes under state/ and appends under logs/
 *
 * Isolation: MemoryStateIO tests have no I/O. FileStateIO tests use temp dirs.
 */

import { describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileStateIO, MemoryStateIO } from '../src/state/state-io.js';

function tempHome(label: string): string {
  return mkdtempSync(join(tmpdir(), `entitle-${label}-`));
}

describe('MemoryStateIO', () => {
  it('SIO-U1: returns undefined for an unwritten file', () => {
    expect(new MemoryStateIO().readJson('attachment.json')).toBeUndefined();
  });

  it('SIO-U2: round-trips through JSON, dropping undefined fields', () => {
    const stateIO = new MemoryStateIO();
    stateIO.writeJson('a.json', { keep: [1, 2], drop: undefined });
    expect(stateIO.readJson('a.json')).toEqual({ keep: [1, 2] });
  });

  it('SIO-U2: keeps appended lines per log file', () => {
    const stateIO = new MemoryStateIO();
    stateIO.appendLine('operations.jsonl', '{"n":1}');
    stateIO.appendLine('operations.jsonl', '{"n":2}');
    stateIO.appendLine('other.jsonl', 'x');
    expect(stateIO.readLines('operations.jsonl')).toEqual(['{"n":1}', '{"n":2}']);
  });
});

describe('FileStateIO', () => {
  it('SIO-U3: returns undefined when the file does not exist', () => {
    expect(new FileStateIO(tempHome('sio-u3')).readJson('attachment.json')).toBeUndefined();
  });

  it('SIO-U3: returns undefined for malformed JSON', () => {
    const home = tempHome('sio-u3b');
    mkdirSync(join(home, 'state'));
    writeFileSync(join(home, 'state', 'attachment.json'), '{not json', 'utf-8');
    expect(new FileStateIO(home).readJson('attachment.json')).toBeUndefined();
  });

  it('SIO-U4: writes pretty JSON under state/', () => {
    const home = tempHome('sio-u4');
    const stateIO = new FileStateIO(home);
    stateIO.writeJson('attachment.json', { attached: false });

    expect(readFileSync(join(home, 'state', 'attachment.json'), 'utf-8')).toBe('{\n  "attached": false\n}');
    expect(stateIO.readJson('attachment.json')).toEqual({ attached: false });
  });

  it('SIO-U4: appends newline-terminated lines under logs/', () => {
    const home = tempHome('sio-u4b');
    const stateIO = new FileStateIO(home);
    stateIO.appendLine('operations.jsonl', '{"n":1}');
    stateIO.appendLine('operations.jsonl', '{"n":2}');

    expect(readFileSync(join(home, 'logs', 'operations.jsonl'), 'utf-8')).toBe('{"n":1}\n{"n":2}\n');
  });
});
