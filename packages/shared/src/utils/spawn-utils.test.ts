import type { ChildProcess } from 'node:child_process';

import { spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { Readable } from 'node:stream';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { spawnAsync } from './spawn-utils';

vi.mock('node:child_process', () => ({
  spawn: vi.fn(),
}));

const spawnMock = vi.mocked(spawn);

interface FakeProcess {
  proc: ChildProcess;
  stdout: Readable;
  stderr: Readable;
  exit: (code: number | null, signal?: NodeJS.Signals) => void;
}

function fakeProcess(withStreams = true): FakeProcess {
  const emitter = new EventEmitter();
  const stdout = new Readable({ read() {} });
  const stderr = new Readable({ read() {} });
  const proc = Object.assign(emitter, {
    stdout: withStreams ? stdout : null,
    stderr: withStreams ? stderr : null,
  }) as unknown as ChildProcess;

  return {
    proc,
    stdout,
    stderr,
    exit: (code, signal) => emitter.emit('close', code, signal ?? null),
  };
}

describe('spawnAsync', () => {
  let child: FakeProcess;

  beforeEach(() => {
    vi.clearAllMocks();
    child = fakeProcess();
    spawnMock.mockReturnValue(child.proc);
  });

  test('collects stdout and stderr of a successful run', async () => {
    const promise = spawnAsync('pdfinfo', ['/tmp/issue.pdf']);

    child.stdout.emit('data', Buffer.from('Pages:          84'));
    child.stderr.emit('data', Buffer.from('Syntax Warning'));
    child.exit(0);

    expect(await promise).toEqual({
      stdout: 'Pages:          84',
      stderr: 'Syntax Warning',
      code: 0,
      signal: null,
    });
    expect(spawnMock).toHaveBeenCalledWith('pdfinfo', ['/tmp/issue.pdf'], {});
  });

  test('passes plain spawn options through and keeps its own', async () => {
    const promise = spawnAsync('tesseract', ['page.png', 'stdout'], {
      cwd: '/tmp/ocr',
      timeout: 1000,
      captureStderr: false,
      encoding: 'latin1',
    });
    child.exit(0);
    await promise;

    expect(spawnMock).toHaveBeenCalledWith('tesseract', ['page.png', 'stdout'], {
      cwd: '/tmp/ocr',
      timeout: 1000,
    });
  });

  test('decodes a character split across chunks', async () => {
    const promise = spawnAsync('pdftotext', ['-']);
    const bytes = Buffer.from('Café');

    child.stdout.emit('data', bytes.subarray(0, 4));
    child.stdout.emit('data', bytes.subarray(4));
    child.exit(0);

    expect((await promise).stdout).toBe('Café');
  });

  test('decodes with the requested encoding', async () => {
    const promise = spawnAsync('pdftotext', ['-'], { encoding: 'latin1' });

    child.stdout.emit('data', Buffer.from([0x48, 0x61, 0x72, 0x70, 0xe9]));
    child.exit(0);

    expect((await promise).stdout).toBe('Harpé');
  });

  test('ignores streams that are not captured', async () => {
    const promise = spawnAsync('pdftoppm', [], {
      captureStdout: false,
      captureStderr: false,
    });

    child.stdout.emit('data', Buffer.from('ignored'));
    child.stderr.emit('data', Buffer.from('ignored'));
    child.exit(0);

    const result = await promise;
    expect(result.stdout).toBe('');
    expect(result.stderr).toBe('');
  });

  test('returns empty output for a process without pipes', async () => {
    child = fakeProcess(false);
    spawnMock.mockReturnValue(child.proc);

    const promise = spawnAsync('pdftoppm', []);
    child.exit(0);

    expect(await promise).toEqual({
      stdout: '',
      stderr: '',
      code: 0,
      signal: null,
    });
  });

  test('resolves with a non-zero exit code', async () => {
    const promise = spawnAsync('pdftotext', []);
    child.stderr.emit('data', Buffer.from('Syntax Error'));
    child.exit(1);

    const result = await promise;
    expect(result.code).toBe(1);
    expect(result.stderr).toBe('Syntax Error');
  });

  test('reports code 1 and the signal of a killed process', async () => {
    const promise = spawnAsync('tesseract', []);
    child.exit(null, 'SIGTERM');

    const result = await promise;
    expect(result.code).toBe(1);
    expect(result.signal).toBe('SIGTERM');
  });

  test('rejects when the process cannot start', async () => {
    const promise = spawnAsync('pdftoppm', []);

    child.proc.emit('error', new Error('spawn pdftoppm ENOENT'));

    await expect(promise).rejects.toThrow('spawn pdftoppm ENOENT');
  });
});
