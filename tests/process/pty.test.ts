import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';

import type { ShellProcessOptions } from '../../src/process/pty.js';
import { spawnShell } from '../../src/process/pty.js';
import { createMockLogger } from '../helpers/mocks.js';

// Mock node-pty
const mockOnData = vi.fn();
const mockOnExit = vi.fn();
const mockWrite = vi.fn();

vi.mock('node-pty', () => ({
  spawn: vi.fn(() => ({
    onData: mockOnData,
    onExit: mockOnExit,
    write: mockWrite,
  })),
}));

// Import mocked module for assertions
import * as pty from 'node-pty';

describe('spawnShell', () => {
  let options: ShellProcessOptions;
  let onDataCallback: (data: string) => void;
  let onExitCallback: (e: { exitCode: number }) => void;
  let stdoutSpy: MockInstance<typeof process.stdout.write>;
  let wasTTY: boolean;

  beforeEach(() => {
    vi.clearAllMocks();

    // Capture callbacks when registered
    mockOnData.mockImplementation((cb: (data: string) => void) => {
      onDataCallback = cb;
    });
    mockOnExit.mockImplementation((cb: (e: { exitCode: number }) => void) => {
      onExitCallback = cb;
    });

    stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    wasTTY = process.stdin.isTTY;
    process.stdin.isTTY = false;

    options = {
      shell: '/bin/bash',
      scriptText: 'echo "$1"',
      scriptName: 'greet.sh',
      positionals: ['one', 'two'],
      cwd: '/test/dir',
      logger: createMockLogger(),
    };
  });

  afterEach(() => {
    process.stdin.isTTY = wasTTY;
    vi.restoreAllMocks();
  });

  describe('process spawning', () => {
    it('passes the script to the shell with -c, $0 and positionals', async () => {
      const promise = spawnShell(options);
      onExitCallback({ exitCode: 0 });
      await promise;

      expect(pty.spawn).toHaveBeenCalledWith(
        '/bin/bash',
        ['-c', 'echo "$1"', 'greet.sh', 'one', 'two'],
        expect.objectContaining({
          name: 'xterm-256color',
          cwd: '/test/dir',
        })
      );
    });
  });

  describe('data handling', () => {
    it('forwards output to stdout and the logger', async () => {
      const promise = spawnShell(options);

      onDataCallback('one\r\n');
      onExitCallback({ exitCode: 0 });
      await promise;

      expect(stdoutSpy).toHaveBeenCalledWith('one\r\n');
      expect(options.logger.log).toHaveBeenCalledWith('one\r\n');
    });

    it('does not read stdin when it is not a terminal', async () => {
      const promise = spawnShell(options);
      onExitCallback({ exitCode: 0 });
      await promise;

      expect(mockWrite).not.toHaveBeenCalled();
    });
  });

  describe('exit handling', () => {
    it('resolves with the shell exit code', async () => {
      const promise = spawnShell(options);
      onExitCallback({ exitCode: 3 });

      const result = await promise;

      expect(result.exitCode).toBe(3);
    });

    it('calculates duration in seconds', async () => {
      let callCount = 0;
      vi.spyOn(Date, 'now').mockImplementation(() => {
        callCount++;
        // First call is runStart, the second is at exit
        return callCount === 1 ? 1000 : 6000;
      });

      const promise = spawnShell(options);
      onExitCallback({ exitCode: 0 });

      const result = await promise;

      expect(result.duration).toBe(5);
    });
  });
});
