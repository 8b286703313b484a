import { beforeEach, describe, expect, it, vi } from 'vitest';

const mockStream = {
  write: vi.fn(),
  end: vi.fn(),
};

vi.mock('fs', () => ({
  existsSync: vi.fn(),
  mkdirSync: vi.fn(),
  createWriteStream: vi.fn(() => mockStream),
}));

import * as fs from 'fs';

import { createLogger } from '../../src/output/logger.js';

describe('createLogger', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('does nothing when disabled', () => {
    const logger = createLogger(false, 'logs', 'deploy.sh');

    logger.log('ignored');
    logger.close();

    expect(logger.filePath).toBeNull();
    expect(fs.createWriteStream).not.toHaveBeenCalled();
  });

  it('creates the log directory and names the file after the script', () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);

    const logger = createLogger(true, 'logs', 'scripts/deploy.sh');

    expect(fs.mkdirSync).toHaveBeenCalledWith('logs', { recursive: true });
    expect(logger.filePath).toMatch(/^logs\/deploy-\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}\.log$/);
  });

  it('writes events as JSON lines without ANSI codes', () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    const logger = createLogger(true, 'logs', 'deploy.sh');

    logger.logEvent({ event: 'run_end', exitCode: 0 });
    logger.log('\x1b[32mok\x1b[0m');
    logger.close();

    const lines = mockStream.write.mock.calls.map((call) => JSON.parse(String(call[0])));
    expect(lines[0]).toMatchObject({ type: 'shellflags', event: 'run_end', exitCode: 0 });
    expect(lines[1]).toMatchObject({ type: 'shellflags', event: 'message', message: 'ok' });
    expect(mockStream.end).toHaveBeenCalled();
  });
});
