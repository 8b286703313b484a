import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

import * as fs from 'fs';

import { loadScript } from '../../src/script/loader.js';
import { UsageError } from '../../src/types/errors.js';

describe('loadScript', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('throws a usage error when the script is missing', () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);

    expect(() => loadScript('missing.sh')).toThrow(UsageError);
    expect(() => loadScript('missing.sh')).toThrow('Script not found: missing.sh');
    expect(fs.readFileSync).not.toHaveBeenCalled();
  });

  it('reads the script as UTF-8 text', () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue('#!/bin/bash\necho $NAME\n');

    expect(loadScript('greet.sh')).toBe('#!/bin/bash\necho $NAME\n');
    expect(fs.readFileSync).toHaveBeenCalledWith('greet.sh', 'utf-8');
  });
});
