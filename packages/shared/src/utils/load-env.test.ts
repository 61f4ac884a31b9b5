/**
 * Env Loader Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { findProjectRoot } from './load-env.js';

describe('findProjectRoot', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) {
      fs.rmSync(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it('should walk up to the directory holding .env', () => {
    dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'barsim-env-')));
    const nested = path.join(dir, 'packages', 'engine', 'src');
    fs.mkdirSync(nested, { recursive: true });
    fs.writeFileSync(path.join(dir, '.env'), 'LOG_LEVEL=debug\n');

    expect(findProjectRoot(nested)).toBe(dir);
  });
});
