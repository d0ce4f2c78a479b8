import { describe, it, expect } from 'vitest';
import path from 'path';
import { Chalk } from 'chalk';
import { findExecutable, getEnv, parseNameList } from '../../../src/utils/index.js';
import { Logger } from '../../../src/utils/logger.js';
import { MemoryWriter } from '../helpers.js';

describe('parseNameList()', () => {
  it('should split on commas and whitespace', () => {
    expect(parseNameList('Eslint, TrailingWhitespace  MergeConflicts,')).toEqual([
      'Eslint',
      'TrailingWhitespace',
      'MergeConflicts',
    ]);
  });

  it('should return nothing for an unset value', () => {
    expect(parseNameList(undefined)).toEqual([]);
    expect(parseNameList('')).toEqual([]);
  });
});

describe('getEnv()', () => {
  it('should fall back to the default', () => {
    expect(getEnv('SKIP', 'none', {})).toBe('none');
    expect(getEnv('SKIP', 'none', { SKIP: 'Eslint' })).toBe('Eslint');
  });
});

describe('findExecutable()', () => {
  it('should find an executable on PATH', async () => {
    const dir = path.dirname(process.execPath);
    const name = path.basename(process.execPath, process.platform === 'win32' ? '.exe' : '');

    expect(await findExecutable(name, { PATH: dir, PATHEXT: '.EXE' })).toBe(
      path.join(dir, process.platform === 'win32' ? `${name}.EXE` : name),
    );
  });

  it('should return null when nothing matches', async () => {
    expect(await findExecutable('checkpost-missing-tool', { PATH: path.dirname(process.execPath) })).toBeNull();
  });

  it('should resolve paths relative to the working directory', async () => {
    const dir = path.dirname(process.execPath);

    expect(await findExecutable(`./${path.basename(process.execPath)}`, {}, dir)).toBe(process.execPath);
  });
});

describe('Logger', () => {
  const colors = new Chalk({ level: 0 });

  it('should prefix messages with their level', () => {
    const output = new MemoryWriter();
    const logger = new Logger({ output, colors, debug: false });

    logger.info('starting');
    logger.warn('careful');
    logger.error('broken');

    expect(output.text()).toBe('INFO starting\nWARN careful\nERROR broken\n');
  });

  it('should only write debug messages when enabled', () => {
    const output = new MemoryWriter();
    const logger = new Logger({ output, colors, debug: false });

    logger.debug('hidden');
    logger.setDebug(true);
    logger.debug('shown');

    expect(output.text()).toBe('DEBUG shown\n');
  });
});
