/**
 * Filters command tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Command } from 'commander';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { randomUUID } from 'crypto';
import { buildFilterSpec, createFiltersCommand } from '../filters.js';
import { createLogger } from '../../utils/logger.js';
import { resetOutputOptions, setOutputOptions } from '../../utils/output.js';

describe('filters command', () => {
  let program: Command;
  let printed: string[];

  beforeEach(() => {
    printed = [];
    resetOutputOptions();
    const logger = createLogger(() => undefined, 'error');
    program = new Command();
    program.addCommand(createFiltersCommand(() => logger));
    vi.spyOn(console, 'log').mockImplementation((message: unknown) => {
      printed.push(String(message));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints one predicate per line', async () => {
    await program.parseAsync(['node', 'test', 'filters', 'age>=18', ' score != 0 ']);

    expect(printed).toEqual(['age>=18\nscore!=0']);
  });

  it('prints a placeholder when there are no definitions', async () => {
    await program.parseAsync(['node', 'test', 'filters']);

    expect(printed).toEqual(['(no filters)']);
  });

  it('prints predicates as JSON', async () => {
    setOutputOptions({ json: true });

    await program.parseAsync(['node', 'test', 'filters', 'a<=2']);

    expect(JSON.parse(printed[0])).toEqual([{ column: 'a', operator: '<=', value: '2' }]);
  });

  it('exits 1 on an invalid definition', async () => {
    const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('exit called');
    });

    await expect(program.parseAsync(['node', 'test', 'filters', 'a>1', 'b#2'])).rejects.toThrow('exit called');

    expect(exit).toHaveBeenCalledWith(1);
    expect(printed).toEqual(["Invalid filter: 'b#2'"]);
  });
});

describe('buildFilterSpec', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `csvsieve-test-${randomUUID()}`);
    await fs.mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('joins definitions with newlines', () => {
    expect(buildFilterSpec(['a>1', 'b<2'])).toBe('a>1\nb<2');
  });

  it('puts file definitions first', async () => {
    const filePath = join(testDir, 'filters.txt');
    await fs.writeFile(filePath, 'x=1\ny=2');

    expect(buildFilterSpec(['z=3'], filePath)).toBe('x=1\ny=2\nz=3');
  });
});
