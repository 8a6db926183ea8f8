/**
 * Process command tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Command } from 'commander';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { randomUUID } from 'crypto';
import { createProcessCommand } from '../process.js';
import { createLogger } from '../../utils/logger.js';
import { resetOutputOptions, setOutputOptions } from '../../utils/output.js';

const SAMPLE = 'name,age,score\nann,31,7\nbob,17,9\ncid,45,3\n';

describe('process command', () => {
  let program: Command;
  let logLines: string[];
  let stdout: string;
  let testDir: string;

  beforeEach(async () => {
    logLines = [];
    stdout = '';
    resetOutputOptions();
    const logger = createLogger((line) => logLines.push(line), 'debug');
    program = new Command();
    program.addCommand(createProcessCommand(() => logger));

    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdout += String(chunk);
      return true;
    });
    vi.spyOn(console, 'log').mockImplementation((message: unknown) => {
      stdout += `${String(message)}\n`;
    });

    testDir = join(tmpdir(), `csvsieve-test-${randomUUID()}`);
    await fs.mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  function mockExit() {
    return vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('exit called');
    });
  }

  it('filters and projects inline data', async () => {
    await program.parseAsync(['node', 'test', 'process', '--data', SAMPLE, '-c', 'age,name', '-f', 'age>=18']);

    expect(stdout).toBe('age,name\n31,ann\n45,cid\n');
  });

  it('combines repeated --filter options', async () => {
    await program.parseAsync([
      'node', 'test', 'process', '--data', SAMPLE, '-c', 'name', '-f', 'age>=18', '-f', 'score>5',
    ]);

    expect(stdout).toBe('name\nann\n');
  });

  it('reads a CSV file and a filters file', async () => {
    const csvPath = join(testDir, 'people.csv');
    const filtersPath = join(testDir, 'filters.txt');
    await fs.writeFile(csvPath, SAMPLE);
    await fs.writeFile(filtersPath, 'age<40\n');

    await program.parseAsync(['node', 'test', 'process', csvPath, '--filters-file', filtersPath, '-f', 'score!=7']);

    expect(stdout).toBe('name,age,score\nbob,17,9\n');
  });

  it('logs row counts at debug level', async () => {
    await program.parseAsync(['node', 'test', 'process', '--data', SAMPLE, '-f', 'age>40']);

    expect(logLines).toHaveLength(1);
    const entry = JSON.parse(logLines[0]);
    expect(entry.event).toBe('csv.processed');
    expect(entry.rows_in).toBe(3);
    expect(entry.rows_out).toBe(1);
    expect(entry.columns).toBe(3);
  });

  it('prints JSON when --json is set', async () => {
    setOutputOptions({ json: true });

    await program.parseAsync(['node', 'test', 'process', '--data', SAMPLE, '-c', 'name', '-f', 'age<18']);

    expect(JSON.parse(stdout)).toEqual({ columns: ['name'], row_count: 1, csv: 'name\nbob\n' });
  });

  it('prints the error message on stdout and exits 1', async () => {
    const exit = mockExit();

    await expect(
      program.parseAsync(['node', 'test', 'process', '--data', SAMPLE, '-c', 'name,email'])
    ).rejects.toThrow('exit called');

    expect(exit).toHaveBeenCalledWith(1);
    expect(stdout).toBe("Header 'email' not found in CSV file/string\n");
  });

  it('prints the error as JSON when --json is set', async () => {
    setOutputOptions({ json: true });
    mockExit();

    await expect(
      program.parseAsync(['node', 'test', 'process', '--data', SAMPLE, '-f', 'age~3'])
    ).rejects.toThrow('exit called');

    expect(JSON.parse(stdout)).toEqual({ error: "Invalid filter: 'age~3'", code: 'INVALID_FILTER' });
  });

  it('reports a missing CSV file', async () => {
    mockExit();
    const csvPath = join(testDir, 'nope.csv');

    await expect(program.parseAsync(['node', 'test', 'process', csvPath])).rejects.toThrow('exit called');

    expect(stdout).toBe(`Cannot read file '${csvPath}': no such file\n`);
  });

  it('requires a file or --data', async () => {
    const exit = mockExit();
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(program.parseAsync(['node', 'test', 'process'])).rejects.toThrow('exit called');

    expect(exit).toHaveBeenCalledWith(1);
    expect(stderr).toHaveBeenCalledWith('Error: Provide a CSV file or --data <csv>');
    expect(stdout).toBe('');
  });

  it('rejects a file together with --data', async () => {
    mockExit();
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(
      program.parseAsync(['node', 'test', 'process', 'data.csv', '--data', SAMPLE])
    ).rejects.toThrow('exit called');

    expect(stderr).toHaveBeenCalledWith('Error: Provide either a CSV file or --data, not both');
  });
});
