import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { parseKnownIndices, resolveTaskDescription, writeMarkdownFile } from '../backend/src/cli/args.js';
import { ValidationError } from '../backend/src/utils/errors.js';
import { UNSUPPORTED_FILE_MESSAGE } from '../backend/src/services/fileExtractor.js';

describe('parseKnownIndices', () => {
  it('turns 1-based numbers into indices', () => {
    expect(parseKnownIndices('1 3,4')).toEqual([0, 2, 3]);
    expect(parseKnownIndices('2, 2')).toEqual([1]);
  });

  it('treats empty input as nothing known', () => {
    expect(parseKnownIndices(undefined)).toEqual([]);
    expect(parseKnownIndices('  ')).toEqual([]);
  });

  it('rejects anything that is not a positive number', () => {
    expect(() => parseKnownIndices('0')).toThrow('Invalid prerequisite number: "0"');
    expect(() => parseKnownIndices('1 two')).toThrow(ValidationError);
    expect(() => parseKnownIndices('1.5')).toThrow('Invalid prerequisite number: "1.5"');
  });
});

describe('resolveTaskDescription', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'learnpath-cli-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('joins positional words', async () => {
    expect(await resolveTaskDescription(['Build', 'a', 'CLI'])).toBe('Build a CLI');
  });

  it('requires a task', async () => {
    await expect(resolveTaskDescription([' '])).rejects.toThrow(
      'You must provide a task description or a file path.'
    );
  });

  it('reads the task from a text file', async () => {
    const file = path.join(dir, 'task.txt');
    await fs.writeFile(file, '\nBuild a todo app with React\n');
    expect(await resolveTaskDescription(['ignored'], file)).toBe('Build a todo app with React');
  });

  it('reports a missing file', async () => {
    const file = path.join(dir, 'missing.txt');
    await expect(resolveTaskDescription([], file)).rejects.toThrow(`Could not read file: ${file}`);
  });

  it('rejects unsupported file types', async () => {
    const file = path.join(dir, 'task.md');
    await fs.writeFile(file, '# Task');
    await expect(resolveTaskDescription([], file)).rejects.toThrow(UNSUPPORTED_FILE_MESSAGE);
  });

  it('writes the export, creating directories', async () => {
    const target = path.join(dir, 'nested', 'out.md');
    const written = await writeMarkdownFile('# Doc\n', 'ignored.md', target);

    expect(written).toBe(target);
    expect(await fs.readFile(target, 'utf-8')).toBe('# Doc\n');
  });
});
