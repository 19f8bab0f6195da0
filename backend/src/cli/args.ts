import fs from 'fs/promises';
import path from 'path';
import { extractTextFromFile } from '../services/fileExtractor.js';
import { ValidationError } from '../utils/errors.js';

/**
 * "1 3,4" (1-based, as printed in the prerequisites table) -> [0, 2, 3]
 */
export function parseKnownIndices(input: string | undefined): number[] {
  if (!input || !input.trim()) return [];

  const indices: number[] = [];
  for (const token of input.split(/[\s,]+/).filter(Boolean)) {
    const value = Number(token);
    if (!Number.isInteger(value) || value < 1) {
      throw new ValidationError(`Invalid prerequisite number: "${token}"`);
    }
    if (!indices.includes(value - 1)) indices.push(value - 1);
  }
  return indices;
}

/**
 * The task comes from --file when given, otherwise from the positional arguments.
 */
export async function resolveTaskDescription(input: string[], file?: string): Promise<string> {
  if (file) {
    const buffer = await fs.readFile(file).catch(() => {
      throw new ValidationError(`Could not read file: ${file}`);
    });
    return (await extractTextFromFile(path.basename(file), buffer)).trim();
  }

  const task = input.join(' ').trim();
  if (!task) {
    throw new ValidationError('You must provide a task description or a file path.');
  }
  return task;
}

export async function writeMarkdownFile(markdown: string, filename: string, output?: string): Promise<string> {
  const target = output ?? path.join('resources', filename);
  await fs.mkdir(path.dirname(path.resolve(target)), { recursive: true });
  await fs.writeFile(target, markdown, 'utf-8');
  return target;
}
