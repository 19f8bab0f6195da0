import path from 'path';
import mammoth from 'mammoth';
import { ValidationError, errorMessage } from '../utils/errors.js';

export const SUPPORTED_EXTENSIONS = ['.txt', '.docx'] as const;
export const UNSUPPORTED_FILE_MESSAGE = 'Unsupported file type. Please upload .txt or .docx files.';

/**
 * Extracts the task text from an uploaded or local file.
 * .txt is read as UTF-8, .docx through mammoth (paragraph text only).
 */
export async function extractTextFromFile(filename: string, buffer: Buffer): Promise<string> {
  const ext = path.extname(filename).toLowerCase();

  if (ext === '.txt') {
    return buffer.toString('utf-8');
  }

  if (ext === '.docx') {
    try {
      const result = await mammoth.extractRawText({ buffer });
      return result.value;
    } catch (error) {
      throw new ValidationError(`Could not read ${filename}: ${errorMessage(error)}`);
    }
  }

  throw new ValidationError(UNSUPPORTED_FILE_MESSAGE);
}
