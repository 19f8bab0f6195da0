import { LlmClient } from './llm.js';
import { ValidationError } from '../utils/errors.js';

const SYSTEM_PROMPT = 'You are a helpful code assistant. You answer in Markdown with fenced code blocks.';

export function buildCodeExamplePrompt(concept: string, taskContext: string): string {
  return `Provide a clear, simple, and well-commented code example for the following concept.

**Concept:**
${concept}

**Context:**
The user is working on the task: "${taskContext}"

**Code Example:**
Provide a language-appropriate, copy-pasteable code block.`;
}

/**
 * Code Companion
 * Code example for a single concept; the markdown comes back untouched.
 */
export class CodeCompanion {
  constructor(private llm: LlmClient) {}

  async getCodeExample(concept: string, taskContext: string): Promise<string> {
    const trimmed = concept.trim();
    if (!trimmed) {
      throw new ValidationError('Concept is required');
    }
    return this.llm.generateText(SYSTEM_PROMPT, buildCodeExamplePrompt(trimmed, taskContext));
  }
}
