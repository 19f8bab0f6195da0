import { LlmClient } from './llm.js';
import { ValidationError } from '../utils/errors.js';

export type TutorMode = 'question' | 'error';

const QUESTION_SYSTEM_PROMPT = 'You are a friendly and knowledgeable tutor helping a student with their task.';
const ERROR_SYSTEM_PROMPT = 'You are a helpful debugging assistant helping a student understand an error.';

/** Pasted errors and stack traces get the debugging prompt. */
export function detectTutorMode(query: string): TutorMode {
  const lower = query.toLowerCase();
  return lower.includes('error') || lower.includes('traceback') ? 'error' : 'question';
}

export function buildQuestionPrompt(question: string, taskContext: string): string {
  return `**Student's Task:**
${taskContext}

**Student's Question:**
${question}

**Answer:**
Provide a clear, concise, and helpful answer to the student's question.`;
}

export function buildErrorPrompt(errorMessage: string, taskContext: string): string {
  return `**Student's Task:**
${taskContext}

**Error Message / Code:**
${errorMessage}

**Explanation:**
1. **What the error means:** Briefly explain the error in simple terms.
2. **Common causes:** List the most likely reasons for this error in the context of the student's task.
3. **How to fix it:** Suggest specific steps or code corrections to resolve the error.`;
}

/**
 * Tutor Agent
 * Answers questions or explains errors. No memory between calls:
 * the task description is the only context carried into each prompt.
 */
export class TutorAgent {
  constructor(private llm: LlmClient) {}

  async respond(query: string, taskContext: string): Promise<string> {
    const trimmed = query.trim();
    if (!trimmed) {
      throw new ValidationError('Query is required');
    }

    if (detectTutorMode(trimmed) === 'error') {
      return this.llm.generateText(ERROR_SYSTEM_PROMPT, buildErrorPrompt(trimmed, taskContext));
    }
    return this.llm.generateText(QUESTION_SYSTEM_PROMPT, buildQuestionPrompt(trimmed, taskContext));
  }
}
