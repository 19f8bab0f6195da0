import { LlmClient } from './llm.js';
import { TaskBreakdown } from '../types/index.js';

const SYSTEM_PROMPT = 'You are an expert project manager. You write clear, concise, actionable plans for developers in Markdown.';

export function buildPlanPrompt(breakdown: TaskBreakdown): string {
  const prerequisites = breakdown.prerequisites
    .map(p => `- ${p.name}: ${p.description}`)
    .join('\n');

  return `Based on the following task and its prerequisites, create a high-level, step-by-step project plan.

**Task Description:**
${breakdown.task_description}

**Prerequisites:**
${prerequisites || '- (none identified)'}

**Project Plan:**
Provide a numbered list of steps from project setup to completion. Focus on major milestones.`;
}

/**
 * Project Planner
 * Turns the analyzed task into a milestone plan (markdown, passed through as-is).
 */
export class ProjectPlanner {
  constructor(private llm: LlmClient) {}

  async generatePlan(breakdown: TaskBreakdown): Promise<string> {
    return this.llm.generateText(SYSTEM_PROMPT, buildPlanPrompt(breakdown));
  }
}
