import { z } from 'zod';
import { LlmClient } from './llm.js';
import {
  Complexity,
  Prerequisite,
  PrerequisiteCategory,
  TaskBreakdown
} from '../types/index.js';
import { AnalysisError, ValidationError } from '../utils/errors.js';

const CATEGORIES: readonly PrerequisiteCategory[] = ['concept', 'technology', 'skill', 'tool'];
const COMPLEXITIES: readonly Complexity[] = ['beginner', 'intermediate', 'advanced'];

const SYSTEM_PROMPT = `You are an expert learning advisor. You analyze a task or assignment and identify the ESSENTIAL prerequisite concepts and technologies a learner needs to complete it.
Respond with JSON only.`;

function buildAnalysisPrompt(task: string): string {
  return `Task: ${task}

Return a breakdown in this JSON format (8-12 of the most essential prerequisites):
{
  "prerequisites": [
    {
      "name": "concept/technology name",
      "category": "concept|technology|skill|tool",
      "description": "brief description of why this is needed",
      "priority": 0
    }
  ],
  "suggested_learning_order": ["prerequisite1", "prerequisite2"],
  "estimated_complexity": "beginner|intermediate|advanced"
}

Priorities: 0 = must learn first, 1 = should learn early, 2 = can learn later
Categories:
- "concept": fundamental concepts and theories
- "technology": specific technologies, frameworks, libraries
- "skill": practical skills and techniques
- "tool": development tools and platforms

Rules:
1. List HIGH-LEVEL prerequisites only ("React", not "React hooks" and "React state" separately)
2. Group related concepts together
3. No more than 12 prerequisites
4. Prefer technologies and core concepts over narrow sub-skills`;
}

// Each field falls back on its own so one sloppy entry does not sink the breakdown
const prerequisiteSchema = z.object({
  name: z.string().catch(''),
  category: z.string().catch('concept'),
  description: z.string().catch(''),
  priority: z.coerce.number().int().min(0).catch(0)
});

const breakdownSchema = z.object({
  prerequisites: z.array(z.unknown()),
  suggested_learning_order: z.array(z.unknown()).catch([]),
  estimated_complexity: z.string().catch('intermediate')
});

function normalizeCategory(value: string): PrerequisiteCategory {
  const lower = value.trim().toLowerCase();
  return CATEGORIES.find(c => c === lower) ?? 'concept';
}

function normalizeComplexity(value: string): Complexity {
  const lower = value.trim().toLowerCase();
  if (lower === 'medium') return 'intermediate';
  return COMPLEXITIES.find(c => c === lower) ?? 'intermediate';
}

/**
 * Pulls the JSON object out of a model answer that may be fenced or chatty.
 */
export function extractJsonObject(text: string): unknown {
  const fenced = text.trim().match(/^```(?:json)?\s*([\s\S]*?)```$/i);
  const raw = fenced ? fenced[1].trim() : text.trim();

  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start < 0 || end <= start) {
    throw new AnalysisError('Task analysis failed: the model did not return a JSON object.');
  }

  try {
    return JSON.parse(raw.slice(start, end + 1));
  } catch {
    throw new AnalysisError(`Task analysis failed: invalid JSON output. First 160: ${raw.slice(0, 160)}`);
  }
}

/**
 * Validates and normalizes the model output into a TaskBreakdown.
 * Prerequisites are sorted by priority; that order defines the indices clients use.
 */
export function parseTaskBreakdown(taskDescription: string, text: string): TaskBreakdown {
  const parsed = breakdownSchema.safeParse(extractJsonObject(text));
  if (!parsed.success) {
    throw new AnalysisError('Task analysis failed: the response has no prerequisites list.');
  }

  const prerequisites: Prerequisite[] = [];
  for (const item of parsed.data.prerequisites) {
    const entry = prerequisiteSchema.safeParse(item);
    if (!entry.success) continue;
    const name = entry.data.name.trim();
    if (!name) continue;
    prerequisites.push({
      name,
      category: normalizeCategory(entry.data.category),
      description: entry.data.description.trim(),
      priority: entry.data.priority
    });
  }
  prerequisites.sort((a, b) => a.priority - b.priority);

  const order = parsed.data.suggested_learning_order
    .filter((step): step is string => typeof step === 'string' && step.trim().length > 0)
    .map(step => step.trim());

  return {
    task_description: taskDescription,
    prerequisites,
    suggested_learning_order: order.length > 0 ? order : prerequisites.map(p => p.name),
    estimated_complexity: normalizeComplexity(parsed.data.estimated_complexity)
  };
}

/**
 * Task Analyzer
 * Breaks a task down into prerequisite concepts, technologies, skills and tools.
 * Input: "Build a REST API with JWT authentication in Node.js"
 * Output: Node.js, JWT, REST API design ... with a learning order and complexity
 */
export class TaskAnalyzer {
  constructor(private llm: LlmClient) {}

  async analyzeTask(taskDescription: string): Promise<TaskBreakdown> {
    const task = taskDescription.trim();
    if (!task) {
      throw new ValidationError('Task description is required');
    }

    const text = await this.llm.generateJson(SYSTEM_PROMPT, buildAnalysisPrompt(task));
    const breakdown = parseTaskBreakdown(task, text);

    console.log(
      `[TaskAnalyzer] ${breakdown.prerequisites.length} prerequisites, complexity=${breakdown.estimated_complexity}`
    );
    return breakdown;
  }
}
