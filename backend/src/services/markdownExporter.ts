import { Prerequisite, ResourcesByConcept, TaskBreakdown } from '../types/index.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** "2026-01-05 09:03:07" in local time */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

function titleCase(text: string): string {
  return text.replace(/\b\w/g, c => c.toUpperCase());
}

export function priorityBadge(priority: number): string {
  if (priority === 0) return '🔴 High';
  if (priority === 1) return '🟡 Medium';
  return '🟢 Low';
}

function groupByCategory(prerequisites: Prerequisite[]): Map<string, Prerequisite[]> {
  const groups = new Map<string, Prerequisite[]>();
  for (const prereq of prerequisites) {
    const category = titleCase(prereq.category);
    const list = groups.get(category) ?? [];
    list.push(prereq);
    groups.set(category, list);
  }
  return groups;
}

/**
 * Renders the analysis and the resources found so far as a markdown document.
 */
export function renderMarkdown(
  breakdown: TaskBreakdown,
  resources: ResourcesByConcept,
  generatedAt: Date = new Date()
): string {
  const lines: string[] = [
    `# Learning Resources for: ${breakdown.task_description}`,
    '',
    `**Generated:** ${formatTimestamp(generatedAt)}  `,
    `**Estimated Complexity:** ${titleCase(breakdown.estimated_complexity)}`,
    '',
    '## Task Description',
    '',
    breakdown.task_description,
    '',
    '## Prerequisites',
    ''
  ];

  for (const [category, prereqs] of groupByCategory(breakdown.prerequisites)) {
    lines.push(`### ${category}`, '');
    for (const prereq of prereqs) {
      lines.push(`- **${prereq.name}** (${priorityBadge(prereq.priority)})`);
      if (prereq.description) {
        lines.push(`  - ${prereq.description}`);
      }
    }
    lines.push('');
  }

  if (breakdown.suggested_learning_order.length > 0) {
    lines.push('## Suggested Learning Order', '');
    breakdown.suggested_learning_order.forEach((step, i) => {
      lines.push(`${i + 1}. ${step}`);
    });
    lines.push('');
  }

  lines.push('## Learning Resources', '');
  for (const [concept, list] of Object.entries(resources)) {
    if (list.length === 0) continue;
    lines.push(`### ${concept}`, '');
    list.forEach((resource, i) => {
      lines.push(`${i + 1}. [${resource.title}](${resource.url})`);
      if (resource.description) {
        lines.push(`   - ${resource.description}`);
      }
    });
    lines.push('');
  }

  lines.push('---', '', '*Generated by LearnPath*', '');
  return lines.join('\n');
}

/**
 * learning_resources_<first 30 chars of the task>_<YYYYMMDD_HHMMSS>.md
 */
export function exportFilename(taskDescription: string, date: Date = new Date()): string {
  const safeTask = Array.from(taskDescription.slice(0, 30))
    .filter(c => /[\p{L}\p{N} _-]/u.test(c))
    .join('')
    .trim()
    .replace(/ /g, '_');
  const stamp = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

  return `learning_resources_${safeTask || 'task'}_${stamp}.md`;
}
