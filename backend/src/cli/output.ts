import chalk from 'chalk';
import { ResourcesByConcept, TaskBreakdown } from '../types/index.js';

const PRIORITY_LABELS: Record<number, string> = { 0: 'High', 1: 'Medium', 2: 'Low' };

const COMPLEXITY_COLORS = {
  beginner: chalk.green,
  intermediate: chalk.yellow,
  advanced: chalk.red
};

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export function printBreakdown(breakdown: TaskBreakdown): void {
  console.log(chalk.cyan.bold('\n📋 Task Analysis'));
  console.log(`${chalk.bold('Task:')} ${breakdown.task_description}`);

  const color = COMPLEXITY_COLORS[breakdown.estimated_complexity];
  console.log(`${chalk.bold('Estimated Complexity:')} ${color(breakdown.estimated_complexity)}`);

  if (breakdown.prerequisites.length > 0) {
    console.log(chalk.magenta.bold('\n#   Prerequisite                        Category     Priority'));
    breakdown.prerequisites.forEach((prereq, i) => {
      console.log(
        `${chalk.dim(String(i + 1).padEnd(3))} ${chalk.cyan(truncate(prereq.name, 34).padEnd(35))} ` +
        `${chalk.yellow(prereq.category.padEnd(12))} ${chalk.green(PRIORITY_LABELS[prereq.priority] ?? 'N/A')}`
      );
    });
  }

  if (breakdown.suggested_learning_order.length > 0) {
    console.log(chalk.cyan.bold('\nSuggested Learning Order:'));
    breakdown.suggested_learning_order.slice(0, 10).forEach((step, i) => {
      console.log(`  ${i + 1}. ${step}`);
    });
  }
}

export function printResources(resources: ResourcesByConcept): void {
  console.log(chalk.green.bold('\n🌐 Learning Resources'));

  const total = Object.values(resources).reduce((sum, list) => sum + list.length, 0);
  if (total === 0) {
    console.log(chalk.yellow('⚠️  No learning resources found. Check your network connection and search API key, or try a different task description.'));
    return;
  }

  for (const [concept, list] of Object.entries(resources)) {
    if (list.length === 0) continue;
    console.log(chalk.cyan.bold(`\n${concept}`));
    for (const resource of list) {
      console.log(`  • ${truncate(resource.title, 60)}`);
      console.log(`    ${chalk.blue(resource.url)}`);
    }
  }
}

export function printSection(title: string, body: string): void {
  console.log(chalk.magenta.bold(`\n${title}`));
  console.log(body);
}
