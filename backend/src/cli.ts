#!/usr/bin/env node
/**
 * LearnPath CLI
 *
 * Usage: learnpath "<task>" [options]
 */

import meow from 'meow';
import chalk from 'chalk';
import { loadConfig, loadEnvFile } from './config/env.js';
import { buildOrchestrator } from './bootstrap.js';
import { parseKnownIndices, resolveTaskDescription, writeMarkdownFile } from './cli/args.js';
import { printBreakdown, printResources, printSection } from './cli/output.js';
import { errorMessage } from './utils/errors.js';

const CLI_SESSION_ID = 'cli';

const cli = meow(`
  Usage
    $ learnpath "<task description>" [options]

  Options
    --file, -f     Read the task from a .txt or .docx file
    --known, -k    Numbers of prerequisites you already know, e.g. "1 3 4"
    --save, -s     Save the analysis and resources to a markdown file
    --output, -o   Custom output path for the markdown file (implies --save)
    --plan         Generate a project plan
    --code         Get a code example for a concept
    --ask          Ask the tutor a question or paste an error
    --no-color     Disable colors

  Examples
    $ learnpath "Build a REST API with JWT authentication"
    $ learnpath --file my_task.txt --save
    $ learnpath "Create a machine learning model" --known "1 2" --plan
    $ learnpath "Build a web scraper" --output my_resources.md --code "HTTP requests"
`, {
  importMeta: import.meta,
  flags: {
    file: { type: 'string', shortFlag: 'f' },
    known: { type: 'string', shortFlag: 'k' },
    save: { type: 'boolean', shortFlag: 's', default: false },
    output: { type: 'string', shortFlag: 'o' },
    plan: { type: 'boolean', default: false },
    code: { type: 'string' },
    ask: { type: 'string' },
    color: { type: 'boolean', default: true }
  }
});

if (!cli.flags.color || process.env.NO_COLOR) chalk.level = 0;

async function main(): Promise<number> {
  loadEnvFile();
  const config = loadConfig();
  const orchestrator = buildOrchestrator(config);

  try {
    const task = await resolveTaskDescription(cli.input, cli.flags.file);
    const known = parseKnownIndices(cli.flags.known);

    console.log(chalk.cyan('🔎 Analyzing task...'));
    const breakdown = await orchestrator.analyzeTask(CLI_SESSION_ID, task);
    printBreakdown(breakdown);

    const outOfRange = known.filter(i => i >= breakdown.prerequisites.length);
    if (outOfRange.length > 0) {
      console.log(chalk.yellow(`Ignoring unknown prerequisite numbers: ${outOfRange.map(i => i + 1).join(', ')}`));
    }

    console.log(chalk.cyan('\n📚 Searching for learning resources...'));
    const resources = await orchestrator.findResources(CLI_SESSION_ID, known);
    printResources(resources);

    if (cli.flags.plan) {
      printSection('📝 Project Plan', await orchestrator.generatePlan(CLI_SESSION_ID));
    }
    if (cli.flags.code) {
      printSection('💻 Code Example', await orchestrator.getCodeExample(CLI_SESSION_ID, cli.flags.code));
    }
    if (cli.flags.ask) {
      printSection('🧠 Tutor Response', await orchestrator.askTutor(CLI_SESSION_ID, cli.flags.ask));
    }

    if (cli.flags.save || cli.flags.output) {
      const { markdown, filename } = orchestrator.exportMarkdown(CLI_SESSION_ID);
      const savedTo = await writeMarkdownFile(markdown, filename, cli.flags.output);
      console.log(chalk.green(`\n✓ Results saved to: ${savedTo}`));
    }

    console.log(chalk.yellow.bold('\nHappy learning!'));
    return 0;
  } catch (error) {
    console.error(chalk.red('Error:'), errorMessage(error));
    return 1;
  }
}

main().then(code => {
  process.exitCode = code;
});
