import { describe, it, expect } from 'vitest';
import { ProjectPlanner, buildPlanPrompt } from '../backend/src/agents/projectPlanner.js';
import { CodeCompanion, buildCodeExamplePrompt } from '../backend/src/agents/codeCompanion.js';
import { TutorAgent, detectTutorMode } from '../backend/src/agents/tutorAgent.js';
import { ValidationError } from '../backend/src/utils/errors.js';
import { FakeLlm, SAMPLE_BREAKDOWN } from './helpers/fakes.js';

describe('ProjectPlanner', () => {
  it('lists every prerequisite in the prompt', () => {
    const prompt = buildPlanPrompt(SAMPLE_BREAKDOWN);
    expect(prompt).toContain(`**Task Description:**\n${SAMPLE_BREAKDOWN.task_description}\n`);
    expect(prompt).toContain(
      '**Prerequisites:**\n' +
      '- Node.js: JavaScript runtime for the server\n' +
      '- JWT: Token-based authentication\n' +
      '- REST API design: Resource-oriented endpoints\n'
    );
  });

  it('marks an empty prerequisite list', () => {
    const prompt = buildPlanPrompt({ ...SAMPLE_BREAKDOWN, prerequisites: [] });
    expect(prompt).toContain('**Prerequisites:**\n- (none identified)\n');
  });

  it('returns the model text verbatim', async () => {
    const llm = new FakeLlm(() => '1. Set up the project\n2. Ship it');
    const plan = await new ProjectPlanner(llm).generatePlan(SAMPLE_BREAKDOWN);
    expect(plan).toBe('1. Set up the project\n2. Ship it');
    expect(llm.calls[0].kind).toBe('text');
  });
});

describe('CodeCompanion', () => {
  it('quotes the task as context', () => {
    const prompt = buildCodeExamplePrompt('JWT', 'Build an API');
    expect(prompt).toContain('**Concept:**\nJWT\n');
    expect(prompt).toContain('The user is working on the task: "Build an API"');
  });

  it('rejects a blank concept', async () => {
    const llm = new FakeLlm(() => 'code');
    await expect(new CodeCompanion(llm).getCodeExample('  ', 'Build an API')).rejects.toThrow(ValidationError);
    expect(llm.calls).toHaveLength(0);
  });

  it('returns the example verbatim', async () => {
    const llm = new FakeLlm(() => '```js\nconsole.log(1)\n```');
    const code = await new CodeCompanion(llm).getCodeExample(' JWT ', 'Build an API');
    expect(code).toBe('```js\nconsole.log(1)\n```');
    expect(llm.calls[0].userPrompt).toContain('**Concept:**\nJWT\n');
  });
});

describe('TutorAgent', () => {
  it('detects pasted errors', () => {
    expect(detectTutorMode('TypeError: Cannot read properties of undefined')).toBe('error');
    expect(detectTutorMode('Traceback (most recent call last):')).toBe('error');
    expect(detectTutorMode('What is a refresh token?')).toBe('question');
  });

  it('uses the debugging prompt for errors', async () => {
    const llm = new FakeLlm(() => 'explanation');
    await new TutorAgent(llm).respond('ReferenceError: app is not defined', 'Build an API');

    expect(llm.calls[0].systemPrompt).toBe(
      'You are a helpful debugging assistant helping a student understand an error.'
    );
    expect(llm.calls[0].userPrompt).toContain('**Error Message / Code:**\nReferenceError: app is not defined\n');
  });

  it('uses the question prompt otherwise', async () => {
    const llm = new FakeLlm(() => 'answer');
    const answer = await new TutorAgent(llm).respond('How do refresh tokens work?', 'Build an API');

    expect(answer).toBe('answer');
    expect(llm.calls[0].userPrompt).toContain("**Student's Question:**\nHow do refresh tokens work?\n");
    expect(llm.calls[0].userPrompt).toContain("**Student's Task:**\nBuild an API\n");
  });

  it('rejects an empty query', async () => {
    const llm = new FakeLlm(() => 'answer');
    await expect(new TutorAgent(llm).respond('', 'Build an API')).rejects.toThrow('Query is required');
  });
});
