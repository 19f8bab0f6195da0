import { describe, it, expect } from 'vitest';
import {
  exportFilename,
  formatTimestamp,
  priorityBadge,
  renderMarkdown
} from '../backend/src/services/markdownExporter.js';
import { ResourcesByConcept, TaskBreakdown } from '../backend/src/types/index.js';

// Local time: the export is stamped in the machine's timezone
const GENERATED_AT = new Date(2026, 0, 5, 9, 3, 7);

const BREAKDOWN: TaskBreakdown = {
  task_description: 'Build a REST API with JWT',
  prerequisites: [
    { name: 'Node.js', category: 'technology', description: 'JavaScript runtime', priority: 0 },
    { name: 'JWT', category: 'concept', description: 'Token-based auth', priority: 1 },
    { name: 'REST API design', category: 'concept', description: '', priority: 2 }
  ],
  suggested_learning_order: ['Node.js', 'JWT', 'REST API design'],
  estimated_complexity: 'intermediate'
};

const RESOURCES: ResourcesByConcept = {
  JWT: [
    { title: 'JWT Introduction', url: 'https://jwt.io/introduction', description: 'What JSON Web Tokens are', source: 'jwt.io' }
  ],
  'REST API design': []
};

describe('formatTimestamp', () => {
  it('zero-pads every field', () => {
    expect(formatTimestamp(GENERATED_AT)).toBe('2026-01-05 09:03:07');
  });
});

describe('priorityBadge', () => {
  it('maps priorities to labels', () => {
    expect(priorityBadge(0)).toBe('🔴 High');
    expect(priorityBadge(1)).toBe('🟡 Medium');
    expect(priorityBadge(2)).toBe('🟢 Low');
    expect(priorityBadge(7)).toBe('🟢 Low');
  });
});

describe('renderMarkdown', () => {
  it('renders the full document', () => {
    expect(renderMarkdown(BREAKDOWN, RESOURCES, GENERATED_AT)).toBe([
      '# Learning Resources for: Build a REST API with JWT',
      '',
      '**Generated:** 2026-01-05 09:03:07  ',
      '**Estimated Complexity:** Intermediate',
      '',
      '## Task Description',
      '',
      'Build a REST API with JWT',
      '',
      '## Prerequisites',
      '',
      '### Technology',
      '',
      '- **Node.js** (🔴 High)',
      '  - JavaScript runtime',
      '',
      '### Concept',
      '',
      '- **JWT** (🟡 Medium)',
      '  - Token-based auth',
      '- **REST API design** (🟢 Low)',
      '',
      '## Suggested Learning Order',
      '',
      '1. Node.js',
      '2. JWT',
      '3. REST API design',
      '',
      '## Learning Resources',
      '',
      '### JWT',
      '',
      '1. [JWT Introduction](https://jwt.io/introduction)',
      '   - What JSON Web Tokens are',
      '',
      '---',
      '',
      '*Generated by LearnPath*',
      ''
    ].join('\n'));
  });

  it('omits the learning order when there is none', () => {
    const markdown = renderMarkdown({ ...BREAKDOWN, suggested_learning_order: [] }, {}, GENERATED_AT);
    expect(markdown).not.toContain('## Suggested Learning Order');
    expect(markdown).toContain('## Learning Resources\n\n---\n');
  });
});

describe('exportFilename', () => {
  it('uses the first 30 characters of the task', () => {
    expect(exportFilename('Build a REST API with JWT authentication in Node.js', GENERATED_AT)).toBe(
      'learning_resources_Build_a_REST_API_with_JWT_auth_20260105_090307.md'
    );
  });

  it('strips punctuation', () => {
    expect(exportFilename('C++ / Rust?!', GENERATED_AT)).toBe('learning_resources_C__Rust_20260105_090307.md');
  });

  it('falls back when nothing usable is left', () => {
    expect(exportFilename('???', GENERATED_AT)).toBe('learning_resources_task_20260105_090307.md');
  });
});
