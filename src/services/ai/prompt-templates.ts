import { MissingVariableError, TemplateNotFoundError } from '../../utils/errors';

export type TemplateName = 'classify_task' | 'estimate_time' | 'recommend_priority';

export interface PromptTemplate {
  name: TemplateName;
  version: number;
  system: string;
  body: string;
  maxTokens: number;
}

export type TemplateVariables = Record<string, string | number | undefined>;

const PLACEHOLDER = /\{\{\s*([a-zA-Z_][a-zA-Z0-9_]*)\s*\}\}/g;

export const DEFAULT_TEMPLATES: PromptTemplate[] = [
  {
    name: 'classify_task',
    version: 1,
    maxTokens: 128,
    system: 'You classify personal and work tasks. Return only valid JSON.',
    body: `Classify this task into a single category.

**Task:** {{description}}

**Known categories:** {{categories}}

Prefer one of the known categories. If none fits, return a short lowercase label of your own.

Return JSON:
{
  "category": "label",
  "confidence": 0.0-1.0
}`,
  },
  {
    name: 'estimate_time',
    version: 1,
    maxTokens: 128,
    system: 'You estimate how long tasks take for one person working focused. Return only valid JSON.',
    body: `Estimate how many minutes this task will take to complete.

**Task:** {{description}}

Return JSON with a whole number of minutes:
{
  "estimated_minutes": 45,
  "confidence": 0.0-1.0
}`,
  },
  {
    name: 'recommend_priority',
    version: 1,
    maxTokens: 128,
    system: 'You triage tasks by urgency and importance. Return only valid JSON.',
    body: `Recommend a priority for this task.

**Task:** {{description}}

**Scoring Guide:**
- urgent: must happen today, blocks others, or has a hard deadline within 24h
- high: important with a near deadline
- medium: worth doing this week
- low: nice to have, no deadline

Return JSON:
{
  "priority": "low|medium|high|urgent",
  "confidence": 0.0-1.0
}`,
  },
];

/**
 * Holds the instruction templates used by the LLM gateway.
 * Rendering is pure: `{{name}}` placeholders are replaced and every one must be supplied.
 */
export class PromptTemplateStore {
  private templates = new Map<string, PromptTemplate>();

  constructor(templates: PromptTemplate[] = DEFAULT_TEMPLATES) {
    for (const template of templates) {
      this.templates.set(template.name, template);
    }
  }

  get(name: string): PromptTemplate {
    const template = this.templates.get(name);
    if (!template) {
      throw new TemplateNotFoundError(name);
    }
    return template;
  }

  /** Names of the placeholders a template expects, in order of first appearance. */
  variablesOf(name: string): string[] {
    const names = new Set<string>();
    for (const match of this.get(name).body.matchAll(PLACEHOLDER)) {
      names.add(match[1]);
    }
    return [...names];
  }

  render(name: string, variables: TemplateVariables): string {
    const template = this.get(name);

    for (const variable of this.variablesOf(name)) {
      if (variables[variable] === undefined) {
        throw new MissingVariableError(name, variable);
      }
    }

    return template.body.replace(PLACEHOLDER, (_match, variable: string) => String(variables[variable]));
  }
}
