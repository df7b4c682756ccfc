/**
 * PromptBuilder: turns a GenerationTask into the system and user messages
 * sent to a backend. One task, one example per request.
 */

import type { ValidationPolicy } from '../config.js';
import type { SchemaRegistry, RegisteredVariant } from '../schemas/SchemaRegistry.js';
import type { GenerationTask } from '../types/models.js';

export interface BuiltPrompt {
  system: string;
  prompt: string;
}

const NEGATIVE_CONSTRAINTS = [
  'Never emit null. Leave out any optional argument you do not need.',
  'No markdown and no code fences: return the raw JSON object only.',
  'Return exactly one JSON object.',
  'Do not copy the user query into the reasoning.',
];

export class PromptBuilder {
  constructor(
    private readonly registry: SchemaRegistry,
    private readonly policy: ValidationPolicy,
    private readonly systemPrompt: string
  ) {}

  build(task: GenerationTask): BuiltPrompt {
    const variant = this.registry.require(task.variant);

    const sections = [
      '# Task',
      'Write one realistic training example: a developer request, the reasoning of an agent that reads it, and the single tool call that agent makes.',
      '',
      '# Context',
      `- Domain: ${task.domain}`,
      `- Persona writing the request: ${task.persona}`,
      `- Query style: ${task.queryStyle}`,
      `- Tool to call: ${variant.tag}`,
      `- Purpose of the tool: ${variant.intent}`,
      '',
      '# Tool rules',
      ...variant.guidance.map((line) => `- ${line}`),
      '',
      '# Reasoning rules',
      `- Between ${this.policy.minReasoningWords} and ${this.policy.maxReasoningWords} words.`,
      `- Say what the agent will do, why ${variant.tag} fits, and what the call returns.`,
      ...(this.policy.requireVariantReference
        ? [`- Use at least one of: ${variant.reasoningKeywords.join(', ')}.`]
        : []),
      '',
      '# Output shape',
      this.describeShape(variant),
      '',
      '# Example',
      JSON.stringify(variant.sample),
      '',
      '# Constraints',
      ...NEGATIVE_CONSTRAINTS.map((line, i) => `${i + 1}. ${line}`),
    ];

    return { system: this.systemPrompt, prompt: sections.join('\n') };
  }

  private describeShape(variant: RegisteredVariant): string {
    const optional = Object.keys(variant.nullSentinels);
    const optionalNote =
      optional.length > 0 ? ` Optional arguments: ${optional.join(', ')}.` : '';
    return (
      `{"query": string, "reasoning": string, "toolCall": {"tool": "${variant.tag}", "arguments": {...}}}.` +
      ` The query must be at least ${this.policy.minQueryLength} characters.${optionalNote}`
    );
  }
}
