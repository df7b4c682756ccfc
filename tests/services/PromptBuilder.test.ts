import { describe, it, expect } from 'vitest';
import { ValidationPolicySchema } from '../../src/config.js';
import { FILE_MANAGER, SchemaRegistry } from '../../src/schemas/SchemaRegistry.js';
import { PromptBuilder } from '../../src/services/PromptBuilder.js';
import { makeTask } from '../mocks/fixtures.js';

describe('PromptBuilder', () => {
  const registry = new SchemaRegistry();
  const builder = new PromptBuilder(registry, ValidationPolicySchema.parse({}), 'You route requests.');

  it('should pass the configured system prompt through', () => {
    expect(builder.build(makeTask()).system).toBe('You route requests.');
  });

  it('should describe the task context', () => {
    const lines = builder
      .build(
        makeTask({
          variant: 'file_manager',
          domain: 'payments',
          persona: 'site reliability engineer',
          queryStyle: 'urgent: Time pressure, terse and abrupt',
          complexity: 'complex',
        })
      )
      .prompt.split('\n');

    expect(lines).toContain('- Domain: payments');
    expect(lines).toContain('- Persona writing the request: site reliability engineer');
    expect(lines).toContain('- Query style: urgent: Time pressure, terse and abrupt');
    expect(lines).toContain('- Tool to call: file_manager');
    expect(lines).toContain(`- Purpose of the tool: ${FILE_MANAGER.intent}`);
  });

  it('should include the tool guidance, reasoning limits and a worked sample', () => {
    const lines = builder.build(makeTask({ variant: 'file_manager' })).prompt.split('\n');

    for (const rule of FILE_MANAGER.guidance) expect(lines).toContain(`- ${rule}`);
    expect(lines).toContain('- Between 8 and 100 words.');
    expect(lines).toContain(`- Use at least one of: ${FILE_MANAGER.reasoningKeywords.join(', ')}.`);
    expect(lines).toContain(JSON.stringify(FILE_MANAGER.sample));
  });

  it('should list the optional arguments in the output shape', () => {
    const prompt = builder.build(makeTask({ variant: 'file_manager' })).prompt;
    expect(prompt).toContain(
      '{"query": string, "reasoning": string, "toolCall": {"tool": "file_manager", "arguments": {...}}}. The query must be at least 5 characters. Optional arguments: content, target_string, replacement_string.'
    );
  });

  it('should number the output constraints', () => {
    const lines = builder.build(makeTask()).prompt.split('\n');
    expect(lines).toContain('1. Never emit null. Leave out any optional argument you do not need.');
    expect(lines).toContain('4. Do not copy the user query into the reasoning.');
  });

  it('should leave out the keyword rule when variant references are not required', () => {
    const lenient = new PromptBuilder(
      registry,
      ValidationPolicySchema.parse({ requireVariantReference: false }),
      'sys'
    );
    expect(lenient.build(makeTask()).prompt).not.toContain('Use at least one of');
  });
});
