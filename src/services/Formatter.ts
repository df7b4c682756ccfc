/**
 * Formatter: renders admitted examples into the chat-template text the
 * trainer consumes, and parses that text back for audits.
 *
 * A record that reaches render() without a registered variant, a valid
 * structure or with a null sentinel left in it is a defect upstream:
 * ContractViolationError, never a silent fix.
 */

import { ContractViolationError } from '../errors.js';
import type { SchemaRegistry } from '../schemas/SchemaRegistry.js';
import type { Example, ToolCall } from '../types/models.js';
import { isRecord } from '../utils/guards.js';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatTemplate {
  /** Control tokens that must never appear inside message content. */
  readonly reservedTokens: readonly string[];
  render(messages: ChatMessage[]): string;
  parse(text: string): ChatMessage[];
}

export interface FormattedParts {
  query: string;
  reasoning: string;
  toolCall: ToolCall;
}

// ── Llama 3 instruct template ──

const BEGIN = '<|begin_of_text|>';
const HEADER_START = '<|start_header_id|>';
const HEADER_END = '<|end_header_id|>';
const EOT = '<|eot_id|>';
export const LLAMA3_RESERVED_TOKENS: readonly string[] = [BEGIN, HEADER_START, HEADER_END, EOT];

const TURN = /<\|start_header_id\|>(system|user|assistant)<\|end_header_id\|>\n\n([\s\S]*?)<\|eot_id\|>/g;

function isChatRole(value: string): value is ChatRole {
  return value === 'system' || value === 'user' || value === 'assistant';
}

export class Llama3ChatTemplate implements ChatTemplate {
  readonly reservedTokens = LLAMA3_RESERVED_TOKENS;

  render(messages: ChatMessage[]): string {
    let text = BEGIN;
    for (const message of messages) {
      const token = this.reservedTokens.find((t) => message.content.includes(t));
      if (token) {
        throw new ContractViolationError(`${message.role} message contains the reserved token ${token}`);
      }
      text += `${HEADER_START}${message.role}${HEADER_END}\n\n${message.content}${EOT}`;
    }
    return text;
  }

  parse(text: string): ChatMessage[] {
    if (!text.startsWith(BEGIN)) {
      throw new ContractViolationError('Text does not start with <|begin_of_text|>');
    }
    const messages: ChatMessage[] = [];
    for (const match of text.matchAll(TURN)) {
      const role = match[1];
      if (isChatRole(role)) messages.push({ role, content: match[2] });
    }
    return messages;
  }
}

// ── Service ──

export class Formatter {
  constructor(
    private readonly registry: SchemaRegistry,
    private readonly systemPrompt: string,
    private readonly template: ChatTemplate = new Llama3ChatTemplate()
  ) {}

  get reservedTokens(): readonly string[] {
    return this.template.reservedTokens;
  }

  render(example: Example): string {
    const toolCall = this.checkToolCall(example.toolCall);
    return this.template.render([
      { role: 'system', content: this.systemPrompt },
      { role: 'user', content: example.query },
      { role: 'assistant', content: JSON.stringify({ reasoning: example.reasoning, toolCall }) },
    ]);
  }

  parse(text: string): FormattedParts {
    const messages = this.template.parse(text);
    const user = messages.find((m) => m.role === 'user');
    const assistant = messages.find((m) => m.role === 'assistant');
    if (!user || !assistant) {
      throw new ContractViolationError('Rendered text lacks a user or assistant turn');
    }

    let target: unknown;
    try {
      target = JSON.parse(assistant.content);
    } catch (err) {
      throw new ContractViolationError('Assistant turn is not JSON', {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    if (!isRecord(target) || typeof target.reasoning !== 'string') {
      throw new ContractViolationError('Assistant turn lacks reasoning');
    }

    return {
      query: user.content,
      reasoning: target.reasoning,
      toolCall: this.checkToolCall(target.toolCall),
    };
  }

  /** Registry lookup, structural check and null-sentinel check. */
  private checkToolCall(value: unknown): ToolCall {
    const tag = isRecord(value) ? value[this.registry.discriminator] : undefined;
    const variant = this.registry.get(tag);
    if (!variant) {
      throw new ContractViolationError(`Unregistered tool ${JSON.stringify(tag)}`);
    }

    const parsed = variant.parse(value);
    if (!parsed.ok) {
      throw new ContractViolationError(`Invalid ${variant.tag} call`, { issues: parsed.issues });
    }

    for (const [field, sentinels] of Object.entries(variant.nullSentinels)) {
      const args: Record<string, unknown> = parsed.call.arguments;
      const current = args[field];
      if (field in args && sentinels.some((sentinel) => sentinel === current)) {
        throw new ContractViolationError(`${variant.tag}.${field} holds a null sentinel`, { field });
      }
    }
    return parsed.call;
  }
}
