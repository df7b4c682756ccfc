/**
 * Closed registry of tool-call variants.
 * Lookup is a single map read keyed by the discriminator value; an unknown
 * tag yields nothing, so callers can never fall through to another schema.
 */

import type { z } from 'zod';
import type { FieldIssue, TaskComplexity } from '../types/models.js';
import {
  DISCRIMINATOR,
  askHumanSchema,
  codebaseSearchSchema,
  fileManagerSchema,
  sandboxExecSchema,
  type AskHumanCall,
  type CodebaseSearchCall,
  type FileManagerCall,
  type SandboxExecCall,
  type ToolCall,
  type ToolName,
} from './toolCalls.js';
import {
  checkAskHuman,
  checkCodebaseSearch,
  checkFileManager,
  checkSandboxExec,
  type DomainContext,
} from './domainRules.js';

/** A value that counts as "not set" for an optional argument. */
export type NullSentinel = null | '';

type ArgumentsOf<T extends ToolCall> = T['arguments'];

export interface VariantSpec<T extends ToolCall> {
  tag: T['tool'];
  /** What the variant is for; used when prompting backends. */
  intent: string;
  /** When to choose this tool and the mistakes to avoid. */
  guidance: string[];
  complexity: TaskComplexity;
  /** Lowercase stems; reasoning must mention at least one. */
  reasoningKeywords: string[];
  /** Optional arguments and the values that count as empty for each. */
  nullSentinels: Partial<Record<keyof ArgumentsOf<T> & string, readonly NullSentinel[]>>;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  checkDomainLogic: (call: T, ctx: DomainContext) => string[];
  sample: { query: string; reasoning: string; toolCall: T };
}

export type ParsedVariant =
  | {
      ok: true;
      call: ToolCall;
      /** Runs the variant's domain predicate against the parsed call. */
      checkDomainLogic: (ctx: DomainContext) => string[];
    }
  | { ok: false; issues: FieldIssue[] };

/** Type-erased view of a variant, safe to store next to the others. */
export interface RegisteredVariant {
  readonly tag: ToolName;
  readonly intent: string;
  readonly guidance: readonly string[];
  readonly complexity: TaskComplexity;
  readonly reasoningKeywords: readonly string[];
  readonly nullSentinels: Readonly<Record<string, readonly NullSentinel[]>>;
  readonly sample: { query: string; reasoning: string; toolCall: ToolCall };
  parse(value: unknown): ParsedVariant;
}

export function defineVariant<T extends ToolCall>(spec: VariantSpec<T>): RegisteredVariant {
  const nullSentinels: Record<string, readonly NullSentinel[]> = {};
  for (const [field, sentinels] of Object.entries<readonly NullSentinel[] | undefined>(spec.nullSentinels)) {
    if (sentinels) nullSentinels[field] = sentinels;
  }

  return {
    tag: spec.tag,
    intent: spec.intent,
    guidance: spec.guidance,
    complexity: spec.complexity,
    reasoningKeywords: spec.reasoningKeywords,
    nullSentinels,
    sample: spec.sample,
    parse(value: unknown): ParsedVariant {
      const result = spec.schema.safeParse(value);
      if (!result.success) {
        return {
          ok: false,
          issues: result.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        };
      }
      const call = result.data;
      return {
        ok: true,
        call,
        checkDomainLogic: (ctx) => spec.checkDomainLogic(call, ctx),
      };
    },
  };
}

// ── Built-in variants ──

export const CODEBASE_SEARCH = defineVariant<CodebaseSearchCall>({
  tag: 'codebase_search',
  intent:
    'Locate code: trace where logic lives, find usages of a symbol, discover how a feature is wired, or explore an unfamiliar module.',
  guidance: [
    'Use when the user does not know the file path.',
    "mode 'exact' only when the query names a literal symbol (UserService, validate_token, MAX_RETRIES).",
    "mode 'semantic' when the query describes a concept in plain words.",
    "mode 'hybrid' for a mix of both.",
    'Include file_pattern only when the user limits the scope ("in tests", "*.yaml files").',
    'A query that names an explicit file path belongs to file_manager instead.',
  ],
  complexity: 'simple',
  reasoningKeywords: ['search', 'find', 'locate', 'look', 'grep', 'codebase', 'trace'],
  nullSentinels: { file_pattern: [null, ''] },
  schema: codebaseSearchSchema,
  checkDomainLogic: checkCodebaseSearch,
  sample: {
    query: 'Where do we retry failed webhook deliveries?',
    reasoning:
      'The user describes retry behaviour without naming a symbol, so a semantic codebase search will find where webhook retries are implemented.',
    toolCall: {
      tool: 'codebase_search',
      arguments: { query: 'webhook delivery retry', mode: 'semantic' },
    },
  },
});

export const FILE_MANAGER = defineVariant<FileManagerCall>({
  tag: 'file_manager',
  intent:
    'Operate on a file the user names explicitly: list a directory, read a file, write a new file, or patch a string in place.',
  guidance: [
    'The user query MUST contain the exact path that appears in arguments.path.',
    'read and list need only path; write needs content; patch needs target_string and replacement_string.',
    'Omit every argument the operation does not use.',
    'A request without a path is a codebase_search or ask_human case, not file_manager.',
  ],
  complexity: 'complex',
  reasoningKeywords: ['file', 'read', 'write', 'patch', 'list', 'edit', 'update', 'open', 'directory', 'path', 'replace'],
  nullSentinels: {
    content: [null, ''],
    target_string: [null, ''],
    replacement_string: [null],
  },
  schema: fileManagerSchema,
  checkDomainLogic: checkFileManager,
  sample: {
    query: 'Bump the request timeout from 30 to 45 in config/http.yaml',
    reasoning:
      'The user gave the exact file config/http.yaml and the value to change, so I will patch the timeout line in that file.',
    toolCall: {
      tool: 'file_manager',
      arguments: {
        operation: 'patch',
        path: 'config/http.yaml',
        target_string: 'timeout: 30',
        replacement_string: 'timeout: 45',
      },
    },
  },
});

export const SANDBOX_EXEC = defineVariant<SandboxExecCall>({
  tag: 'sandbox_exec',
  intent:
    'Run a short, self-contained Python snippet: check an algorithm, reproduce a bug, test a regex, or compute a value.',
  guidance: [
    'code must be valid, runnable Python that prints its result.',
    'Keep snippets focused; never touch the filesystem destructively or spawn shells.',
    'Set timeout only when the user mentions a time limit.',
  ],
  complexity: 'simple',
  reasoningKeywords: ['run', 'execute', 'sandbox', 'test', 'evaluate', 'verify', 'snippet', 'compute', 'benchmark', 'check'],
  nullSentinels: { timeout: [null] },
  schema: sandboxExecSchema,
  checkDomainLogic: checkSandboxExec,
  sample: {
    query: 'Does this regex accept ISO dates like 2024-02-29? ^\\d{4}-\\d{2}-\\d{2}$',
    reasoning:
      'Running the pattern against a sample date in the sandbox will verify directly whether the regex accepts it.',
    toolCall: {
      tool: 'sandbox_exec',
      arguments: {
        code: "import re\nprint(bool(re.match(r'^\\d{4}-\\d{2}-\\d{2}$', '2024-02-29')))",
      },
    },
  },
});

export const ASK_HUMAN = defineVariant<AskHumanCall>({
  tag: 'ask_human',
  intent:
    'Escalate to the user: the request is ambiguous, destructive, needs approval, or depends on business rules the agent cannot know.',
  guidance: [
    'The user query is the trigger (vague or risky); the question is what the agent asks back.',
    'Ask one specific question and put the reason in context.',
    'Use for destructive operations such as dropping tables or deleting data.',
  ],
  complexity: 'complex',
  reasoningKeywords: ['ask', 'clarif', 'confirm', 'human', 'approval', 'permission', 'ambiguous', 'unclear', 'user'],
  nullSentinels: { context: [null, ''] },
  schema: askHumanSchema,
  checkDomainLogic: checkAskHuman,
  sample: {
    query: 'Drop the old sessions table, we do not need it anymore',
    reasoning:
      'Dropping a table is irreversible, so I should ask the user to confirm which table and whether a backup exists first.',
    toolCall: {
      tool: 'ask_human',
      arguments: {
        question: 'Should I drop the sessions table in production or only in staging?',
        context: 'Dropping a table permanently deletes its rows.',
      },
    },
  },
});

export class SchemaRegistry {
  readonly discriminator = DISCRIMINATOR;
  private readonly variants = new Map<string, RegisteredVariant>();

  constructor(variants: RegisteredVariant[] = [CODEBASE_SEARCH, FILE_MANAGER, SANDBOX_EXEC, ASK_HUMAN]) {
    for (const variant of variants) {
      if (this.variants.has(variant.tag)) {
        throw new Error(`Variant "${variant.tag}" registered twice`);
      }
      this.variants.set(variant.tag, variant);
    }
  }

  /** Closed-world lookup: anything that is not a registered tag returns undefined. */
  get(tag: unknown): RegisteredVariant | undefined {
    return typeof tag === 'string' ? this.variants.get(tag) : undefined;
  }

  has(tag: unknown): boolean {
    return this.get(tag) !== undefined;
  }

  /** Lookup for tags already known to be valid. */
  require(tag: ToolName): RegisteredVariant {
    const variant = this.variants.get(tag);
    if (!variant) throw new Error(`Variant "${tag}" is not registered`);
    return variant;
  }

  tags(): ToolName[] {
    return [...this.variants.values()].map((v) => v.tag);
  }
}
