/**
 * Structural schemas for every tool-call variant.
 * Unknown keys are stripped by zod's default object behaviour, so extra
 * fields a backend invents never reach a persisted record.
 */

import { z } from 'zod';

/** Field shared by every variant; its value selects the variant schema. */
export const DISCRIMINATOR = 'tool';

const nonEmpty = (field: string) =>
  z.string({ required_error: `${field} is required` }).trim().min(1, `${field} must not be empty`);

export const codebaseSearchSchema = z.object({
  tool: z.literal('codebase_search'),
  arguments: z.object({
    query: nonEmpty('query'),
    mode: z.enum(['exact', 'semantic', 'hybrid']),
    file_pattern: z.string().nullish(),
  }),
});

export const fileManagerSchema = z.object({
  tool: z.literal('file_manager'),
  arguments: z.object({
    operation: z.enum(['list', 'read', 'write', 'patch']),
    path: nonEmpty('path'),
    content: z.string().nullish(),
    target_string: z.string().nullish(),
    replacement_string: z.string().nullish(),
  }),
});

export const sandboxExecSchema = z.object({
  tool: z.literal('sandbox_exec'),
  arguments: z.object({
    code: nonEmpty('code'),
    timeout: z.number().int().positive().max(600).nullish(),
  }),
});

export const askHumanSchema = z.object({
  tool: z.literal('ask_human'),
  arguments: z.object({
    question: nonEmpty('question'),
    context: z.string().nullish(),
  }),
});

export type CodebaseSearchCall = z.infer<typeof codebaseSearchSchema>;
export type FileManagerCall = z.infer<typeof fileManagerSchema>;
export type SandboxExecCall = z.infer<typeof sandboxExecSchema>;
export type AskHumanCall = z.infer<typeof askHumanSchema>;

export type ToolCall = CodebaseSearchCall | FileManagerCall | SandboxExecCall | AskHumanCall;
export type ToolName = ToolCall['tool'];

export const TOOL_NAMES: readonly ToolName[] = [
  'codebase_search',
  'file_manager',
  'sandbox_exec',
  'ask_human',
];

export type SearchMode = CodebaseSearchCall['arguments']['mode'];
export type FileOperation = FileManagerCall['arguments']['operation'];
