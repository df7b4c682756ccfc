/**
 * Domain-logic predicates ("anti-hallucination" rules).
 * Each takes a structurally valid call and returns the list of violated
 * rules; an empty list means the call is consistent with its query.
 */

import type { ValidationPolicy } from '../config.js';
import type {
  AskHumanCall,
  CodebaseSearchCall,
  FileManagerCall,
  SandboxExecCall,
} from './toolCalls.js';

export interface DomainContext {
  /** The user query the call must be traceable to. */
  query: string;
  reasoning: string;
  policy: ValidationPolicy;
}

const SYMBOL_PATTERNS: RegExp[] = [
  /`([^`\s][^`]*)`/, // back-ticked span
  /\b([A-Za-z_][\w.]*\(\))/, // call syntax: validate()
  /\b([A-Za-z][A-Za-z0-9]*(?:_[A-Za-z0-9]+)+)\b/, // snake_case / SCREAMING_SNAKE
  /\b([a-z][a-z0-9]*(?:[A-Z][a-z0-9]*)+)\b/, // camelCase
  /\b([A-Z][a-z0-9]+(?:[A-Z][a-z0-9]*)+)\b/, // PascalCase with two or more humps
  /\b([\w-]+\.(?:ts|tsx|js|jsx|py|go|rs|java|kt|rb|php|cs|json|ya?ml|toml|sql|sh))\b/, // file name
  /\b(?:class|def|fn|func|interface|struct|enum|type)\s+([A-Z]\w*)/, // class User
];

/** Returns the first literal code symbol named in the text, if any. */
export function detectLiteralSymbol(text: string): string | undefined {
  for (const pattern of SYMBOL_PATTERNS) {
    const match = pattern.exec(text);
    if (match?.[1]) return match[1];
  }
  return undefined;
}

export function normalizePath(path: string): string {
  return path.trim().replace(/^\.\//, '').replace(/\/+$/, '');
}

const isBlank = (value: string | null | undefined): boolean =>
  value === null || value === undefined || value.trim() === '';

export function checkCodebaseSearch(call: CodebaseSearchCall, ctx: DomainContext): string[] {
  const violations: string[] = [];
  const { query, mode } = call.arguments;
  const term = query.trim();

  if (term.length < ctx.policy.minSearchQueryLength) {
    violations.push(
      `Search term "${term}" is shorter than ${ctx.policy.minSearchQueryLength} characters`
    );
  }

  const generic = ctx.policy.genericSearchTerms.map((t) => t.toLowerCase());
  if (generic.includes(term.toLowerCase())) {
    violations.push(`Search term "${term}" is too generic`);
  }

  if (ctx.policy.enforceSearchMode) {
    const symbol = detectLiteralSymbol(ctx.query);
    if (mode === 'exact' && symbol === undefined) {
      violations.push("Mode 'exact' requires the query to name a literal symbol");
    }
    if (mode === 'semantic' && symbol !== undefined) {
      violations.push(`Mode 'semantic' used although the query names the symbol "${symbol}"`);
    }
  }

  return violations;
}

export function checkFileManager(call: FileManagerCall, ctx: DomainContext): string[] {
  const violations: string[] = [];
  const { operation, path, content, target_string, replacement_string } = call.arguments;

  if (ctx.policy.requireExplicitPath) {
    const normalized = normalizePath(path);
    if (normalized === '' || !ctx.query.includes(normalized)) {
      violations.push(`Path "${path}" does not appear in the query`);
    }
  }

  if (operation === 'write' && isBlank(content)) {
    violations.push("Operation 'write' requires content");
  }
  if (operation !== 'write' && !isBlank(content)) {
    violations.push(`Operation '${operation}' must not carry content`);
  }

  if (operation === 'patch') {
    if (isBlank(target_string)) {
      violations.push("Operation 'patch' requires target_string");
    }
    // An empty replacement deletes the target, so only null counts as missing.
    if (replacement_string === null || replacement_string === undefined) {
      violations.push("Operation 'patch' requires replacement_string");
    } else if (replacement_string === target_string) {
      violations.push('Patch target and replacement are identical');
    }
  } else if (!isBlank(target_string) || !isBlank(replacement_string)) {
    violations.push(`Operation '${operation}' must not carry patch strings`);
  }

  return violations;
}

export function checkSandboxExec(call: SandboxExecCall, ctx: DomainContext): string[] {
  const code = call.arguments.code;
  const found = ctx.policy.dangerousCodePatterns.filter((pattern) => code.includes(pattern));
  return found.length > 0 ? [`Sandbox code contains dangerous patterns: ${found.join(', ')}`] : [];
}

const INTERROGATIVES = new Set([
  'what', 'how', 'which', 'where', 'when', 'who', 'why',
  'should', 'shall', 'can', 'could', 'would', 'may',
]);

export function checkAskHuman(call: AskHumanCall, ctx: DomainContext): string[] {
  const question = call.arguments.question.trim();
  if (question.length < 5) {
    return ['Escalation question is too short'];
  }

  const readsAsQuestion =
    question.includes('?') ||
    question
      .toLowerCase()
      .split(/[^a-z']+/)
      .some((word) => INTERROGATIVES.has(word));
  if (!readsAsQuestion) {
    const query = ctx.query.toLowerCase();
    const risky = ctx.policy.dangerousKeywords.some((keyword) => query.includes(keyword));
    if (!risky) {
      return ['Escalation does not ask a question and the query is not a risky operation'];
    }
  }
  return [];
}
