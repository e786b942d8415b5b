/**
 * @fileoverview Response Extractor - turns free-text model replies into actions.
 *
 * Model output is unreliable: prose around the object, trailing commas,
 * comments, markdown fences, stray quotes. Extraction runs a strict-then-
 * lenient chain and always produces an {@link Action}:
 *
 * 1. balanced-brace scan for candidate objects, in order of appearance
 * 2. strict `JSON.parse` of each candidate (first plain object wins)
 * 3. cleanup of each candidate, then a best-effort quote repair
 * 4. fenced code blocks and inline backtick spans
 * 5. line-by-line field scan with fixed defaults
 *
 * Everything here is pure and deterministic. Nothing throws.
 *
 * @module taskpilot/parsing/response-extractor
 */

import type { Action } from '../types/core.types.js';
import { TERMINAL_ACTION, isPlainObject } from '../types/core.types.js';

/**
 * Which stage of the chain produced the action.
 */
export type ExtractionStage = 'strict' | 'cleaned' | 'code_block' | 'field_scan';

export interface ExtractionResult {
  readonly action: Action;
  readonly stage: ExtractionStage;
  /** True when the action came from the field scan or its name was defaulted */
  readonly degraded: boolean;
  /** True when no action name was found and the terminal keyword was used */
  readonly actionDefaulted: boolean;
  /** Human-readable trail of parse attempts and alterations */
  readonly notes: ReadonlyArray<string>;
}

export interface ExtractionOptions {
  /** Action name used when none can be found. Default: `finish` */
  readonly terminalKeyword?: string;
}

/** Thought used by the field scan when the text has none. */
export const NO_THOUGHT_FOUND = 'No clear thought found';

const ACTION_KEYS = ['action', 'tool_name', 'tool'] as const;
const ARGS_KEYS = ['args', 'arguments'] as const;
const THOUGHT_KEYS = ['thought', 'thinking'] as const;

const CODE_BLOCK_PATTERNS: ReadonlyArray<RegExp> = [
  /```json[ \t]*\r?\n([\s\S]*?)```/gi,
  /```[A-Za-z0-9_-]*[ \t]*\r?\n([\s\S]*?)```/g,
  /`([^`]*\{[^`]*\}[^`]*)`/g,
];

const THOUGHT_FIELD = /\b(?:thought|thinking)["']?\s*[:=]\s*/i;
const ACTION_FIELD = /\b(?:action|tool_name|tool)["']?\s*[:=]\s*["']?([A-Za-z0-9_.-]+)/i;
const ARGS_FIELD = /\b(?:args|arguments)["']?\s*[:=]\s*(?=\{)/i;

/**
 * Extracts exactly one action from raw model text.
 *
 * @example
 * ```typescript
 * const { action, degraded } = extractAction('Sure! {"thought": "look", "action": "list_directory", "args": {}}');
 * // action.toolName === 'list_directory', degraded === false
 * ```
 */
export function extractAction(text: string, options: ExtractionOptions = {}): ExtractionResult {
  const terminalKeyword = options.terminalKeyword ?? TERMINAL_ACTION;
  const notes: string[] = [];
  const candidates = findCandidates(text);

  if (candidates.length === 0) {
    notes.push('no balanced {...} candidate found');
  }

  for (const [i, candidate] of candidates.entries()) {
    const parsed = parseObject(candidate);
    if (parsed) {
      return fromObject(parsed, 'strict', terminalKeyword, notes);
    }
    notes.push(`candidate ${i + 1}: strict parse failed`);
  }

  for (const [i, candidate] of candidates.entries()) {
    const parsed = parseLeniently(candidate, notes, `candidate ${i + 1}`);
    if (parsed) {
      return fromObject(parsed, 'cleaned', terminalKeyword, notes);
    }
  }

  const fromBlock = extractFromCodeBlocks(text, notes);
  if (fromBlock) {
    return fromObject(fromBlock, 'code_block', terminalKeyword, notes);
  }

  notes.push('falling back to field scan');
  return scanFields(text, { terminalKeyword }, notes);
}

/**
 * Returns every candidate object in the text that parses, strictly or after
 * cleanup, in order of appearance.
 */
export function extractAll(text: string): Array<Record<string, unknown>> {
  const results: Array<Record<string, unknown>> = [];
  for (const candidate of findCandidates(text)) {
    const parsed = parseObject(candidate) ?? parseLeniently(candidate, [], 'candidate');
    if (parsed) results.push(parsed);
  }
  return results;
}

/**
 * Balanced-brace scan. Each maximal `{...}` substring is a candidate.
 * Double-quoted strings are honored so a brace inside a value does not
 * close the object; a `{` left open that way takes its plain depth-counted
 * match instead. A `{` that never closes is skipped.
 *
 * Both matchings come from one stack pass each, so the scan stays linear
 * however many braces are left open.
 */
export function findCandidates(text: string): string[] {
  const stringAware = matchBraces(text, true);
  const plain = matchBraces(text, false);
  const candidates: string[] = [];
  let i = 0;

  while (i < text.length) {
    const end = text[i] === '{' ? stringAware.get(i) ?? plain.get(i) : undefined;
    if (end === undefined) {
      i++;
      continue;
    }

    candidates.push(text.slice(i, end + 1));
    i = end + 1;
  }

  return candidates;
}

/**
 * Cleanup pass: removes `//` and `/* *\/` comments, turns triple-quoted
 * blocks into JSON strings and strips trailing commas before `}` or `]`.
 * String contents are left untouched. Each kind of change is noted.
 */
export function cleanCandidate(candidate: string): { text: string; changes: string[] } {
  const changes = new Set<string>();
  let out = '';
  let i = 0;

  while (i < candidate.length) {
    const ch = candidate[i];

    if (candidate.startsWith('"""', i) || candidate.startsWith("'''", i)) {
      const fence = candidate.slice(i, i + 3);
      const close = candidate.indexOf(fence, i + 3);
      if (close !== -1) {
        out += JSON.stringify(candidate.slice(i + 3, close));
        changes.add('converted triple-quoted block');
        i = close + 3;
        continue;
      }
    }

    if (ch === '"') {
      const end = skipString(candidate, i);
      out += candidate.slice(i, end);
      i = end;
      continue;
    }

    if (candidate.startsWith('//', i)) {
      const newline = candidate.indexOf('\n', i);
      i = newline === -1 ? candidate.length : newline;
      changes.add('removed line comment');
      continue;
    }

    if (candidate.startsWith('/*', i)) {
      const close = candidate.indexOf('*/', i + 2);
      i = close === -1 ? candidate.length : close + 2;
      changes.add('removed block comment');
      continue;
    }

    out += ch;
    i++;
  }

  const withoutCommas = stripTrailingCommas(out);
  if (withoutCommas !== out) {
    changes.add('removed trailing comma');
  }

  return { text: withoutCommas, changes: [...changes] };
}

/**
 * Best-effort repair of unescaped quotes inside string values. A quote
 * inside a string only closes it when the next non-blank character is one
 * of `, : } ]` or the end of input; any other quote is escaped.
 */
export function repairQuotes(candidate: string): { text: string; repaired: number } {
  let out = '';
  let repaired = 0;
  let inString = false;
  let i = 0;

  while (i < candidate.length) {
    const ch = candidate[i];

    if (!inString) {
      if (ch === '"') inString = true;
      out += ch;
      i++;
      continue;
    }

    if (ch === '\\') {
      out += candidate.slice(i, i + 2);
      i += 2;
      continue;
    }

    if (ch === '"') {
      const next = nextNonBlank(candidate, i + 1);
      if (next === undefined || next === ',' || next === ':' || next === '}' || next === ']') {
        inString = false;
        out += ch;
      } else {
        out += '\\"';
        repaired++;
      }
      i++;
      continue;
    }

    out += ch;
    i++;
  }

  return { text: out, repaired };
}

/**
 * Finds the first fenced (```json or bare ```) or inline backtick span
 * containing braces whose contents parse as an object.
 */
export function extractFromCodeBlocks(text: string, notes: string[] = []): Record<string, unknown> | null {
  for (const pattern of CODE_BLOCK_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const body = (match[1] ?? '').trim();
      if (!body.includes('{') || !body.includes('}')) continue;

      const parsed = parseObject(body) ?? parseLeniently(body, notes, 'code block');
      if (parsed) return parsed;
      notes.push('code block did not parse');
    }
  }
  return null;
}

/**
 * Last-resort scan for `thought:` / `action:` style fragments, line by line.
 * Never fails; missing fields get fixed defaults.
 */
export function scanFields(text: string, options: ExtractionOptions = {}, notes: string[] = []): ExtractionResult {
  const terminalKeyword = options.terminalKeyword ?? TERMINAL_ACTION;
  let thought: string | null = null;
  let toolName: string | null = null;

  for (const line of text.split(/\r?\n/)) {
    let remainder = line;

    if (thought === null) {
      const match = THOUGHT_FIELD.exec(line);
      if (match) {
        const field = readFieldValue(line, match.index + match[0].length);
        if (field.value.length > 0) {
          thought = field.value;
          remainder = `${line.slice(0, match.index)} ${line.slice(field.end)}`;
        }
      }
    }

    if (toolName === null) {
      const match = ACTION_FIELD.exec(remainder);
      if (match?.[1]) toolName = match[1];
    }
  }

  const args = scanArgs(text);
  const actionDefaulted = toolName === null;
  if (actionDefaulted) {
    notes.push(`no action field found, defaulting to '${terminalKeyword}'`);
  }

  return {
    action: {
      thought: thought ?? NO_THOUGHT_FOUND,
      toolName: toolName ?? terminalKeyword,
      arguments: args,
    },
    stage: 'field_scan',
    degraded: true,
    actionDefaulted,
    notes,
  };
}

// ============ Private Helpers ============

function fromObject(
  parsed: Record<string, unknown>,
  stage: ExtractionStage,
  terminalKeyword: string,
  notes: string[],
): ExtractionResult {
  const name = firstString(parsed, ACTION_KEYS);
  const actionDefaulted = name === null;
  if (actionDefaulted) {
    notes.push(`parsed object has no action field, defaulting to '${terminalKeyword}'`);
  }

  let args: Record<string, unknown> = {};
  for (const key of ARGS_KEYS) {
    const value = parsed[key];
    if (isPlainObject(value)) {
      args = value;
      break;
    }
  }

  return {
    action: {
      thought: firstString(parsed, THOUGHT_KEYS),
      toolName: name ?? terminalKeyword,
      arguments: args,
    },
    stage,
    degraded: actionDefaulted,
    actionDefaulted,
    notes,
  };
}

function firstString(source: Record<string, unknown>, keys: ReadonlyArray<string>): string | null {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'string' && value.trim().length > 0) {
      return value.trim();
    }
  }
  return null;
}

function parseObject(text: string): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  return isPlainObject(parsed) ? parsed : null;
}

/**
 * Cleanup first; quote repair only when the cleaned text still fails.
 */
function parseLeniently(candidate: string, notes: string[], label: string): Record<string, unknown> | null {
  const cleaned = cleanCandidate(candidate);
  for (const change of cleaned.changes) {
    notes.push(`${label}: ${change}`);
  }

  const parsed = parseObject(cleaned.text);
  if (parsed) return parsed;

  const repaired = repairQuotes(cleaned.text);
  if (repaired.repaired === 0) {
    notes.push(`${label}: cleanup did not help`);
    return null;
  }

  notes.push(`${label}: escaped ${repaired.repaired} stray quote(s)`);
  const repairedParse = parseObject(repaired.text);
  if (!repairedParse) {
    notes.push(`${label}: quote repair did not help`);
  }
  return repairedParse;
}

/**
 * Maps the index of every `{` that closes to the index of its `}`. Quotes
 * only open a string inside an open brace, so prose before an object
 * cannot swallow it.
 */
function matchBraces(text: string, honorStrings: boolean): Map<number, number> {
  const pairs = new Map<number, number>();
  const open: number[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    if (honorStrings && ch === '"' && open.length > 0) {
      i = skipString(text, i);
      continue;
    }
    if (ch === '{') {
      open.push(i);
    } else if (ch === '}') {
      const start = open.pop();
      if (start !== undefined) pairs.set(start, i);
    }
    i++;
  }

  return pairs;
}

/**
 * Index of the `}` matching the `{` at `start`, or -1.
 */
function findClosingBrace(text: string, start: number, honorStrings: boolean): number {
  let depth = 0;
  let i = start;

  while (i < text.length) {
    const ch = text[i];
    if (honorStrings && ch === '"') {
      i = skipString(text, i);
      continue;
    }
    if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
    i++;
  }

  return -1;
}

/**
 * Index just past the string starting at `start`; end of text when the
 * string never closes.
 */
function skipString(text: string, start: number): number {
  let i = start + 1;
  while (i < text.length) {
    if (text[i] === '\\') {
      i += 2;
      continue;
    }
    if (text[i] === '"') return i + 1;
    i++;
  }
  return text.length;
}

function nextNonBlank(text: string, from: number): string | undefined {
  let i = from;
  while (i < text.length && /\s/.test(text.charAt(i))) i++;
  return text[i];
}

function stripTrailingCommas(text: string): string {
  let out = '';
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    if (ch === '"') {
      const end = skipString(text, i);
      out += text.slice(i, end);
      i = end;
      continue;
    }
    if (ch === ',') {
      const next = nextNonBlank(text, i + 1);
      if (next === '}' || next === ']') {
        i++;
        continue;
      }
    }
    out += ch;
    i++;
  }

  return out;
}

/**
 * Reads a field value starting at `pos`: a quoted value up to its closing
 * quote, otherwise the rest of the line without a trailing comma.
 */
function readFieldValue(line: string, pos: number): { value: string; end: number } {
  const quote = line[pos];
  if (quote === '"' || quote === "'") {
    for (let i = pos + 1; i < line.length; i++) {
      if (line[i] === quote && line[i - 1] !== '\\') {
        return { value: line.slice(pos + 1, i).trim(), end: i + 1 };
      }
    }
    return { value: line.slice(pos + 1).trim(), end: line.length };
  }
  return { value: line.slice(pos).trim().replace(/,$/, '').trim(), end: line.length };
}

function scanArgs(text: string): Record<string, unknown> {
  const match = ARGS_FIELD.exec(text);
  if (!match) return {};

  const start = match.index + match[0].length;
  let end = findClosingBrace(text, start, true);
  if (end === -1) end = findClosingBrace(text, start, false);
  if (end === -1) return {};

  const body = text.slice(start, end + 1);
  return parseObject(body) ?? parseLeniently(body, [], 'args') ?? {};
}
