// Action descriptor parser
// Extracts a tool call from free-text model output for endpoints without native tool calling.
// Preferred form is <tool_call>{"name": ..., "arguments": {...}}</tool_call>; bare or fenced JSON
// objects and {"action": ...} objects are accepted too. The first structurally valid one wins.

import type { ToolArguments } from '../tools/types.js';

export type ParsedAction =
  | { type: 'tool_call'; name: string; arguments: ToolArguments | string }
  | { type: 'final'; message: string };

type JsonParseResult = { ok: true; value: unknown } | { ok: false };

const TOOL_CALL_BLOCK = /<tool_call>\s*([\s\S]*?)\s*<\/tool_call>/gi;
const THINK_BLOCK = /<(think|thinking)>[\s\S]*?<\/\1>/gi;
const DANGLING_THINK_END = /^[\s\S]*?<\/(think|thinking)>/i;

/** Remove reasoning blocks some models put before their answer. */
export function stripThinking(text: string): string {
  let cleaned = text.replace(THINK_BLOCK, '');
  // Reasoning that lost its opening tag (e.g. streamed separately)
  if (/<\/(think|thinking)>/i.test(cleaned)) {
    cleaned = cleaned.replace(DANGLING_THINK_END, '');
  }
  return cleaned.trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Fix the JSON mistakes models make most: `//` comments, raw newlines or tabs
 * inside strings, and trailing commas.
 */
export function repairJson(text: string): string {
  let out = '';
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
        out += ch;
      } else if (ch === '\\') {
        escaped = true;
        out += ch;
      } else if (ch === '"') {
        inString = false;
        out += ch;
      } else if (ch === '\n') {
        out += '\\n';
      } else if (ch === '\r') {
        out += '\\r';
      } else if (ch === '\t') {
        out += '\\t';
      } else {
        out += ch;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
      out += ch;
    } else if (ch === '/' && text[i + 1] === '/') {
      while (i < text.length && text[i] !== '\n') i++;
      out += '\n';
    } else if (ch === ',') {
      let j = i + 1;
      while (j < text.length && /\s/.test(text[j])) j++;
      if (text[j] !== '}' && text[j] !== ']') out += ch;
    } else {
      out += ch;
    }
  }

  return out;
}

export function parseJsonLenient(text: string): JsonParseResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    try {
      return { ok: true, value: JSON.parse(repairJson(text)) };
    } catch {
      return { ok: false };
    }
  }
}

/** Parse a tool call's argument payload; anything that is not a JSON object comes back as the raw text. */
export function parseToolArguments(raw: unknown): ToolArguments | string {
  if (raw === undefined || raw === null || raw === '') return {};
  if (isRecord(raw)) return raw;
  if (typeof raw !== 'string') return JSON.stringify(raw);

  const parsed = parseJsonLenient(raw);
  return parsed.ok && isRecord(parsed.value) ? parsed.value : raw;
}

function firstString(obj: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = obj[key];
    if (typeof value === 'string') return value;
  }
  return undefined;
}

/** Interpret one decoded JSON value as an action, or null when it is not one. */
export function interpretDescriptor(value: unknown): ParsedAction | null {
  if (!isRecord(value)) return null;

  if (typeof value.name === 'string' && value.name && 'arguments' in value) {
    return { type: 'tool_call', name: value.name, arguments: parseToolArguments(value.arguments) };
  }

  if (typeof value.action !== 'string' || !value.action) return null;
  const action = value.action.trim().toLowerCase();

  switch (action) {
    case 'final':
      return { type: 'final', message: firstString(value, 'message', 'content', 'answer') ?? '' };
    case 'list_assets':
      return { type: 'tool_call', name: 'list_assets', arguments: {} };
    case 'execute_command': {
      const args: ToolArguments = {};
      const asset = firstString(value, 'asset', 'asset_name');
      const command = firstString(value, 'command');
      if (asset !== undefined) args.asset_name = asset;
      if (command !== undefined) args.command = command;
      return { type: 'tool_call', name: 'execute_command', arguments: args };
    }
    case 'upload_file': {
      const args: ToolArguments = {};
      const asset = firstString(value, 'asset', 'asset_name');
      const localPath = firstString(value, 'local_path', 'local');
      const remotePath = firstString(value, 'remote_path', 'remote');
      if (asset !== undefined) args.asset_name = asset;
      if (localPath !== undefined) args.local_path = localPath;
      if (remotePath !== undefined) args.remote_path = remotePath;
      return { type: 'tool_call', name: 'upload_file', arguments: args };
    }
    default: {
      // Unknown action: hand it to dispatch so the model hears back that the tool does not exist
      const { action: _action, ...rest } = value;
      return { type: 'tool_call', name: action, arguments: rest };
    }
  }
}

/** Upper bound on characters examined per response, across every candidate */
const SCAN_BUDGET = 200_000;

/**
 * Walk forward from the `{` at `start` until it closes, recording the closing
 * index of every brace opened on the way (-1 when it never closes).
 * Returns the number of characters examined.
 */
function scanBraces(text: string, start: number, closing: Map<number, number>, limit: number): number {
  const open: number[] = [];
  let inString = false;
  let escaped = false;
  let i = start;

  for (; i < text.length && i - start < limit; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') open.push(i);
    else if (ch === '}') {
      const opened = open.pop();
      if (opened !== undefined && !closing.has(opened)) closing.set(opened, i);
      if (open.length === 0) break;
    }
  }

  for (const opened of open) {
    if (!closing.has(opened)) closing.set(opened, -1);
  }
  return i - start + 1;
}

/**
 * Balanced `{...}` spans, in order of their opening brace. Strings are respected.
 * Braces seen by an earlier scan are not scanned again, and an unclosed span is never a candidate.
 */
function* objectCandidates(text: string): Generator<string> {
  const closing = new Map<number, number>();
  let budget = SCAN_BUDGET;

  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    if (!closing.has(start)) {
      budget -= scanBraces(text, start, closing, budget);
    }
    const end = closing.get(start) ?? -1;
    if (end !== -1) {
      budget -= end - start + 1;
      if (budget < 0) return;
      yield text.slice(start, end + 1);
    }
    if (budget <= 0) return;
  }
}

function firstAction(text: string): ParsedAction | null {
  for (const candidate of objectCandidates(text)) {
    const parsed = parseJsonLenient(candidate);
    if (!parsed.ok) continue;
    const action = interpretDescriptor(parsed.value);
    if (action) return action;
  }
  return null;
}

/** Only the `<tool_call>` tag form; some servers emit it in text even when tools are declared natively. */
export function parseTaggedToolCall(text: string): ParsedAction | null {
  for (const match of stripThinking(text).matchAll(TOOL_CALL_BLOCK)) {
    const action = firstAction(match[1]);
    if (action) return action;
  }
  return null;
}

/**
 * Find the first action descriptor in a model response. Returns null when
 * there is none, in which case the whole text is the final answer.
 */
export function parseActionDescriptor(text: string): ParsedAction | null {
  return parseTaggedToolCall(text) ?? firstAction(stripThinking(text));
}
