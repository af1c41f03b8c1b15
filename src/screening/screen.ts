import path from 'path';
import type { OracleConfig } from '../config/schema.js';
import { LEADING_KEYWORDS, TEST_RUNNERS, TEXT_INSPECTION, TRIVIAL_COMMANDS, WRAPPERS } from './patterns.js';

export type ScreeningReason = 'accepted' | 'empty' | 'no-test-runner' | 'text-inspection-only';

export interface ScreeningResult {
  accepted: boolean;
  reason: ScreeningReason;
  detail: string;
  runners: string[];             // commands matched against the runner allowlist
  inspectionCommands: string[];  // text utilities seen
}

export interface ScreeningOptions {
  extraRunners?: RegExp[];
}

export function screeningOptionsFromConfig(screening: OracleConfig['screening']): ScreeningOptions {
  return { extraRunners: screening.extraRunners.map(pattern => new RegExp(pattern)) };
}

const ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=/;
const STRUCTURE_WORDS = new Set(['for', 'case', 'in', 'function', 'select']);

/**
 * Static gate over an oracle script. A script passes only if some command in
 * it invokes a recognized test runner; one that merely reads or greps source
 * files is rejected whatever its exit status would be. Passing here is
 * necessary, not sufficient: the differential run still decides.
 */
export function screenScript(script: string, options: ScreeningOptions = {}): ScreeningResult {
  const runnerPatterns = [...TEST_RUNNERS, ...(options.extraRunners ?? [])];
  const runners: string[] = [];
  const inspectionCommands: string[] = [];
  const otherCommands: string[] = [];

  for (const segment of commandSegments(script)) {
    const words = stripPrefixes(segment.split(/\s+/).filter(Boolean));
    if (words.length === 0) continue;
    const name = path.posix.basename(words[0]);
    const command = [name, ...words.slice(1)].join(' ');

    if (runnerPatterns.some(re => re.test(command))) {
      runners.push(command);
    } else if (TEXT_INSPECTION.has(name)) {
      inspectionCommands.push(name);
    } else if (!TRIVIAL_COMMANDS.has(name) && !STRUCTURE_WORDS.has(name) && !/^[\w-]+\(\)$/.test(name)) {
      otherCommands.push(command);
    }
  }

  if (runners.length > 0) {
    return {
      accepted: true,
      reason: 'accepted',
      detail: `Runs ${runners[0]}`,
      runners,
      inspectionCommands,
    };
  }
  if (inspectionCommands.length === 0 && otherCommands.length === 0) {
    return {
      accepted: false,
      reason: 'empty',
      detail: 'The script contains no commands that do any work.',
      runners,
      inspectionCommands,
    };
  }
  if (otherCommands.length === 0) {
    return {
      accepted: false,
      reason: 'text-inspection-only',
      detail: `The script only inspects text (${unique(inspectionCommands).join(', ')}) instead of running tests.`,
      runners,
      inspectionCommands,
    };
  }
  return {
    accepted: false,
    reason: 'no-test-runner',
    detail: 'The script never invokes a recognized test runner (pytest, npm test, go test, cargo test, ...).',
    runners,
    inspectionCommands,
  };
}

/**
 * Splits a script into command segments on unquoted `;`, `&`, `&&`, `|`,
 * `||`, newlines and command substitutions. Comments and here-document
 * bodies are dropped and backslash continuations joined.
 */
export function commandSegments(script: string): string[] {
  const segments: string[] = [];
  const text = script.replace(/\\\r?\n/g, ' ');
  let current = '';
  let quote: '"' | "'" | null = null;
  const heredocs: Array<{ delimiter: string; stripTabs: boolean }> = [];

  const push = (): void => {
    const trimmed = current.trim();
    if (trimmed) segments.push(trimmed);
    current = '';
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === '\\' && quote === '"' && i + 1 < text.length) {
        current += ch + text[++i];
        continue;
      }
      if (ch === quote) quote = null;
      current += ch;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
    } else if (ch === '#' && (current === '' || /\s$/.test(current))) {
      while (i + 1 < text.length && text[i + 1] !== '\n') i++;
    } else if (ch === '<' && text[i + 1] === '<') {
      if (text[i + 2] === '<') {
        // here-string: the word stays on this line
        current += '<<<';
        i += 2;
      } else {
        i = readHeredocDelimiter(text, i + 2, heredocs);
      }
    } else if (ch === '\n' && heredocs.length > 0) {
      push();
      i = skipHeredocBodies(text, i + 1, heredocs.splice(0)) - 1;
    } else if (ch === '$' && text[i + 1] === '(') {
      // command substitution: its body is a command of its own
      push();
      i++;
    } else if (ch === '\n' || ch === ';' || ch === '&' || ch === '|' || ch === ')' || ch === '`') {
      push();
    } else {
      current += ch;
    }
  }
  push();
  return segments;
}

/** Reads the word after `<<` or `<<-`; returns the index of its last character. */
function readHeredocDelimiter(
  text: string,
  start: number,
  heredocs: Array<{ delimiter: string; stripTabs: boolean }>
): number {
  let i = start;
  const stripTabs = text[i] === '-';
  if (stripTabs) i++;
  while (text[i] === ' ' || text[i] === '\t') i++;

  let delimiter = '';
  while (i < text.length && !/[\s;&|<>()]/.test(text[i])) {
    const ch = text[i];
    if (ch === '"' || ch === "'") {
      const close = text.indexOf(ch, i + 1);
      const end = close === -1 ? text.length : close;
      delimiter += text.slice(i + 1, end);
      i = end + 1;
    } else {
      if (ch !== '\\') delimiter += ch;
      i++;
    }
  }
  if (delimiter) heredocs.push({ delimiter, stripTabs });
  return i - 1;
}

/** Skips the bodies of pending here-documents; returns the index just past the last terminator line. */
function skipHeredocBodies(
  text: string,
  start: number,
  heredocs: Array<{ delimiter: string; stripTabs: boolean }>
): number {
  let pos = start;
  for (const { delimiter, stripTabs } of heredocs) {
    while (pos < text.length) {
      const newline = text.indexOf('\n', pos);
      const end = newline === -1 ? text.length : newline;
      let line = text.slice(pos, end).replace(/\r$/, '');
      if (stripTabs) line = line.replace(/^\t+/, '');
      pos = end + 1;
      if (line === delimiter) break;
    }
  }
  return Math.min(pos, text.length);
}

function stripPrefixes(words: string[]): string[] {
  let i = 0;
  while (i < words.length) {
    const word = words[i];
    if (LEADING_KEYWORDS.has(word) || ASSIGNMENT.test(word)) {
      i++;
    } else if (WRAPPERS.has(word)) {
      i++;
      while (i < words.length && (words[i].startsWith('-') || ASSIGNMENT.test(words[i]))) i++;
    } else if (word === 'timeout') {
      i++;
      while (i < words.length && words[i].startsWith('-')) {
        // -s KILL / -k 5 take a value
        i += /^-[sk]$/.test(words[i]) ? 2 : 1;
      }
      if (i < words.length && /^\d/.test(words[i])) i++;
    } else {
      break;
    }
  }
  return words.slice(i);
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
