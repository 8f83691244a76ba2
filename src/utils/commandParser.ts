/**
 * Command parser - display-oriented decomposition of command lines
 *
 * Turns an argv (or a `bash -lc "<script>"` invocation) into a list of
 * ParsedCommand entries so UIs can show "Read foo.ts" or "Search TODO"
 * instead of the raw command. Parsing is pure and never throws; anything
 * it does not recognise becomes an `unknown` entry.
 */

import * as path from 'path';
import type { ParsedCommand } from '../types/index.js';

export type CommandParser = (command: readonly string[]) => ParsedCommand[];

const SHELLS = new Set(['bash', 'zsh', 'sh']);
const SHELL_SCRIPT_FLAGS = new Set(['-c', '-lc']);
const OPERATORS = new Set(['&&', '||', ';', '|']);

const READ_COMMANDS = new Set(['cat', 'head', 'tail', 'less', 'more', 'bat', 'nl']);
const LIST_COMMANDS = new Set(['ls', 'tree']);
const SEARCH_COMMANDS = new Set(['rg', 'grep', 'egrep', 'fgrep', 'ag', 'ack']);
const NOISE_COMMANDS = new Set(['cd', 'echo', 'true', 'wc', 'sort', 'uniq', 'xargs']);

/** Flags that consume the following token */
const VALUE_FLAGS: Record<string, Set<string>> = {
  head: new Set(['-n', '-c']),
  tail: new Set(['-n', '-c']),
  search: new Set(['-e', '-f', '-g', '--glob', '-t', '--type', '-A', '-B', '-C', '-m', '--max-count']),
  find: new Set(['-name', '-iname', '-type', '-maxdepth', '-mindepth', '-path']),
  fd: new Set(['-e', '--extension', '-t', '--type', '-d', '--max-depth']),
};

const SAFE_TOKEN = /^[A-Za-z0-9_\-./=:,@%+]+$/;

/**
 * Join argv into a display string, quoting tokens the shell would split
 */
export function shellJoin(args: readonly string[]): string {
  return args
    .map(arg => (SAFE_TOKEN.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`))
    .join(' ');
}

/**
 * Split a shell script into words and control operators
 *
 * @returns Tokens, or null when quotes are unbalanced
 */
export function tokenizeScript(script: string): string[] | null {
  const tokens: string[] = [];
  let current = '';
  let inWord = false;
  let i = 0;

  const flush = () => {
    if (inWord) {
      tokens.push(current);
      current = '';
      inWord = false;
    }
  };

  while (i < script.length) {
    const char = script.charAt(i);

    if (char === "'") {
      const end = script.indexOf("'", i + 1);
      if (end === -1) {
        return null;
      }
      current += script.slice(i + 1, end);
      inWord = true;
      i = end + 1;
      continue;
    }

    if (char === '"') {
      let j = i + 1;
      let closed = false;
      while (j < script.length) {
        const inner = script.charAt(j);
        if (inner === '\\' && j + 1 < script.length) {
          current += script.charAt(j + 1);
          j += 2;
          continue;
        }
        if (inner === '"') {
          closed = true;
          break;
        }
        current += inner;
        j++;
      }
      if (!closed) {
        return null;
      }
      inWord = true;
      i = j + 1;
      continue;
    }

    if (char === '\\' && i + 1 < script.length) {
      current += script.charAt(i + 1);
      inWord = true;
      i += 2;
      continue;
    }

    if (/\s/.test(char)) {
      flush();
      i++;
      continue;
    }

    const pair = script.slice(i, i + 2);
    if (pair === '&&' || pair === '||') {
      flush();
      tokens.push(pair);
      i += 2;
      continue;
    }
    if (char === ';' || char === '|') {
      flush();
      tokens.push(char);
      i++;
      continue;
    }

    current += char;
    inWord = true;
    i++;
  }

  flush();
  return tokens;
}

function splitSegments(tokens: readonly string[]): string[][] {
  const segments: string[][] = [];
  let current: string[] = [];
  for (const token of tokens) {
    if (OPERATORS.has(token)) {
      if (current.length > 0) {
        segments.push(current);
      }
      current = [];
    } else {
      current.push(token);
    }
  }
  if (current.length > 0) {
    segments.push(current);
  }
  return segments;
}

/**
 * Non-flag arguments, skipping the values of flags that take one
 */
function positionalArgs(args: readonly string[], valueFlags: ReadonlySet<string> = new Set()): string[] {
  const positional: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (valueFlags.has(arg)) {
      i++;
      continue;
    }
    if (arg.startsWith('-') && arg !== '-') {
      continue;
    }
    positional.push(arg);
  }
  return positional;
}

function flagValue(args: readonly string[], flags: readonly string[]): string | undefined {
  for (let i = 0; i < args.length - 1; i++) {
    if (flags.includes(args[i] ?? '')) {
      return args[i + 1];
    }
  }
  return undefined;
}

function listFiles(cmd: string, dir: string | undefined): ParsedCommand {
  return dir === undefined ? { type: 'list_files', cmd } : { type: 'list_files', cmd, path: dir };
}

function search(cmd: string, query: string | undefined, dir: string | undefined): ParsedCommand {
  const parsed: Extract<ParsedCommand, { type: 'search' }> = { type: 'search', cmd };
  if (query !== undefined) {
    parsed.query = query;
  }
  if (dir !== undefined) {
    parsed.path = dir;
  }
  return parsed;
}

/**
 * Classify one pipeline segment
 *
 * @returns The parsed entry, or null for segments that carry no information
 *   on their own (cd, echo, pathless filters such as `head -n 5`)
 */
function classifySegment(words: readonly string[]): ParsedCommand | null {
  const [program = '', ...rest] = words;
  const name = path.basename(program);
  const cmd = shellJoin(words);

  if (NOISE_COMMANDS.has(name)) {
    return null;
  }

  if (READ_COMMANDS.has(name)) {
    const file = positionalArgs(rest, VALUE_FLAGS[name]).pop();
    if (file === undefined) {
      return null;
    }
    return { type: 'read', cmd, name: path.basename(file), path: file };
  }

  if (LIST_COMMANDS.has(name)) {
    return listFiles(cmd, positionalArgs(rest)[0]);
  }

  if (name === 'find') {
    const pattern = flagValue(rest, ['-name', '-iname']);
    const dir = positionalArgs(rest, VALUE_FLAGS.find)[0];
    return pattern === undefined ? listFiles(cmd, dir) : search(cmd, pattern, dir);
  }

  if (name === 'fd') {
    const [pattern, dir] = positionalArgs(rest, VALUE_FLAGS.fd);
    return pattern === undefined ? listFiles(cmd, undefined) : search(cmd, pattern, dir);
  }

  if (name === 'git' && rest[0] === 'grep') {
    const [query, dir] = positionalArgs(rest.slice(1), VALUE_FLAGS.search);
    return search(cmd, query, dir);
  }

  if (SEARCH_COMMANDS.has(name)) {
    if (name === 'rg' && rest.includes('--files')) {
      return listFiles(cmd, positionalArgs(rest, VALUE_FLAGS.search)[0]);
    }
    const explicit = flagValue(rest, ['-e']);
    const positional = positionalArgs(rest, VALUE_FLAGS.search);
    if (explicit !== undefined) {
      return search(cmd, explicit, positional[0]);
    }
    return search(cmd, positional[0], positional[1]);
  }

  return { type: 'unknown', cmd };
}

function sameParsedCommand(a: ParsedCommand, b: ParsedCommand): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Parse a command into display tokens
 *
 * `bash -lc "<script>"` (and sh/zsh, -c) is unwrapped and its script split
 * on `&&`, `||`, `;` and `|`.
 */
export const parseCommand: CommandParser = (command) => {
  const [program = '', flag = '', script] = command;
  let words: readonly string[] = command;
  let unwrapped = false;

  if (command.length === 3 && SHELLS.has(path.basename(program)) && SHELL_SCRIPT_FLAGS.has(flag) && script !== undefined) {
    const tokens = tokenizeScript(script);
    if (tokens === null) {
      return [{ type: 'unknown', cmd: script }];
    }
    words = tokens;
    unwrapped = true;
  }

  const parsed: ParsedCommand[] = [];
  for (const segment of splitSegments(words)) {
    const entry = classifySegment(segment);
    if (entry === null) {
      continue;
    }
    const previous = parsed[parsed.length - 1];
    if (previous === undefined || !sameParsedCommand(previous, entry)) {
      parsed.push(entry);
    }
  }

  if (parsed.length === 0) {
    const cmd = unwrapped && script !== undefined ? script : shellJoin(command);
    return [{ type: 'unknown', cmd }];
  }
  return parsed;
};
