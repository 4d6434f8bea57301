/**
 * Tokenizer and value parser for the OpenStep-style plist syntax used by
 * project.pbxproj
 *
 * Only what is needed to read object records is supported: dictionaries,
 * lists, quoted and bare strings, and comments. Every token keeps its source
 * offsets so callers can patch the original text instead of re-printing it.
 */
import type { PbxDictionary, PbxValue } from '../types/index.js';

export type TokenType = 'string' | 'word' | 'punct' | 'comment';

export interface Token {
  type: TokenType;
  /** Decoded value (quotes removed, escapes resolved; comment text trimmed) */
  value: string;
  start: number;
  end: number;
}

/**
 * A record in an object section: `ID /* comment *\/ = { ... };`
 */
export interface ParsedRecord {
  id: string;
  comment?: string;
  body: PbxDictionary;
  /** Offset of the closing `)` of every top-level list attribute */
  listCloses: Record<string, number>;
  /** Offset of the first entry of every non-empty top-level list attribute */
  listFirstEntries: Record<string, number>;
  /** End of the last entry (and its comment) of every list whose last entry has no trailing comma */
  listUnseparated: Record<string, number>;
}

export class PbxSyntaxError extends Error {
  constructor(message: string, public offset: number) {
    super(`${message} at offset ${offset}`);
    this.name = 'PbxSyntaxError';
  }
}

const PUNCTUATION = new Set(['{', '}', '(', ')', '=', ';', ',']);

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '"': '"',
  '\\': '\\',
  "'": "'",
};

/**
 * Tokenize `content` between `start` and `end`
 */
export function tokenize(content: string, start = 0, end = content.length): Token[] {
  const tokens: Token[] = [];
  let i = start;

  while (i < end) {
    const ch = content[i];

    if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') {
      i++;
      continue;
    }

    if (ch === '/' && content[i + 1] === '*') {
      const close = content.indexOf('*/', i + 2);
      if (close === -1 || close + 2 > end) {
        throw new PbxSyntaxError('Unterminated comment', i);
      }
      tokens.push({ type: 'comment', value: content.slice(i + 2, close).trim(), start: i, end: close + 2 });
      i = close + 2;
      continue;
    }

    if (ch === '/' && content[i + 1] === '/') {
      const newline = content.indexOf('\n', i);
      i = newline === -1 || newline > end ? end : newline + 1;
      continue;
    }

    if (PUNCTUATION.has(ch)) {
      tokens.push({ type: 'punct', value: ch, start: i, end: i + 1 });
      i++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const quote = ch;
      let value = '';
      let j = i + 1;
      while (j < end && content[j] !== quote) {
        if (content[j] === '\\' && j + 1 < end) {
          const escaped = content[j + 1];
          value += ESCAPES[escaped] ?? escaped;
          j += 2;
        } else {
          value += content[j];
          j++;
        }
      }
      if (j >= end) {
        throw new PbxSyntaxError('Unterminated string', i);
      }
      tokens.push({ type: 'string', value, start: i, end: j + 1 });
      i = j + 1;
      continue;
    }

    let j = i;
    while (j < end) {
      const c = content[j];
      if (c === ' ' || c === '\t' || c === '\n' || c === '\r' || c === '"' || PUNCTUATION.has(c)) break;
      if (c === '/' && (content[j + 1] === '*' || content[j + 1] === '/')) break;
      j++;
    }
    tokens.push({ type: 'word', value: content.slice(i, j), start: i, end: j });
    i = j;
  }

  return tokens;
}

/**
 * Recursive-descent parser over a token stream. Comments are skipped except
 * where a record's trailing comment is requested.
 */
class TokenCursor {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  atEnd(): boolean {
    this.skipComments();
    return this.index >= this.tokens.length;
  }

  peek(): Token | undefined {
    this.skipComments();
    return this.tokens[this.index];
  }

  /** Returns the comment directly at the cursor, if any, and consumes it */
  takeComment(): string | undefined {
    const token = this.tokens[this.index];
    if (token && token.type === 'comment') {
      this.index++;
      return token.value;
    }
    return undefined;
  }

  next(): Token {
    this.skipComments();
    const token = this.tokens[this.index];
    if (!token) {
      const last = this.tokens[this.tokens.length - 1];
      throw new PbxSyntaxError('Unexpected end of input', last ? last.end : 0);
    }
    this.index++;
    return token;
  }

  /** End of the last consumed token, extended over any comments that follow it */
  trailingEnd(): number {
    let end = this.index > 0 ? this.tokens[this.index - 1].end : 0;
    for (let i = this.index; i < this.tokens.length && this.tokens[i].type === 'comment'; i++) {
      end = this.tokens[i].end;
    }
    return end;
  }

  expect(punct: string): Token {
    const token = this.next();
    if (token.type !== 'punct' || token.value !== punct) {
      throw new PbxSyntaxError(`Expected "${punct}" but found "${token.value}"`, token.start);
    }
    return token;
  }

  private skipComments(): void {
    while (this.index < this.tokens.length && this.tokens[this.index].type === 'comment') {
      this.index++;
    }
  }
}

function parseValue(cursor: TokenCursor): PbxValue {
  const token = cursor.next();
  if (token.type === 'string' || token.type === 'word') {
    return token.value;
  }
  if (token.value === '{') {
    return parseDictionaryBody(cursor).value;
  }
  if (token.value === '(') {
    return parseListBody(cursor).values;
  }
  throw new PbxSyntaxError(`Unexpected "${token.value}"`, token.start);
}

/**
 * Parse list entries after `(`; consumes the closing `)`
 */
function parseListBody(cursor: TokenCursor): {
  values: PbxValue[];
  close: Token;
  firstEntry?: number;
  unseparatedEnd?: number;
} {
  const values: PbxValue[] = [];
  let firstEntry: number | undefined;
  let unseparatedEnd: number | undefined;
  for (;;) {
    const token = cursor.peek();
    if (!token) {
      throw new PbxSyntaxError('Unterminated list', 0);
    }
    if (token.type === 'punct' && token.value === ')') {
      return { values, close: cursor.next(), firstEntry, unseparatedEnd };
    }
    if (firstEntry === undefined) firstEntry = token.start;
    values.push(parseValue(cursor));
    const valueEnd = cursor.trailingEnd();
    const separator = cursor.peek();
    if (separator && separator.type === 'punct' && separator.value === ',') {
      cursor.next();
      unseparatedEnd = undefined;
    } else {
      unseparatedEnd = valueEnd;
    }
  }
}

/**
 * Parse dictionary entries after `{`; consumes the closing `}`
 */
function parseDictionaryBody(cursor: TokenCursor): {
  value: PbxDictionary;
  listCloses: Record<string, number>;
  listFirstEntries: Record<string, number>;
  listUnseparated: Record<string, number>;
} {
  const value: PbxDictionary = {};
  const listCloses: Record<string, number> = {};
  const listFirstEntries: Record<string, number> = {};
  const listUnseparated: Record<string, number> = {};

  for (;;) {
    const token = cursor.next();
    if (token.type === 'punct' && token.value === '}') {
      return { value, listCloses, listFirstEntries, listUnseparated };
    }
    if (token.type !== 'string' && token.type !== 'word') {
      throw new PbxSyntaxError(`Expected key but found "${token.value}"`, token.start);
    }
    cursor.expect('=');

    const lookahead = cursor.peek();
    if (lookahead && lookahead.type === 'punct' && lookahead.value === '(') {
      cursor.next();
      const list = parseListBody(cursor);
      value[token.value] = list.values;
      listCloses[token.value] = list.close.start;
      if (list.firstEntry !== undefined) {
        listFirstEntries[token.value] = list.firstEntry;
      }
      if (list.unseparatedEnd !== undefined) {
        listUnseparated[token.value] = list.unseparatedEnd;
      }
    } else {
      value[token.value] = parseValue(cursor);
    }
    cursor.expect(';');
  }
}

/**
 * Parse the records of one object section body
 *
 * @param content The full descriptor text
 * @param start Offset where the section body starts
 * @param end Offset where the section body ends
 */
export function parseSectionRecords(content: string, start: number, end: number): ParsedRecord[] {
  const cursor = new TokenCursor(tokenize(content, start, end));
  const records: ParsedRecord[] = [];

  while (!cursor.atEnd()) {
    const idToken = cursor.next();
    if (idToken.type !== 'word' && idToken.type !== 'string') {
      throw new PbxSyntaxError(`Expected object identifier but found "${idToken.value}"`, idToken.start);
    }
    const comment = cursor.takeComment();
    cursor.expect('=');
    cursor.expect('{');
    const { value, listCloses, listFirstEntries, listUnseparated } = parseDictionaryBody(cursor);
    cursor.expect(';');

    records.push({
      id: idToken.value,
      comment,
      body: value,
      listCloses,
      listFirstEntries,
      listUnseparated,
    });
  }

  return records;
}

/**
 * Read a string attribute, ignoring lists and dictionaries
 */
export function stringAttr(dict: PbxDictionary, key: string): string | undefined {
  const value = dict[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Read a list attribute of strings (identifiers)
 */
export function idListAttr(dict: PbxDictionary, key: string): string[] {
  const value = dict[key];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}

const BARE_STRING = /^[A-Za-z0-9_$./-]+$/;

/**
 * Render a string value the way Xcode writes it: bare when safe, quoted otherwise
 */
export function quotePbxString(value: string): string {
  if (BARE_STRING.test(value) && !value.includes('//') && !value.includes('___')) {
    return value;
  }
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t');
  return `"${escaped}"`;
}
