import type { RequestInfo, StatusCodeClass } from '../types';

/**
 * Best-effort extraction from the free-text body of a fuzzing failure.
 * Nothing here throws: a pattern that does not match yields an absent field.
 */

const STATUS_PATTERNS: readonly RegExp[] = [
  /\[(\d{3})\]/,
  /status code:?\s*(\d{3})\b/i,
  /HTTP\/\d(?:\.\d)?\s+(\d{3})\b/,
];

const KIND_PATTERNS: readonly RegExp[] = [
  /^[ \t]*-[ \t]+(\S[^\r\n]*)$/m,
  /^[ \t]*\d+\.[ \t]+(\S[^\r\n]*)$/m,
];

const URL_RE = /https?:\/\/[^\s'"]+/;

const REQUEST_LINE_RE = /^[ \t]*(GET|POST|PUT|PATCH|DELETE|HEAD|OPTIONS|TRACE)[ \t]+(https?:\/\/\S+)/m;

const DATA_FLAGS = new Set(['-d', '--data', '--data-raw', '--data-binary', '--data-ascii', '--data-urlencode']);

/**
 * Find the HTTP status code mentioned in the given texts.
 * Every pattern is tried against a text before moving to the next text.
 */
export function extractStatusCode(...texts: string[]): number | undefined {
  for (const text of texts) {
    if (!text) continue;
    for (const pattern of STATUS_PATTERNS) {
      const match = text.match(pattern);
      if (!match) continue;
      const code = Number.parseInt(match[1], 10);
      if (code >= 100 && code <= 599) return code;
    }
  }
  return undefined;
}

export function classifyStatusCode(code: number | undefined): StatusCodeClass {
  if (code === undefined) return 'other';
  if (code >= 500 && code < 600) return '5xx';
  if (code >= 400 && code < 500) return '4xx';
  return 'other';
}

/**
 * Failure kind, e.g. "Server error" from a "- Server error" line
 */
export function extractFailureKind(text: string): string | undefined {
  for (const pattern of KIND_PATTERNS) {
    const match = text.match(pattern);
    if (match) return match[1].trim();
  }
  return undefined;
}

export interface ReproduceSplit {
  message: string;
  curl?: string;
}

/**
 * Separate the "Reproduce with:" block from a failure message.
 * The first curl command (including backslash-continued lines) is returned on its own
 * and removed from the message together with the block header and its blank lines.
 */
export function splitReproduceBlock(text: string): ReproduceSplit {
  const lines = text.split(/\r?\n/);
  const kept: string[] = [];
  let curl: string | undefined;
  let seenReproduce = false;

  for (let i = 0; i < lines.length; i++) {
    const stripped = lines[i].trim();

    if (stripped.toLowerCase().startsWith('reproduce with')) {
      seenReproduce = true;
      continue;
    }

    if (stripped.startsWith('curl ')) {
      let command = stripped;
      while (command.endsWith('\\') && i + 1 < lines.length) {
        i++;
        command = `${command.slice(0, -1).trimEnd()} ${lines[i].trim()}`;
      }
      if (curl === undefined) curl = command;
      continue;
    }

    if (seenReproduce && stripped === '') continue;

    kept.push(lines[i]);
  }

  const message = kept.join('\n').trim();
  return { message: message || text.trim(), curl };
}

/**
 * Split a shell command line into words, honouring single quotes, double quotes
 * and backslash escapes. Adjacent quoted segments join into one word.
 */
export function splitShellWords(command: string): string[] {
  const words: string[] = [];
  let current = '';
  let inWord = false;
  let i = 0;

  while (i < command.length) {
    const ch = command[i];

    if (ch === "'") {
      const end = command.indexOf("'", i + 1);
      const stop = end === -1 ? command.length : end;
      current += command.slice(i + 1, stop);
      inWord = true;
      i = stop + 1;
      continue;
    }

    if (ch === '"') {
      i++;
      while (i < command.length && command[i] !== '"') {
        if (command[i] === '\\' && i + 1 < command.length && '"\\$`'.includes(command[i + 1])) {
          i++;
        }
        current += command[i];
        i++;
      }
      inWord = true;
      i++;
      continue;
    }

    if (ch === '\\' && i + 1 < command.length) {
      if (command[i + 1] !== '\n') {
        current += command[i + 1];
        inWord = true;
      }
      i += 2;
      continue;
    }

    if (/\s/.test(ch)) {
      if (inWord) words.push(current);
      current = '';
      inWord = false;
      i++;
      continue;
    }

    current += ch;
    inWord = true;
    i++;
  }

  if (inWord) words.push(current);
  return words;
}

/**
 * Read method, URL, headers and body out of a curl command line.
 * A body without an explicit method means POST, as curl itself does.
 */
export function parseCurlCommand(command: string): RequestInfo {
  const request: RequestInfo = { headers: [] };
  const words = splitShellWords(command);
  const bodyParts: string[] = [];
  let explicitMethod: string | undefined;

  for (let i = words[0] === 'curl' ? 1 : 0; i < words.length; i++) {
    const word = words[i];

    if (word === '-X' || word === '--request') {
      explicitMethod = words[++i];
    } else if (word.startsWith('-X') && word.length > 2) {
      explicitMethod = word.slice(2);
    } else if (word === '-H' || word === '--header') {
      const header = words[++i] ?? '';
      const colon = header.indexOf(':');
      if (colon > 0) {
        request.headers.push([header.slice(0, colon).trim(), header.slice(colon + 1).trim()]);
      }
    } else if (DATA_FLAGS.has(word)) {
      const data = words[++i];
      if (data !== undefined) bodyParts.push(data);
    } else if (word === '--url') {
      request.url = words[++i];
    } else if (/^https?:\/\//i.test(word) && request.url === undefined) {
      request.url = word;
    }
  }

  if (bodyParts.length > 0) request.body = bodyParts.join('&');
  const method = explicitMethod ?? (request.body !== undefined ? 'POST' : undefined);
  if (method) request.method = method.toUpperCase();
  return request;
}

/**
 * Recover the request behind a failure: from its curl command when there is one,
 * otherwise from a "METHOD https://..." request line in the text.
 */
export function extractRequest(text: string, curl?: string): RequestInfo {
  const command = curl ?? splitReproduceBlock(text).curl;
  if (command) return parseCurlCommand(command);

  const match = text.match(REQUEST_LINE_RE);
  if (match) {
    return { method: match[1].toUpperCase(), url: match[2], headers: [] };
  }
  return { headers: [] };
}

/**
 * scheme://host of the first URL found in the candidates
 */
export function extractBaseUrl(...candidates: Array<string | undefined>): string | undefined {
  for (const candidate of candidates) {
    if (!candidate) continue;
    const match = candidate.match(URL_RE);
    if (!match) continue;
    try {
      return new URL(match[0]).origin;
    } catch {
      continue;
    }
  }
  return undefined;
}

/**
 * Collapse whitespace and cut on a word boundary so the result, placeholder
 * included, is at most `width` characters long.
 */
export function shortenText(text: string, width: number = 180, placeholder: string = '…'): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  if (collapsed.length <= width) return collapsed;

  const limit = width - placeholder.length;
  let result = '';
  for (const word of collapsed.split(' ')) {
    const next = result ? `${result} ${word}` : word;
    if (next.length > limit) break;
    result = next;
  }

  if (!result) return collapsed.slice(0, Math.max(limit, 0)) + placeholder;
  return result + placeholder;
}
