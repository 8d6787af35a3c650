/**
 * Keyword and format applicability tables, loaded once from JSON data.
 */
import keywordData from './keywords.json' with { type: 'json' };
import formatData from './formats.json' with { type: 'json' };
import { isRecord } from '../util/json-pointer.js';
import { parseVersionSpecs, type VersionSet } from './version.js';

export type Phase = 0 | 1 | 2 | 3;

export const PHASES: readonly Phase[] = [0, 1, 2, 3];

/**
 * `implemented` keywords have a handler; `annotation` keywords carry no
 * constraint; `todo` keywords are recognized but not translated.
 */
export type KeywordStatus = 'implemented' | 'annotation' | 'todo';

export interface KeywordInfo {
  readonly name: string;
  readonly phase: Phase;
  readonly versions: VersionSet;
  readonly status: KeywordStatus;
}

export type FormatHandler =
  | 'uri'
  | 'uriReference'
  | 'dateTime'
  | 'date'
  | 'regex'
  | 'int32'
  | 'int64'
  | 'uint32'
  | 'uint64';

const FORMAT_HANDLERS: readonly FormatHandler[] = [
  'uri',
  'uriReference',
  'dateTime',
  'date',
  'regex',
  'int32',
  'int64',
  'uint32',
  'uint64',
];

export interface FormatInfo {
  readonly name: string;
  readonly versions: VersionSet;
  /** Absent for formats that are recognized but not checked. */
  readonly handler?: FormatHandler;
}

function stringList(value: unknown, where: string): string[] {
  const items: unknown[] = Array.isArray(value) ? value : [];
  const strings = items.filter((v): v is string => typeof v === 'string');
  if (!Array.isArray(value) || strings.length !== items.length) {
    throw new Error(`${where}: versions must be a list of strings`);
  }
  return strings;
}

function toPhase(value: unknown, where: string): Phase {
  const phase = PHASES.find((p) => p === value);
  if (phase === undefined) {
    throw new Error(`${where}: invalid phase ${String(value)}`);
  }
  return phase;
}

function toStatus(value: unknown, where: string): KeywordStatus {
  switch (value) {
    case undefined:
      return 'implemented';
    case 'implemented':
    case 'annotation':
    case 'todo':
      return value;
    default:
      throw new Error(`${where}: invalid status ${String(value)}`);
  }
}

function loadKeywords(data: unknown): ReadonlyMap<string, KeywordInfo> {
  const out = new Map<string, KeywordInfo>();
  if (!isRecord(data)) {
    throw new Error('keyword table must be an object');
  }
  for (const [name, entry] of Object.entries(data)) {
    if (!isRecord(entry)) {
      throw new Error(`keyword ${name}: entry must be an object`);
    }
    out.set(name, {
      name,
      phase: toPhase(entry['phase'], `keyword ${name}`),
      versions: parseVersionSpecs(stringList(entry['versions'], `keyword ${name}`)),
      status: toStatus(entry['status'], `keyword ${name}`),
    });
  }
  return out;
}

function loadFormats(data: unknown): ReadonlyMap<string, FormatInfo> {
  const out = new Map<string, FormatInfo>();
  if (!isRecord(data)) {
    throw new Error('format table must be an object');
  }
  for (const [name, entry] of Object.entries(data)) {
    if (!isRecord(entry)) {
      throw new Error(`format ${name}: entry must be an object`);
    }
    const versions = parseVersionSpecs(stringList(entry['versions'], `format ${name}`));
    const raw = entry['handler'];
    if (raw === undefined) {
      out.set(name, { name, versions });
      continue;
    }
    const handler = FORMAT_HANDLERS.find((h) => h === raw);
    if (handler === undefined) {
      throw new Error(`format ${name}: unknown handler ${String(raw)}`);
    }
    out.set(name, { name, versions, handler });
  }
  return out;
}

export const KEYWORDS: ReadonlyMap<string, KeywordInfo> = loadKeywords(keywordData);

export const FORMATS: ReadonlyMap<string, FormatInfo> = loadFormats(formatData);

export function lookupKeyword(name: string): KeywordInfo | undefined {
  return KEYWORDS.get(name);
}

export function lookupFormat(name: string): FormatInfo | undefined {
  return FORMATS.get(name);
}
