/**
 * wafscope — Field extractor
 *
 * 1 トランザクション分のセクション列から表示・検索用のフィールドを取り出す。
 * セクション内のフィールド順はフォーマットで決まっているため、
 * A セクションは汎用的なパターンマッチではなく位置で分解する（IPv4 / IPv6 で分岐しない）。
 * 壊れた値は例外にせず、番兵値か undefined に落とす。
 */

import type { AuditEntry, KnownSectionLetter } from '../types/audit.js';
import { SECTION_LETTERS, UNKNOWN_ADDRESS, UNKNOWN_HOST } from '../types/audit.js';

export interface ExtractedFields {
  uniqueId?: string;
  timestamp?: Date;
  clientAddress: string;
  clientPort?: number;
  serverAddress?: string;
  serverPort?: number;
  host: string;
  requestLine?: string;
  status?: number;
  ruleIds: string[];
  ruleFile?: string;
}

// ---------------------------------------------------------------------------
// 正規表現
// ---------------------------------------------------------------------------

const HOST_HEADER_REGEX = /^host[ \t]*:(.*?)\r*$/i;
const STATUS_LINE_REGEX = /HTTP\/\d(?:\.\d)?\s+(\d{3})\b/;
const RULE_ID_REGEX = /\[id "(\d+)"\]/g;
const RULE_FILE_REGEX = /\[file "([^"]+)"\]/;
const TIMESTAMP_REGEX =
  /^(\d{2})\/([A-Za-z]{3})\/(\d{4}):(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?\s+([+-])(\d{2})(\d{2})$/;

const MONTHS: Record<string, number> = {
  jan: 0,
  feb: 1,
  mar: 2,
  apr: 3,
  may: 4,
  jun: 5,
  jul: 6,
  aug: 7,
  sep: 8,
  oct: 9,
  nov: 10,
  dec: 11,
};

// ---------------------------------------------------------------------------
// ヘルパー
// ---------------------------------------------------------------------------

function sectionsOf(sections: readonly AuditEntry[], letter: KnownSectionLetter): AuditEntry[] {
  return sections.filter((s) => s.letter === letter);
}

function linesOf(sections: AuditEntry[]): string[] {
  return sections.flatMap((s) => s.content.split('\n'));
}

function parsePort(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d{1,5}$/.test(value)) return undefined;
  const port = Number(value);
  return port <= 65535 ? port : undefined;
}

/**
 * `19/Oct/2026:10:15:42 +0000` 形式（小数秒は任意）を Date に変換する。
 * 形式が違う・日付として不正な場合は undefined。
 */
export function parseAuditTimestamp(value: string): Date | undefined {
  const match = TIMESTAMP_REGEX.exec(value.trim());
  if (!match) return undefined;

  const [, day, monthName, year, hour, minute, second, fraction, sign, offH, offM] = match;
  const month = MONTHS[monthName.toLowerCase()];
  if (month === undefined) return undefined;

  const millis = fraction ? Math.floor(Number(`0.${fraction}`) * 1000) : 0;
  const utc = Date.UTC(
    Number(year),
    month,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second),
    millis,
  );
  const offsetMinutes = (Number(offH) * 60 + Number(offM)) * (sign === '-' ? -1 : 1);
  const date = new Date(utc - offsetMinutes * 60_000);

  // Date.UTC は 31/Feb などを繰り上げるので、日付部分を突き合わせて弾く
  const check = new Date(utc);
  if (check.getUTCDate() !== Number(day) || check.getUTCMonth() !== month) return undefined;
  if (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 60) return undefined;

  return date;
}

// ---------------------------------------------------------------------------
// セクション別の抽出
// ---------------------------------------------------------------------------

interface MetadataFields {
  uniqueId?: string;
  timestamp?: Date;
  clientAddress: string;
  clientPort?: number;
  serverAddress?: string;
  serverPort?: number;
}

/**
 * A セクション: `[timestamp] unique-id client-ip client-port server-ip server-port`
 * タイムスタンプは空白を含むので、角括弧の外側だけを空白で分割する。
 * クライアントアドレスはタイムスタンプを 1 番目と数えて 3 番目のフィールド。
 */
export function extractMetadata(line: string): MetadataFields {
  let rest = line.trim();
  let timestamp: Date | undefined;

  if (rest.startsWith('[')) {
    const close = rest.indexOf(']');
    if (close === -1) {
      return { clientAddress: UNKNOWN_ADDRESS };
    }
    timestamp = parseAuditTimestamp(rest.slice(1, close));
    rest = rest.slice(close + 1);
  }

  const fields: Array<string | undefined> = rest.trim().split(/\s+/).filter((f) => f !== '');
  const [uniqueId, clientAddress, clientPort, serverAddress, serverPort] = fields;

  return {
    uniqueId,
    timestamp,
    clientAddress: clientAddress ?? UNKNOWN_ADDRESS,
    clientPort: parsePort(clientPort),
    serverAddress,
    serverPort: parsePort(serverPort),
  };
}

/** B セクションから Host ヘッダーを取り出す。見つからなければ "unknown"。 */
export function extractHost(lines: string[]): string {
  for (const line of lines) {
    const match = HOST_HEADER_REGEX.exec(line);
    if (match) {
      const value = match[1].trim();
      return value === '' ? UNKNOWN_HOST : value;
    }
  }
  return UNKNOWN_HOST;
}

/** F セクションの最初のステータス行からステータスコードを取り出す。 */
export function extractStatus(lines: string[]): number | undefined {
  for (const line of lines) {
    const match = STATUS_LINE_REGEX.exec(line);
    if (match) {
      return Number.parseInt(match[1], 10);
    }
  }
  return undefined;
}

/**
 * H セクションのルール id を発火順に集める。
 * 先頭ゼロやオーバーフローを避けるため文字列のまま保持し、重複は最初の出現だけ残す。
 */
export function extractRuleIds(content: string): string[] {
  const seen = new Set<string>();
  for (const match of content.matchAll(RULE_ID_REGEX)) {
    seen.add(match[1]);
  }
  return [...seen];
}

// ---------------------------------------------------------------------------
// メイン
// ---------------------------------------------------------------------------

/**
 * トランザクションのセクション列からフィールドを抽出する。
 * 同じ文字のセクションが複数ある場合は出現順に連結して扱う。
 */
export function extractFields(sections: readonly AuditEntry[]): ExtractedFields {
  const metadataLine = linesOf(sectionsOf(sections, SECTION_LETTERS.metadata)).find(
    (l) => l.trim() !== '',
  );
  const metadata: MetadataFields = metadataLine
    ? extractMetadata(metadataLine)
    : { clientAddress: UNKNOWN_ADDRESS };

  const headerLines = linesOf(sectionsOf(sections, SECTION_LETTERS.requestHeaders));
  const requestLine = headerLines.find((l) => l.trim() !== '')?.trim();

  const responseLines = linesOf(sectionsOf(sections, SECTION_LETTERS.responseHeaders));

  const trailer = sectionsOf(sections, SECTION_LETTERS.trailer)
    .map((s) => s.content)
    .join('\n');

  return {
    ...metadata,
    host: extractHost(headerLines),
    requestLine,
    status: extractStatus(responseLines),
    ruleIds: extractRuleIds(trailer),
    ruleFile: RULE_FILE_REGEX.exec(trailer)?.[1],
  };
}
