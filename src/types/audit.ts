/**
 * wafscope — Audit log type definitions
 *
 * シリアル形式の監査ログから組み立てる中間表現と、インデックス・検索の型。
 * すべて読み取り専用で、インジェスト後に変更されることはない。
 */

// ============================================================
// セクション
// ============================================================

/**
 * Section letters with a fixed meaning in the serial format.
 * Other capital letters (D, E, I, J, K ...) are kept verbatim but never parsed.
 */
export const SECTION_LETTERS = {
  metadata: 'A',
  requestHeaders: 'B',
  requestBody: 'C',
  responseHeaders: 'F',
  trailer: 'H',
  terminal: 'Z',
} as const;

export type KnownSectionLetter = (typeof SECTION_LETTERS)[keyof typeof SECTION_LETTERS];

/** 1 セクション分の生データ */
export interface AuditEntry {
  readonly letter: string;
  /** 境界行そのもの（改行なし） */
  readonly marker: string;
  /** セクション本文（\r 除去済み、末尾の空行は除く） */
  readonly content: string;
}

/** 境界 id を共有するセクション列（抽出前） */
export interface RawTransaction {
  readonly boundaryId: string;
  readonly sections: readonly AuditEntry[];
}

// ============================================================
// トランザクション
// ============================================================

/** Sentinel used when no Host header is present. */
export const UNKNOWN_HOST = 'unknown';

/** Sentinel used when the A section carries no client address. */
export const UNKNOWN_ADDRESS = '0.0.0.0';

/** One logged request/response cycle. */
export interface AuditGroup {
  readonly transactionId: string;
  readonly uniqueId?: string;
  readonly timestamp?: Date;
  readonly clientAddress: string;
  readonly clientPort?: number;
  readonly serverAddress?: string;
  readonly serverPort?: number;
  readonly host: string;
  readonly requestLine?: string;
  readonly status?: number;
  /** 発火順、重複なし */
  readonly ruleIds: readonly string[];
  readonly ruleFile?: string;
  /** 出現順。最後は必ず Z */
  readonly sections: readonly AuditEntry[];
}

// ============================================================
// 検索
// ============================================================

export const SEARCH_FIELDS = ['domain', 'address', 'rule', 'transactionId', 'status'] as const;

export type SearchField = (typeof SEARCH_FIELDS)[number];

export type SearchQuery =
  | { kind: 'all' }
  | { kind: 'text'; value: string }
  | { kind: 'field'; field: SearchField; value: string };

/** Positions into one GroupIndex, always in index order unless explicitly re-ordered. */
export type FilteredView = readonly number[];

export type ViewOrder = 'file' | 'newest';

// ============================================================
// 表示用カラム
// ============================================================

export const GROUP_COLUMNS = [
  'transactionId',
  'timestamp',
  'host',
  'clientAddress',
  'status',
  'ruleIds',
] as const;

export type GroupColumn = (typeof GROUP_COLUMNS)[number];

export type GroupRow = Partial<Record<GroupColumn, string>>;
