/**
 * wafscope — Group Index
 *
 * インジェスト 1 回分の AuditGroup をファイル出現順に保持する不変コレクション。
 * リフレッシュ時はインスタンスごと置き換え、既存インスタンスは変更しない。
 * 表示層向けの読み取り専用プロジェクション（生セクション、カラム値）もここで提供する。
 */

import type { AuditEntry, AuditGroup, GroupColumn, GroupRow } from '../types/audit.js';

/** Rule ids shown in a row before the remainder is collapsed to "(+N)". */
const ROW_RULE_ID_LIMIT = 3;

/** Placeholder for absent column values. */
export const NOT_AVAILABLE = 'N/A';

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/** `2026-10-19 10:15:42` (UTC) */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())} ` +
    `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())}`
  );
}

export function formatRuleIds(ruleIds: readonly string[]): string {
  if (ruleIds.length > ROW_RULE_ID_LIMIT) {
    const shown = ruleIds.slice(0, ROW_RULE_ID_LIMIT).join(', ');
    return `${shown} (+${ruleIds.length - ROW_RULE_ID_LIMIT})`;
  }
  return ruleIds.join(', ');
}

function columnValue(group: AuditGroup, column: GroupColumn): string {
  switch (column) {
    case 'transactionId':
      return group.transactionId;
    case 'timestamp':
      return group.timestamp ? formatTimestamp(group.timestamp) : NOT_AVAILABLE;
    case 'host':
      return group.host;
    case 'clientAddress':
      return group.clientAddress;
    case 'status':
      return group.status !== undefined ? String(group.status) : NOT_AVAILABLE;
    case 'ruleIds':
      return formatRuleIds(group.ruleIds);
    default: {
      const _exhaustive: never = column;
      throw new Error(`Unknown column: ${String(_exhaustive)}`);
    }
  }
}

function freezeGroup(group: AuditGroup): AuditGroup {
  return Object.freeze({
    ...group,
    ruleIds: Object.freeze([...group.ruleIds]),
    sections: Object.freeze(group.sections.map((s) => Object.freeze({ ...s }))),
  });
}

/**
 * Ordered, immutable collection of transactions in file order.
 */
export class GroupIndex implements Iterable<AuditGroup> {
  readonly sourcePath: string;
  readonly builtAt: string;
  private readonly groups: readonly AuditGroup[];
  private readonly positionById: ReadonlyMap<string, number>;

  constructor(groups: readonly AuditGroup[], sourcePath: string, builtAt = new Date().toISOString()) {
    this.groups = Object.freeze(groups.map(freezeGroup));
    this.sourcePath = sourcePath;
    this.builtAt = builtAt;

    const positions = new Map<string, number>();
    this.groups.forEach((g, i) => {
      if (!positions.has(g.transactionId)) positions.set(g.transactionId, i);
    });
    this.positionById = positions;
  }

  /** An index with no groups (before the first ingest). */
  static empty(): GroupIndex {
    return new GroupIndex([], '');
  }

  get size(): number {
    return this.groups.length;
  }

  [Symbol.iterator](): Iterator<AuditGroup> {
    return this.groups[Symbol.iterator]();
  }

  /** Group at a position, or undefined when out of range. */
  at(position: number): AuditGroup | undefined {
    if (!Number.isInteger(position) || position < 0 || position >= this.groups.length) {
      return undefined;
    }
    return this.groups[position];
  }

  /** Position of a transaction id, or undefined. */
  positionOf(transactionId: string): number | undefined {
    return this.positionById.get(transactionId);
  }

  /** Every position, in index order. */
  positions(): number[] {
    return this.groups.map((_, i) => i);
  }

  /** Sections of one group, verbatim and in file order. */
  sections(position: number): readonly AuditEntry[] {
    return this.at(position)?.sections ?? [];
  }

  /**
   * 1 グループを境界行込みのテキストに戻す（詳細表示用）。
   * セクション間には空行を 1 行挟む。
   */
  rawContent(position: number): string | undefined {
    const group = this.at(position);
    if (!group) return undefined;
    return group.sections
      .map((s) => (s.content === '' ? s.marker : `${s.marker}\n${s.content}`))
      .join('\n\n');
  }

  /** Display strings for the requested columns of one group. */
  project(position: number, columns: readonly GroupColumn[]): GroupRow | undefined {
    const group = this.at(position);
    if (!group) return undefined;
    const row: GroupRow = {};
    for (const column of columns) {
      row[column] = columnValue(group, column);
    }
    return row;
  }
}
