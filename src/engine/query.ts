/**
 * wafscope — Query engine
 *
 * 検索文字列を SearchQuery に解釈し、GroupIndex の位置列（FilteredView）を返す。
 *
 * - `field:value` 形式は既知のプレフィックスのときだけフィールド検索になる。
 * - それ以外はドメイン・アドレス・トランザクション id・ルール id・ステータスの全文検索。
 * - 比較はすべて大文字小文字を無視した部分一致。結果は常にインデックス順。
 */

import type {
  AuditGroup,
  FilteredView,
  SearchField,
  SearchQuery,
  ViewOrder,
} from '../types/audit.js';
import type { GroupIndex } from './group-index.js';

/** Recognized `prefix:` tokens and the field each one targets. */
export const QUERY_PREFIXES: Readonly<Record<string, SearchField>> = {
  domain: 'domain',
  ip: 'address',
  address: 'address',
  rule: 'rule',
  ruleid: 'rule',
  id: 'rule',
  auditid: 'transactionId',
  status: 'status',
  http: 'status',
};

function lookupPrefix(prefix: string): SearchField | undefined {
  return Object.prototype.hasOwnProperty.call(QUERY_PREFIXES, prefix)
    ? QUERY_PREFIXES[prefix]
    : undefined;
}

/**
 * 検索文字列を解釈する。
 * 未知のプレフィックスはエラーにせず、文字列全体を全文検索として扱う。
 */
export function parseSearchQuery(text: string): SearchQuery {
  if (text === '') {
    return { kind: 'all' };
  }

  const colon = text.indexOf(':');
  if (colon !== -1) {
    const field = lookupPrefix(text.slice(0, colon).trim().toLowerCase());
    if (field) {
      return { kind: 'field', field, value: text.slice(colon + 1).trim().toLowerCase() };
    }
  }

  return { kind: 'text', value: text.toLowerCase() };
}

function statusText(group: AuditGroup): string | undefined {
  return group.status !== undefined ? String(group.status) : undefined;
}

function fieldMatches(group: AuditGroup, field: SearchField, value: string): boolean {
  switch (field) {
    case 'domain':
      return group.host.toLowerCase().includes(value);
    case 'address':
      return group.clientAddress.toLowerCase().includes(value);
    case 'rule':
      return group.ruleIds.some((id) => id.toLowerCase().includes(value));
    case 'transactionId':
      return group.transactionId.toLowerCase().includes(value);
    case 'status':
      return statusText(group)?.includes(value) ?? false;
    default: {
      const _exhaustive: never = field;
      throw new Error(`Unknown search field: ${String(_exhaustive)}`);
    }
  }
}

/** Does one group satisfy a parsed query? */
export function matchesQuery(group: AuditGroup, query: SearchQuery): boolean {
  switch (query.kind) {
    case 'all':
      return true;
    case 'field':
      return fieldMatches(group, query.field, query.value);
    case 'text':
      return (
        fieldMatches(group, 'domain', query.value) ||
        fieldMatches(group, 'address', query.value) ||
        fieldMatches(group, 'transactionId', query.value) ||
        fieldMatches(group, 'rule', query.value) ||
        fieldMatches(group, 'status', query.value)
      );
  }
}

/**
 * インデックス全体を走査して、検索文字列にマッチする位置を返す。
 * 差分更新はせず、呼び出しごとに最初から計算し直す。
 */
export function query(index: GroupIndex, text: string): FilteredView {
  const parsed = parseSearchQuery(text);
  const view: number[] = [];
  let position = 0;
  for (const group of index) {
    if (matchesQuery(group, parsed)) view.push(position);
    position++;
  }
  return view;
}

/**
 * 表示用に並べ替えた新しいビューを返す（インデックス自体は並べ替えない）。
 * `newest` はタイムスタンプ降順の安定ソートで、タイムスタンプなしは末尾。
 */
export function orderView(index: GroupIndex, view: FilteredView, order: ViewOrder): FilteredView {
  if (order === 'file') return [...view];

  const time = (position: number): number =>
    index.at(position)?.timestamp?.getTime() ?? Number.NEGATIVE_INFINITY;
  return [...view].sort((a, b) => {
    const diff = time(b) - time(a);
    if (diff !== 0 && !Number.isNaN(diff)) return diff;
    return a - b;
  });
}
