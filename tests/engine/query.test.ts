import { describe, it, expect, beforeAll } from 'vitest';
import { matchesQuery, orderView, parseSearchQuery, query } from '../../src/engine/query.js';
import { ingestContent } from '../../src/engine/ingest.js';
import type { GroupIndex } from '../../src/engine/group-index.js';
import { SAMPLE_LOG, buildLog } from '../helpers/audit-log.js';

// ---------------------------------------------------------------------------
// parseSearchQuery
// ---------------------------------------------------------------------------

describe('parseSearchQuery', () => {
  it('空文字は全件', () => {
    expect(parseSearchQuery('')).toEqual({ kind: 'all' });
  });

  it('既知のプレフィックスはフィールド検索になる', () => {
    expect(parseSearchQuery('domain:Example.com')).toEqual({
      kind: 'field',
      field: 'domain',
      value: 'example.com',
    });
    expect(parseSearchQuery('ip: 203.0.113')).toEqual({
      kind: 'field',
      field: 'address',
      value: '203.0.113',
    });
    expect(parseSearchQuery('RuleID:942')).toEqual({ kind: 'field', field: 'rule', value: '942' });
    expect(parseSearchQuery('id:942')).toEqual({ kind: 'field', field: 'rule', value: '942' });
    expect(parseSearchQuery('auditid:AAAA')).toEqual({
      kind: 'field',
      field: 'transactionId',
      value: 'aaaa',
    });
    expect(parseSearchQuery('http:40')).toEqual({ kind: 'field', field: 'status', value: '40' });
  });

  it('未知のプレフィックスは全体を全文検索にする', () => {
    expect(parseSearchQuery('foo:Bar')).toEqual({ kind: 'text', value: 'foo:bar' });
    expect(parseSearchQuery('2001:DB8')).toEqual({ kind: 'text', value: '2001:db8' });
  });

  it('Object のプロトタイプ名はプレフィックスとみなさない', () => {
    expect(parseSearchQuery('constructor:x')).toEqual({ kind: 'text', value: 'constructor:x' });
  });
});

// ---------------------------------------------------------------------------
// query / matchesQuery
// ---------------------------------------------------------------------------

describe('query', () => {
  let index: GroupIndex;

  beforeAll(() => {
    index = ingestContent(SAMPLE_LOG, '/tmp/sample.log').index;
  });

  it('空のクエリは全位置をインデックス順に返す', () => {
    expect(query(index, '')).toEqual([0, 1, 2]);
  });

  it('rule: はルール id の部分一致', () => {
    expect(query(index, 'rule:9421')).toEqual([1]);
  });

  it('status: はステータスコード文字列の部分一致', () => {
    expect(query(index, 'status:50')).toEqual([2]);
  });

  it('domain: は大文字小文字を無視する', () => {
    expect(query(index, 'domain:example.com')).toEqual([0, 2]);
    expect(query(index, 'DOMAIN:API')).toEqual([1]);
  });

  it('ip: はクライアントアドレスの部分一致', () => {
    expect(query(index, 'ip:203.0.113')).toEqual([0]);
  });

  it('auditid: はトランザクション id を大文字小文字を無視して比較する', () => {
    expect(query(index, 'auditid:AAAA0002')).toEqual([1]);
  });

  it('全文検索はドメイン・アドレス・id・ルール・ステータスのいずれかに一致すればよい', () => {
    expect(query(index, 'Example')).toEqual([0, 2]);
    expect(query(index, '2001:db8')).toEqual([2]);
    expect(query(index, '403')).toEqual([1]);
    expect(query(index, 'aaaa000')).toEqual([0, 1, 2]);
  });

  it('一致しなければ空のビュー', () => {
    expect(query(index, 'nomatch-token')).toEqual([]);
    expect(query(index, 'foo:bar')).toEqual([]);
  });

  it('ステータスがないトランザクションは status 検索に一致しない', () => {
    const group = {
      transactionId: 'dddd0001',
      clientAddress: '203.0.113.77',
      host: 'www.example.com',
      ruleIds: [],
      sections: [],
    };
    expect(matchesQuery(group, { kind: 'field', field: 'status', value: '' })).toBe(false);
    expect(matchesQuery(group, { kind: 'all' })).toBe(true);
  });

  it('部分一致なので status:20 は 200 にも 420 にも一致する', () => {
    const other = ingestContent(
      buildLog([
        { id: 'bbbb0001', clientAddress: '192.0.2.1', host: 'a.example', status: 200 },
        { id: 'bbbb0002', clientAddress: '192.0.2.2', host: 'b.example', status: 420 },
        { id: 'bbbb0003', clientAddress: '192.0.2.3', host: 'c.example', status: 302 },
      ]),
      '/tmp/other.log',
    ).index;
    expect(query(other, 'status:20')).toEqual([0, 1]);
  });
});

// ---------------------------------------------------------------------------
// orderView
// ---------------------------------------------------------------------------

describe('orderView', () => {
  it('file はビューのコピーをそのまま返す', () => {
    const index = ingestContent(SAMPLE_LOG, '/tmp/sample.log').index;
    const view = [0, 1, 2];
    const ordered = orderView(index, view, 'file');
    expect(ordered).toEqual([0, 1, 2]);
    expect(ordered).not.toBe(view);
  });

  it('newest はタイムスタンプ降順で、タイムスタンプなしは末尾', () => {
    const index = ingestContent(SAMPLE_LOG, '/tmp/sample.log').index;
    expect(orderView(index, [0, 1, 2], 'newest')).toEqual([1, 0, 2]);
  });

  it('同じタイムスタンプは元の順序を保つ', () => {
    const index = ingestContent(
      buildLog([
        { id: 'cccc0001', timestamp: '19/Oct/2026:09:00:00 +0000', clientAddress: '192.0.2.1', host: 'a', status: 200 },
        { id: 'cccc0002', timestamp: '19/Oct/2026:09:00:00 +0000', clientAddress: '192.0.2.2', host: 'b', status: 200 },
        { id: 'cccc0003', clientAddress: '192.0.2.3', host: 'c', status: 200 },
        { id: 'cccc0004', clientAddress: '192.0.2.4', host: 'd', status: 200 },
      ]),
      '/tmp/ties.log',
    ).index;
    expect(orderView(index, [0, 1, 2, 3], 'newest')).toEqual([0, 1, 2, 3]);
  });
});
