import { describe, it, expect } from 'vitest';
import {
  GroupIndex,
  NOT_AVAILABLE,
  formatRuleIds,
  formatTimestamp,
} from '../../src/engine/group-index.js';
import type { AuditGroup } from '../../src/types/audit.js';

// ---------------------------------------------------------------------------
// ヘルパー
// ---------------------------------------------------------------------------

function makeGroup(overrides: Partial<AuditGroup> & { transactionId: string }): AuditGroup {
  return {
    clientAddress: '203.0.113.5',
    host: 'www.example.com',
    ruleIds: [],
    sections: [
      { letter: 'A', marker: `--${overrides.transactionId}-A--`, content: 'meta line' },
      { letter: 'Z', marker: `--${overrides.transactionId}-Z--`, content: '' },
    ],
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// フォーマット
// ---------------------------------------------------------------------------

describe('formatTimestamp', () => {
  it('UTC の YYYY-MM-DD HH:MM:SS にする', () => {
    expect(formatTimestamp(new Date(Date.UTC(2026, 9, 19, 8, 5, 3)))).toBe('2026-10-19 08:05:03');
  });
});

describe('formatRuleIds', () => {
  it('3 件までは列挙する', () => {
    expect(formatRuleIds(['942100', '933100'])).toBe('942100, 933100');
    expect(formatRuleIds([])).toBe('');
  });

  it('4 件以上は残りを (+N) にまとめる', () => {
    expect(formatRuleIds(['1', '2', '3', '4', '5'])).toBe('1, 2, 3 (+2)');
  });
});

// ---------------------------------------------------------------------------
// GroupIndex
// ---------------------------------------------------------------------------

describe('GroupIndex', () => {
  it('ファイル出現順に保持し、位置とトランザクション id で引ける', () => {
    const index = new GroupIndex(
      [makeGroup({ transactionId: 'aaaa0001' }), makeGroup({ transactionId: 'aaaa0002' })],
      '/var/log/modsec_audit.log',
      '2026-10-19T00:00:00.000Z',
    );

    expect(index.size).toBe(2);
    expect(index.sourcePath).toBe('/var/log/modsec_audit.log');
    expect(index.builtAt).toBe('2026-10-19T00:00:00.000Z');
    expect(index.positions()).toEqual([0, 1]);
    expect(index.at(1)?.transactionId).toBe('aaaa0002');
    expect(index.positionOf('aaaa0002')).toBe(1);
    expect(index.positionOf('missing')).toBeUndefined();
    expect([...index].map((g) => g.transactionId)).toEqual(['aaaa0001', 'aaaa0002']);
  });

  it('範囲外・整数でない位置は undefined', () => {
    const index = new GroupIndex([makeGroup({ transactionId: 'aaaa0001' })], '/tmp/a.log');
    expect(index.at(-1)).toBeUndefined();
    expect(index.at(1)).toBeUndefined();
    expect(index.at(0.5)).toBeUndefined();
    expect(index.sections(5)).toEqual([]);
    expect(index.rawContent(5)).toBeUndefined();
    expect(index.project(5, ['host'])).toBeUndefined();
  });

  it('同じ id が複数あれば最初の位置を返す', () => {
    const index = new GroupIndex(
      [makeGroup({ transactionId: 'dup', host: 'first' }), makeGroup({ transactionId: 'dup', host: 'second' })],
      '/tmp/a.log',
    );
    expect(index.positionOf('dup')).toBe(0);
  });

  it('構築後は元の配列を変更しても影響を受けず、要素は凍結されている', () => {
    const groups = [makeGroup({ transactionId: 'aaaa0001', ruleIds: ['942100'] })];
    const index = new GroupIndex(groups, '/tmp/a.log');
    groups.push(makeGroup({ transactionId: 'aaaa0002' }));

    expect(index.size).toBe(1);
    expect(Object.isFrozen(index.at(0))).toBe(true);
    expect(Object.isFrozen(index.at(0)?.ruleIds)).toBe(true);
    expect(Object.isFrozen(index.sections(0)[0])).toBe(true);
  });

  it('empty() は空のインデックスを返す', () => {
    const index = GroupIndex.empty();
    expect(index.size).toBe(0);
    expect(index.sourcePath).toBe('');
  });

  it('rawContent は境界行込みでセクションを空行区切りに戻す', () => {
    const index = new GroupIndex([makeGroup({ transactionId: 'x1' })], '/tmp/a.log');
    expect(index.rawContent(0)).toBe('--x1-A--\nmeta line\n\n--x1-Z--');
  });

  it('project は表示用の文字列を返し、欠損値は N/A にする', () => {
    const index = new GroupIndex(
      [
        makeGroup({
          transactionId: 'aaaa0001',
          timestamp: new Date('2026-10-19T12:00:00.000Z'),
          status: 403,
          ruleIds: ['942100', '933100', '920350', '941100'],
        }),
        makeGroup({ transactionId: 'aaaa0002' }),
      ],
      '/tmp/a.log',
    );

    expect(
      index.project(0, ['transactionId', 'timestamp', 'host', 'clientAddress', 'status', 'ruleIds']),
    ).toEqual({
      transactionId: 'aaaa0001',
      timestamp: '2026-10-19 12:00:00',
      host: 'www.example.com',
      clientAddress: '203.0.113.5',
      status: '403',
      ruleIds: '942100, 933100, 920350 (+1)',
    });
    expect(index.project(1, ['timestamp', 'status'])).toEqual({
      timestamp: NOT_AVAILABLE,
      status: NOT_AVAILABLE,
    });
  });
});
