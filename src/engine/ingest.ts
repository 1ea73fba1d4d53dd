/**
 * wafscope — Ingest Engine
 *
 * 監査ログを読み込み、セクション分割・フィールド抽出して新しい GroupIndex を作る。
 * ingestContent() はコアロジック（ファイルシステム非依存・テスト可能）。
 * ingest() はファイル読み込みの薄いラッパー。
 *
 * 進捗は read → split → extract の 3 フェーズで粗い間隔で通知する。
 */

import fs from 'node:fs';
import path from 'node:path';
import type { AuditGroup, RawTransaction } from '../types/audit.js';
import type {
  IngestPhase,
  IngestResult,
  ProgressCallback,
} from '../types/engine.js';
import { IngestError } from '../types/engine.js';
import { splitSections } from '../parser/section-splitter.js';
import { extractFields } from '../parser/field-extractor.js';
import { GroupIndex } from './group-index.js';
import { logger as rootLogger, type Logger } from '../logger.js';

/** Transactions between two progress reports in the extract phase. */
const EXTRACT_PROGRESS_INTERVAL = 500;

/** Share of the overall progress bar each phase covers: [start, end). */
const PHASE_SPAN: Record<IngestPhase, [number, number]> = {
  read: [0, 0.2],
  split: [0.2, 0.7],
  extract: [0.7, 1],
};

export interface IngestOptions {
  onProgress?: ProgressCallback;
  logger?: Logger;
}

function report(
  onProgress: ProgressCallback | undefined,
  phase: IngestPhase,
  processed: number,
  total: number,
  message: string,
): void {
  if (!onProgress) return;
  const [start, end] = PHASE_SPAN[phase];
  const ratio = total > 0 ? Math.min(processed / total, 1) : 1;
  onProgress({ phase, processed, total, fraction: start + (end - start) * ratio, message });
}

/** 1 トランザクションを AuditGroup に変換する。 */
export function buildGroup(transaction: RawTransaction): AuditGroup {
  const fields = extractFields(transaction.sections);
  return {
    transactionId: transaction.boundaryId,
    ...fields,
    sections: transaction.sections,
  };
}

/**
 * ログ全文を受け取り、GroupIndex を構築する。
 * トランザクション単位・フィールド単位の不備は吸収し、処理全体は中断しない。
 *
 * @param content    監査ログ全文
 * @param sourcePath GroupIndex に記録するファイルパス
 */
export function ingestContent(
  content: string,
  sourcePath: string,
  options: IngestOptions = {},
): IngestResult {
  const { onProgress } = options;
  const log = (options.logger ?? rootLogger).child({ component: 'ingest' });
  const startedAt = Date.now();

  // 1. セクション分割
  const size = Buffer.byteLength(content, 'utf-8');
  report(onProgress, 'split', 0, size, 'Splitting audit log into sections...');
  const split = splitSections(content, (consumed, total) => {
    report(onProgress, 'split', consumed, total, `Scanned ${consumed} of ${total} bytes`);
  });

  if (split.incomplete > 0) {
    log.warn(
      { sourcePath, incomplete: split.incomplete },
      'discarded transactions without a terminal Z section',
    );
  }

  // 2. フィールド抽出
  const total = split.transactions.length;
  const groups: AuditGroup[] = [];
  let sections = 0;
  report(onProgress, 'extract', 0, total, 'Extracting transaction fields...');
  for (const transaction of split.transactions) {
    groups.push(buildGroup(transaction));
    sections += transaction.sections.length;
    if (groups.length % EXTRACT_PROGRESS_INTERVAL === 0) {
      report(onProgress, 'extract', groups.length, total, `Indexed ${groups.length} transactions`);
    }
  }
  report(onProgress, 'extract', total, total, `Indexed ${total} transactions`);

  const index = new GroupIndex(groups, sourcePath);
  const stats = {
    bytes: size,
    lines: split.lines,
    incomplete: split.incomplete,
    groups: index.size,
    sections,
    durationMs: Date.now() - startedAt,
  };

  log.info({ sourcePath, ...stats, boundary: split.boundary?.sample }, 'audit log indexed');

  return { index, stats };
}

/**
 * 読み込んだバイト列を文字列にする。不正な UTF-8 は U+FFFD に置き換えて読み進める。
 * 1 つの文字列に収まらないサイズ（ERR_STRING_TOO_LONG）は IngestError にする。
 */
export function decodeAuditLog(bytes: Buffer, resolved: string): string {
  try {
    return bytes.toString('utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new IngestError(`Cannot decode audit log ${resolved}: ${reason}`, resolved, { cause: err });
  }
}

/**
 * ファイルパスから監査ログを読み込み、インジェストする。
 * 読み込みに失敗した場合は IngestError を投げ、インデックスは作らない。
 */
export function ingest(filePath: string, options: IngestOptions = {}): IngestResult {
  const resolved = path.resolve(filePath);

  report(options.onProgress, 'read', 0, 1, `Reading ${resolved}...`);
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(resolved);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new IngestError(`Cannot read audit log ${resolved}: ${reason}`, resolved, { cause: err });
  }
  const content = decodeAuditLog(bytes, resolved);
  report(
    options.onProgress,
    'read',
    bytes.length,
    bytes.length,
    `File size: ${(bytes.length / 1_000_000).toFixed(2)} MB (${bytes.length} bytes)`,
  );

  const result = ingestContent(content, resolved, options);
  return { index: result.index, stats: { ...result.stats, bytes: bytes.length } };
}
