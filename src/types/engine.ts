/**
 * wafscope — Engine layer type definitions
 *
 * Engine 層の入出力型。MCP / テストの両方から再利用可能。
 */

import type { GroupIndex } from '../engine/group-index.js';

// ============================================================
// Progress
// ============================================================

/** The three logical phases of one ingest pass, in order. */
export type IngestPhase = 'read' | 'split' | 'extract';

export interface ProgressEvent {
  phase: IngestPhase;
  /** 処理済み量（read/split はバイト数、extract はトランザクション数） */
  processed: number;
  total: number;
  /** 全体の進捗 0..1（3 フェーズ通し） */
  fraction: number;
  message: string;
}

export type ProgressCallback = (event: ProgressEvent) => void;

// ============================================================
// Ingest
// ============================================================

export interface IngestStats {
  bytes: number;
  lines: number;
  /** Z まで到達せず破棄したトランザクション数 */
  incomplete: number;
  groups: number;
  sections: number;
  durationMs: number;
}

/** ingest() の戻り値。新しい GroupIndex と集計値を返す。 */
export interface IngestResult {
  index: GroupIndex;
  stats: IngestStats;
}

// ============================================================
// Errors
// ============================================================

/** The audit log could not be read. No index is produced. */
export class IngestError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IngestError';
    this.path = path;
  }
}
