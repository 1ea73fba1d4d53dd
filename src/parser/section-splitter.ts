/**
 * wafscope — Serial audit log section splitter
 *
 * ModSecurity のシリアル形式（`--<id>-<letter>--` 境界）を 1 パスで走査し、
 * 境界 id ごとにセクション列へまとめる。
 *
 * - 境界 id の形はファイルごとに異なるため、最初に見つかった境界行から学習する。
 * - Z セクションに到達したトランザクションだけを出力する。
 *   途中で別 id の境界が現れた場合や EOF に達した場合は破棄し、件数だけ数える。
 */

import type { AuditEntry, RawTransaction } from '../types/audit.js';
import { SECTION_LETTERS } from '../types/audit.js';

// ---------------------------------------------------------------------------
// 境界行
// ---------------------------------------------------------------------------

const MARKER_REGEX = /^\s*--([A-Za-z0-9]+)-([A-Z])--\s*$/;

/** Lines between two progress reports. */
export const PROGRESS_INTERVAL_LINES = 1000;

/** Boundary shape learned from the first marker of a file. */
export interface BoundaryPattern {
  idLength: number;
  /** 学習元の境界行 */
  sample: string;
}

export interface BoundaryMarker {
  id: string;
  letter: string;
}

/**
 * 1 行が境界行かどうかを判定する。
 * pattern が与えられた場合は、学習済みの id 長と一致するものだけを境界とみなす。
 */
export function matchBoundary(line: string, pattern?: BoundaryPattern): BoundaryMarker | undefined {
  const match = MARKER_REGEX.exec(line);
  if (!match) return undefined;
  const [, id, letter] = match;
  if (pattern && id.length !== pattern.idLength) return undefined;
  return { id, letter };
}

// ---------------------------------------------------------------------------
// 分割
// ---------------------------------------------------------------------------

export interface SplitResult {
  transactions: RawTransaction[];
  /** Z に到達せず破棄したトランザクション数 */
  incomplete: number;
  lines: number;
  boundary?: BoundaryPattern;
}

/** Called with UTF-8 bytes consumed so far and the total input size in bytes. */
export type SplitProgress = (consumed: number, total: number) => void;

interface OpenSection {
  letter: string;
  marker: string;
  lines: string[];
}

interface OpenTransaction {
  id: string;
  sections: AuditEntry[];
}

function closeSection(section: OpenSection): AuditEntry {
  let end = section.lines.length;
  while (end > 0 && section.lines[end - 1].trim() === '') {
    end--;
  }
  return {
    letter: section.letter,
    marker: section.marker,
    content: section.lines.slice(0, end).join('\n'),
  };
}

/**
 * 監査ログ全文をトランザクション単位のセクション列に分割する。
 *
 * @param content    ログファイル全文（\r\n / \n どちらでもよい）
 * @param onProgress 1000 行ごとと終了時に呼ばれる
 */
export function splitSections(content: string, onProgress?: SplitProgress): SplitResult {
  const total = Buffer.byteLength(content, 'utf-8');
  const rawLines = content === '' ? [] : content.split('\n');

  const transactions: RawTransaction[] = [];
  let boundary: BoundaryPattern | undefined;
  let current: OpenTransaction | undefined;
  let open: OpenSection | undefined;
  let finishedId: string | undefined;
  let incomplete = 0;
  let consumed = 0;

  for (let i = 0; i < rawLines.length; i++) {
    const rawLine = rawLines[i];
    consumed += Buffer.byteLength(rawLine, 'utf-8') + 1;
    if (onProgress && (i + 1) % PROGRESS_INTERVAL_LINES === 0) {
      onProgress(Math.min(consumed, total), total);
    }

    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    const marker = matchBoundary(line, boundary);

    if (!marker) {
      // 境界外（最初の境界より前、Z の後、閉じた直後）の行は捨てる
      if (open) open.lines.push(line);
      continue;
    }

    if (!boundary) {
      boundary = { idLength: marker.id.length, sample: line.trim() };
    }

    // 未完了のまま次の id が始まった → 前のトランザクションは破棄
    if (current && marker.id !== current.id) {
      incomplete++;
      current = undefined;
      open = undefined;
    }

    if (!current) {
      // 完了済み id の境界（Z の閉じ行など）は無視する
      if (marker.id === finishedId) continue;
      current = { id: marker.id, sections: [] };
    }

    if (open) {
      current.sections.push(closeSection(open));
      const closesOpenSection = open.letter === marker.letter;
      open = undefined;
      if (closesOpenSection) continue;
    }

    if (marker.letter === SECTION_LETTERS.terminal) {
      current.sections.push({ letter: marker.letter, marker: line.trim(), content: '' });
      transactions.push({ boundaryId: current.id, sections: current.sections });
      finishedId = current.id;
      current = undefined;
      continue;
    }

    open = { letter: marker.letter, marker: line.trim(), lines: [] };
  }

  if (current) {
    incomplete++;
  }

  onProgress?.(total, total);

  const lines = content.endsWith('\n') ? rawLines.length - 1 : rawLines.length;
  return { transactions, incomplete, lines, boundary };
}
