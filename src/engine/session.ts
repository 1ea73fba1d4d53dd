/**
 * wafscope — Audit session
 *
 * 不変の GroupIndex と、そこから導出した FilteredView の組を保持する。
 * リフレッシュは新しいインデックスを完成させてから丸ごと差し替え、
 * ビューは現在の検索文字列で必ず再計算する（古いビューを使い回さない）。
 */

import type { AuditGroup, FilteredView, ViewOrder } from '../types/audit.js';
import type { IngestResult, IngestStats } from '../types/engine.js';
import { GroupIndex } from './group-index.js';
import { ingest, type IngestOptions } from './ingest.js';
import { orderView, query } from './query.js';

export class AuditSession {
  private currentIndex: GroupIndex = GroupIndex.empty();
  private currentView: FilteredView = [];
  private currentQuery = '';
  private currentOrder: ViewOrder = 'file';
  private lastStats: IngestStats | undefined;

  get index(): GroupIndex {
    return this.currentIndex;
  }

  /** Filtered view over the current index, in the active order. */
  get view(): FilteredView {
    return this.currentView;
  }

  get query(): string {
    return this.currentQuery;
  }

  get order(): ViewOrder {
    return this.currentOrder;
  }

  get stats(): IngestStats | undefined {
    return this.lastStats;
  }

  get loaded(): boolean {
    return this.currentIndex.sourcePath !== '';
  }

  /** Install a freshly built index and recompute the view against it. */
  install(result: IngestResult): void {
    this.currentIndex = result.index;
    this.lastStats = result.stats;
    this.recompute();
  }

  /**
   * ファイルを読み込んで新しいインデックスに差し替える。
   * 読み込みに失敗した場合は例外を投げ、現在のインデックスはそのまま残る。
   */
  load(filePath: string, options: IngestOptions = {}): IngestResult {
    const result = ingest(filePath, options);
    this.install(result);
    return result;
  }

  /** Re-parse the current file from scratch. */
  refresh(options: IngestOptions = {}): IngestResult {
    if (!this.loaded) {
      throw new Error('No audit log loaded');
    }
    return this.load(this.currentIndex.sourcePath, options);
  }

  setQuery(text: string): FilteredView {
    this.currentQuery = text;
    this.recompute();
    return this.currentView;
  }

  clearQuery(): FilteredView {
    return this.setQuery('');
  }

  setOrder(order: ViewOrder): FilteredView {
    this.currentOrder = order;
    this.recompute();
    return this.currentView;
  }

  /** Query and order in one step; the view is recomputed once. */
  applySearch(text: string, order: ViewOrder): FilteredView {
    this.currentQuery = text;
    this.currentOrder = order;
    this.recompute();
    return this.currentView;
  }

  /** Group at a position of the current view. */
  groupAt(viewPosition: number): AuditGroup | undefined {
    const position = this.currentView[viewPosition];
    return position === undefined ? undefined : this.currentIndex.at(position);
  }

  /** Groups of the current view, in view order. */
  visibleGroups(): AuditGroup[] {
    return this.currentView.flatMap((position) => {
      const group = this.currentIndex.at(position);
      return group ? [group] : [];
    });
  }

  private recompute(): void {
    const matched = query(this.currentIndex, this.currentQuery);
    this.currentView = orderView(this.currentIndex, matched, this.currentOrder);
  }
}
