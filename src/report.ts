/**
 * レポート生成モジュール
 * 解析済みバッチと統計値から表示用のレポートを組み立てる
 */
import { SnapshotEvent, TagHistories } from './types/data';
import { ParsedBatch } from './types/parse';
import { SequenceStats } from './types/stats';
import { AnalysisReport, CurrentStatus, ReportOptions, TagRanking } from './types/report';
import { describeState } from './sequence';
import { summarizeUtilization } from './statistics';
import { displayTimestamp } from './utils/time-utils';

export const defaultReportOptions: ReportOptions = {
  topTags: 5,
  recentEvents: 20,
  historyLimit: 10
};

/**
 * 最新イベント（ファイル名順で最後）の状況を返す
 */
export function currentStatus(events: readonly SnapshotEvent[]): CurrentStatus | null {
  if (events.length === 0) {
    return null;
  }

  const latest = events[events.length - 1];
  return {
    sequenceState: latest.sequenceState,
    state: describeState(latest.sequenceState),
    tagCount: latest.tagIds.length,
    tagIds: [...latest.tagIds],
    lastUpdated: displayTimestamp(latest.timestamp)
  };
}

/**
 * 検出回数の多い順にタグを並べる
 * 同数の場合は初回検出順
 * @param tagHistories タグ履歴
 * @param limit 上位件数
 * @param historyLimit 各タグの履歴件数
 */
export function rankTags(tagHistories: TagHistories, limit: number, historyLimit: number): TagRanking[] {
  return Array.from(tagHistories.entries())
    .sort(([, a], [, b]) => b.length - a.length)
    .slice(0, limit)
    .map(([tagId, history]) => ({
      tagId,
      detections: history.length,
      recent: historyLimit > 0 ? history.slice(-historyLimit).reverse() : []
    }));
}

/**
 * 直近のイベントを新しい順で返す
 */
export function recentEvents(events: readonly SnapshotEvent[], limit: number): SnapshotEvent[] {
  if (limit <= 0) {
    return [];
  }
  return events.slice(-limit).reverse();
}

/**
 * レポートを組み立てる
 * @param batch 解析済みバッチ
 * @param stats シーケンス別統計
 * @param options 表示件数
 * @returns レポート
 */
export function buildReport(
  batch: ParsedBatch,
  stats: SequenceStats,
  options: ReportOptions = defaultReportOptions
): AnalysisReport {
  const { events, tagHistories } = batch;

  return {
    overview: {
      fileCount: new Set(events.map(event => event.filename)).size,
      recordCount: events.length,
      uniqueTagCount: tagHistories.size
    },
    current: currentStatus(events),
    stats,
    summary: summarizeUtilization(stats),
    topTags: rankTags(tagHistories, options.topTags, options.historyLimit),
    recentEvents: recentEvents(events, options.recentEvents),
    warnings: batch.warnings,
    inversions: batch.inversions
  };
}
