/**
 * JSONフォーマッタ
 */
import { SnapshotTimestamp } from '../types/data';
import { AnalysisReport } from '../types/report';
import { displayTimestamp } from '../utils/time-utils';
import { ReportFormatter } from './types';

/**
 * タイムスタンプを表示用文字列と時刻値（解析失敗時はnull）に展開
 */
function serializeTimestamp(timestamp: SnapshotTimestamp): { timestamp: string; epochMs: number | null } {
  return {
    timestamp: displayTimestamp(timestamp),
    epochMs: timestamp.kind === 'parsed' ? timestamp.epochMs : null
  };
}

/**
 * JSONシリアライズ可能な形式に変換する
 * @param report レポート
 * @returns プレーンオブジェクト
 */
export function toJsonReport(report: AnalysisReport): Record<string, unknown> {
  return {
    overview: report.overview,
    current: report.current,
    stats: report.stats,
    summary: report.summary,
    topTags: report.topTags.map(ranking => ({
      tagId: ranking.tagId,
      detections: ranking.detections,
      recent: ranking.recent.map(entry => ({
        ...serializeTimestamp(entry.timestamp),
        sequenceState: entry.sequenceState,
        sourceFilename: entry.sourceFilename
      }))
    })),
    recentEvents: report.recentEvents.map(event => ({
      filename: event.filename,
      ...serializeTimestamp(event.timestamp),
      sequenceState: event.sequenceState,
      tagCount: event.tagIds.length,
      tagIds: event.tagIds
    })),
    warnings: report.warnings,
    inversions: report.inversions
  };
}

export class JsonFormatter implements ReportFormatter {
  constructor(private indent: number = 2) {}

  format(report: AnalysisReport): string {
    return JSON.stringify(toJsonReport(report), null, this.indent);
  }
}
