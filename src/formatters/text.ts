/**
 * テキストフォーマッタ
 * レポートをコンソール表示用のプレーンテキストに整形する
 */
import { AnalysisReport } from '../types/report';
import { ParseWarning, TimestampInversion } from '../types/parse';
import { describeState, SEQUENCE_CODES } from '../sequence';
import { displayTimestamp } from '../utils/time-utils';
import { ReportFormatter } from './types';

const TAG_ABBREVIATION_THRESHOLD = 20;

/**
 * 長いタグIDを先頭8文字...末尾8文字に省略する
 * @param tagId タグID
 * @returns 表示用タグID
 */
export function abbreviateTagId(tagId: string): string {
  if (tagId.length <= TAG_ABBREVIATION_THRESHOLD) {
    return tagId;
  }
  return `${tagId.slice(0, 8)}...${tagId.slice(-8)}`;
}

function fixed(value: number): string {
  return value.toFixed(1);
}

/**
 * テキストフォーマッタクラス
 */
export class TextFormatter implements ReportFormatter {
  format(report: AnalysisReport): string {
    return [
      ...this.overviewSection(report),
      ...this.currentSection(report),
      ...this.statsSection(report),
      ...this.summarySection(report),
      ...this.tagSection(report),
      ...this.logSection(report),
      ...this.warningSection(report.warnings, report.inversions)
    ].join('\n');
  }

  private overviewSection(report: AnalysisReport): string[] {
    const { overview } = report;
    return [
      '=== データ概要 ===',
      `ファイル数: ${overview.fileCount}`,
      `レコード数: ${overview.recordCount}`,
      `ユニークタグ数: ${overview.uniqueTagCount}`,
      ''
    ];
  }

  private currentSection(report: AnalysisReport): string[] {
    const { current } = report;
    if (!current) {
      return ['=== 現在の状況 ===', 'データがありません', ''];
    }

    const lines = [
      '=== 現在の状況 ===',
      `現在のシーケンス: ${current.sequenceState} (${current.state.displayName})`,
      `検出中のタグ数: ${current.tagCount}`,
      `総タグ数: ${report.overview.uniqueTagCount}`,
      `最終更新: ${current.lastUpdated}`
    ];
    current.tagIds.forEach((tagId, i) => {
      lines.push(`  タグ ${i + 1}: ${abbreviateTagId(tagId)}`);
    });
    lines.push('');
    return lines;
  }

  private statsSection(report: AnalysisReport): string[] {
    const lines = [
      '=== シーケンス別稼働状況 ===',
      'seq | ステータス | 出現回数 | 出現率(%) | 総時間(分) | 平均時間(分) | 時間割合(%)'
    ];

    for (const code of SEQUENCE_CODES) {
      const stats = report.stats[code];
      if (!stats) continue;

      lines.push([
        code,
        describeState(code).displayName,
        String(stats.count),
        fixed(stats.percentageOfEvents),
        fixed(stats.totalDurationMinutes),
        fixed(stats.avgDurationMinutes),
        fixed(stats.percentageOfTime)
      ].join(' | '));
    }
    lines.push('');
    return lines;
  }

  private summarySection(report: AnalysisReport): string[] {
    const { summary } = report;
    return [
      '=== 全体サマリー ===',
      `総計測回数: ${report.overview.recordCount}`,
      `加工中時間: ${fixed(summary.workingMinutes)}分`,
      `待機時間: ${fixed(summary.waitingMinutes)}分`,
      `稼働効率: ${fixed(summary.efficiency)}%`,
      ''
    ];
  }

  private tagSection(report: AnalysisReport): string[] {
    if (report.topTags.length === 0) {
      return ['=== タグ履歴 ===', 'タグ履歴がありません', ''];
    }

    const lines = ['=== タグ履歴 ==='];
    for (const ranking of report.topTags) {
      lines.push(`${abbreviateTagId(ranking.tagId)} (${ranking.detections}回検出)`);
      for (const entry of ranking.recent) {
        lines.push(`  ${displayTimestamp(entry.timestamp)} | ${entry.sequenceState} | ${describeState(entry.sequenceState).displayName}`);
      }
    }
    lines.push('');
    return lines;
  }

  private logSection(report: AnalysisReport): string[] {
    if (report.recentEvents.length === 0) {
      return ['=== 時系列ログ ===', 'ログデータがありません', ''];
    }

    const lines = ['=== 時系列ログ ==='];
    for (const event of report.recentEvents) {
      lines.push([
        displayTimestamp(event.timestamp),
        event.sequenceState,
        describeState(event.sequenceState).displayName,
        `タグ数 ${event.tagIds.length}`
      ].join(' | '));
    }
    lines.push('');
    return lines;
  }

  private warningSection(warnings: ParseWarning[], inversions: TimestampInversion[]): string[] {
    if (warnings.length === 0 && inversions.length === 0) {
      return [];
    }

    const lines = ['=== 警告 ==='];
    for (const warning of warnings) {
      lines.push(`! ${warning.message}`);
    }
    for (const inversion of inversions) {
      lines.push(`! 時刻の逆行: ${inversion.previousFilename} -> ${inversion.filename} (${fixed(inversion.deltaMinutes)}分)`);
    }
    return lines;
  }
}
