/**
 * レポート型定義
 */
import { SnapshotEvent, TagHistoryEntry } from './data';
import { ParseWarning, TimestampInversion } from './parse';
import { SequenceStats, UtilizationSummary } from './stats';
import { StateDescriptor } from '../sequence';

export interface ReportOptions {
  topTags: number;
  recentEvents: number;
  historyLimit: number;
}

export interface CurrentStatus {
  sequenceState: string;
  state: StateDescriptor;
  tagCount: number;
  tagIds: string[];
  lastUpdated: string;
}

export interface TagRanking {
  tagId: string;
  detections: number;
  /** 新しい順 */
  recent: TagHistoryEntry[];
}

export interface AnalysisReport {
  overview: {
    fileCount: number;
    recordCount: number;
    uniqueTagCount: number;
  };
  current: CurrentStatus | null;
  stats: SequenceStats;
  summary: UtilizationSummary;
  topTags: TagRanking[];
  /** 新しい順 */
  recentEvents: SnapshotEvent[];
  warnings: ParseWarning[];
  inversions: TimestampInversion[];
}
