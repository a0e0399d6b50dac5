/**
 * 解析結果・警告の型定義
 */
import { SnapshotEvent, TagHistories } from './data';

export interface MalformedHeaderError {
  kind: 'MalformedHeader';
  filename: string;
  fieldCount: number;
  message: string;
}

export type ParseOutcome =
  | { status: 'parsed'; event: SnapshotEvent }
  | { status: 'skipped'; filename: string; reason: 'EmptyInput' }
  | { status: 'failed'; error: MalformedHeaderError };

/**
 * バッチ処理中に収集される警告
 * イベント自体は生成されるもの（UnparseableTimestamp）も含む
 */
export type ParseWarning =
  | MalformedHeaderError
  | { kind: 'UnparseableTimestamp'; filename: string; rawTimestamp: string; message: string };

/**
 * 直前の解析済みイベントより時刻が戻っている箇所
 */
export interface TimestampInversion {
  /** 後側イベントのインデックス */
  index: number;
  previousFilename: string;
  filename: string;
  deltaMinutes: number;
}

export interface AssembledBatch {
  events: SnapshotEvent[];
  tagHistories: TagHistories;
  warnings: ParseWarning[];
}

export interface ParsedBatch extends AssembledBatch {
  inversions: TimestampInversion[];
  /** 有効なイベントが1件も得られなかった */
  noValidData: boolean;
}
