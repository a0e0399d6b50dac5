/**
 * スナップショット・イベントおよび関連型定義
 */

/**
 * 入力ファイル1件（ファイル名と内容）
 */
export interface SnapshotFile {
  name: string;
  content: string;
}

/**
 * 既知のシーケンスコード
 */
export type SequenceCode = '00' | '01' | '02' | '03' | '04';

/**
 * スナップショットの時刻
 * 解析に失敗した場合は元の文字列のみを保持し、時刻値を持たない
 */
export type SnapshotTimestamp =
  | { kind: 'parsed'; epochMs: number; display: string }
  | { kind: 'unparsed'; raw: string };

/**
 * 1スナップショット分のイベント
 */
export interface SnapshotEvent {
  filename: string;
  rawTimestamp: string;
  timestamp: SnapshotTimestamp;
  /** 00-04以外の値もそのまま保持する */
  sequenceState: string;
  tagIds: string[];
}

/**
 * あるイベント内でのタグ検出1件
 */
export interface TagHistoryEntry {
  tagId: string;
  timestamp: SnapshotTimestamp;
  sequenceState: string;
  sourceFilename: string;
}

/**
 * tagId -> 検出履歴（スナップショット処理順）
 */
export type TagHistories = Map<string, TagHistoryEntry[]>;
