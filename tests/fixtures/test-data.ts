/**
 * テスト用のサンプルデータ
 * 加工機1サイクル分（00→01→02→03→04）のスナップショット
 */

import { SnapshotEvent, SnapshotFile } from '../../src/types/data';
import { parseSnapshotTimestamp } from '../../src/utils/time-utils';

export const TAG_A = 'A0250301090000343032353031303101';
export const TAG_B = 'A0250301091500343032353031303102';
export const TAG_C = 'A025030110000000323032353032313030363031';

/**
 * スナップショットCSVの内容を生成
 * 1行目はヘッダー扱いのためタグ列を空にし、2行目以降にタグを1件ずつ並べる
 * @param timestamp YYYYMMDDhhmmss
 * @param sequence シーケンスコード
 * @param tagIds タグID
 */
export function snapshotContent(timestamp: string, sequence: string, tagIds: string[] = []): string {
  const header = `${timestamp},0001,6C,${sequence},`;
  const rows = tagIds.map(tagId => `${timestamp},0001,6C,${sequence},${tagId}`);
  return [header, ...rows].join('\r\n') + '\r\n';
}

export function snapshotFile(timestamp: string, sequence: string, tagIds: string[] = []): SnapshotFile {
  return { name: `${timestamp}.csv`, content: snapshotContent(timestamp, sequence, tagIds) };
}

/**
 * 解析済みイベントを直接生成（統計のテスト用）
 */
export function makeEvent(filename: string, rawTimestamp: string, sequenceState: string, tagIds: string[] = []): SnapshotEvent {
  return {
    filename,
    rawTimestamp,
    timestamp: parseSnapshotTimestamp(rawTimestamp),
    sequenceState,
    tagIds
  };
}

/**
 * 1サイクル分のスナップショット
 * 00: 07:44:06-08:05:01 (1255秒)
 * 01: 08:05:01-08:05:34 (33秒)
 * 02: 08:05:34-08:05:43 (9秒)
 * 03: 08:05:43-08:05:48 (5秒)
 * 04: 08:05:48 最終イベント
 */
export const cycleFiles: SnapshotFile[] = [
  snapshotFile('20250218074406', '00'),
  snapshotFile('20250218080501', '01'),
  snapshotFile('20250218080534', '02', [TAG_A]),
  snapshotFile('20250218080543', '03', [TAG_A, TAG_B]),
  snapshotFile('20250218080548', '04', [TAG_C, TAG_A, TAG_B])
];

export const cycleFilenames = cycleFiles.map(file => file.name);
