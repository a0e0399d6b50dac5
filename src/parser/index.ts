/**
 * 解析モジュールのエントリーポイント
 */
import { SnapshotFile } from '../types/data';
import { ParsedBatch } from '../types/parse';
import { assembleEvents } from './assembler';
import { findTimestampInversions } from './chronology';

export { parseRecord, extractTagIds } from './record-parser';
export { assembleEvents, sortByFilename } from './assembler';
export { findTimestampInversions } from './chronology';

/**
 * 入力ファイル群をイベント列・タグ履歴に変換する
 * @param files 入力ファイル
 * @returns 解析済みバッチ（イベント0件の場合はnoValidData=true）
 */
export function parseFiles(files: readonly SnapshotFile[]): ParsedBatch {
  const batch = assembleEvents(files);

  return {
    ...batch,
    inversions: findTimestampInversions(batch.events),
    noValidData: batch.events.length === 0
  };
}
