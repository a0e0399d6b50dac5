/**
 * イベントアセンブラ
 * 全スナップショットからイベント列とタグ履歴を構築する
 *
 * 前提: ファイル名にソート可能なタイムスタンプが含まれていること。
 * ファイル名順が唯一の順序保証であり、解析後の時刻で並べ替えは行わない。
 */
import { SnapshotFile } from '../types/data';
import { AssembledBatch, ParseOutcome } from '../types/parse';
import { parseRecord } from './record-parser';

/**
 * ファイル名の辞書順でソートした新しい配列を返す
 * @param files 入力ファイル
 * @returns ソート済みファイル
 */
export function sortByFilename<T extends { name: string }>(files: readonly T[]): T[] {
  return [...files].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * スナップショット群を解析し、イベント列とタグ履歴を構築する
 * @param files 入力ファイル（順不同）
 * @returns イベント列・タグ履歴・警告
 */
export function assembleEvents(files: readonly SnapshotFile[]): AssembledBatch {
  // 全件解析してから畳み込む（解析順序は結果に影響しない）
  const outcomes = sortByFilename(files).map(file => parseRecord(file.name, file.content));

  return outcomes.reduce<AssembledBatch>(appendOutcome, {
    events: [],
    tagHistories: new Map(),
    warnings: []
  });
}

/**
 * 解析結果1件をバッチに追加する
 */
function appendOutcome(batch: AssembledBatch, outcome: ParseOutcome): AssembledBatch {
  switch (outcome.status) {
    case 'skipped':
      return batch;

    case 'failed':
      batch.warnings.push(outcome.error);
      return batch;

    case 'parsed': {
      const { event } = outcome;
      batch.events.push(event);

      if (event.timestamp.kind === 'unparsed') {
        batch.warnings.push({
          kind: 'UnparseableTimestamp',
          filename: event.filename,
          rawTimestamp: event.rawTimestamp,
          message: `ファイル ${event.filename} のタイムスタンプを解析できません: ${event.rawTimestamp}`
        });
      }

      for (const tagId of event.tagIds) {
        let history = batch.tagHistories.get(tagId);
        if (!history) {
          history = [];
          batch.tagHistories.set(tagId, history);
        }
        history.push({
          tagId,
          timestamp: event.timestamp,
          sequenceState: event.sequenceState,
          sourceFilename: event.filename
        });
      }
      return batch;
    }
  }
}
