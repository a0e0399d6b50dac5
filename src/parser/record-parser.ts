/**
 * レコードパーサー
 * スナップショット1件分のCSVテキストをイベントに変換する純粋関数
 */
import { SnapshotEvent } from '../types/data';
import { ParseOutcome } from '../types/parse';
import { parseSnapshotTimestamp } from '../utils/time-utils';

const MIN_HEADER_FIELDS = 4;
const TAG_COLUMN = 4;

/**
 * スナップショット1件を解析する
 * @param filename ファイル名（エラー報告用）
 * @param content ファイル内容
 * @returns 解析結果（parsed / skipped / failed）
 */
export function parseRecord(filename: string, content: string): ParseOutcome {
  const trimmed = content.trim();

  // 空ファイルはエラーではなくスキップ
  if (trimmed === '') {
    return { status: 'skipped', filename, reason: 'EmptyInput' };
  }

  const lines = trimmed.split(/\r?\n/);
  const headers = lines[0].split(',');

  if (headers.length < MIN_HEADER_FIELDS) {
    return {
      status: 'failed',
      error: {
        kind: 'MalformedHeader',
        filename,
        fieldCount: headers.length,
        message: `ファイル ${filename} のヘッダーが不正です (フィールド数: ${headers.length}, 必要数: ${MIN_HEADER_FIELDS})`
      }
    };
  }

  const rawTimestamp = headers[0];
  const event: SnapshotEvent = {
    filename,
    rawTimestamp,
    timestamp: parseSnapshotTimestamp(rawTimestamp),
    sequenceState: headers[3],
    // データ行は2行目以降（1行目はヘッダー扱い）
    tagIds: extractTagIds(lines.slice(1))
  };

  return { status: 'parsed', event };
}

/**
 * データ行からタグIDを抽出する（行順、重複は保持）
 * @param rows データ行
 * @returns タグIDの配列
 */
export function extractTagIds(rows: string[]): string[] {
  const tagIds: string[] = [];

  for (const row of rows) {
    if (!row.trim()) continue;

    const columns = row.split(',');
    if (columns.length <= TAG_COLUMN) continue;

    const tagId = columns[TAG_COLUMN].replace(/\r/g, '');
    if (tagId) {
      tagIds.push(tagId);
    }
  }

  return tagIds;
}
