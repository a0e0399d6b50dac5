/**
 * 時刻処理ユーティリティ
 */
import { SnapshotTimestamp } from '../types/data';

const MS_PER_MINUTE = 60 * 1000;

/**
 * YYYYMMDDhhmmss形式の時刻を解析する
 * タイムゾーンを持たない壁時計の値として扱い、実行環境のタイムゾーン・夏時間に依存しない
 * 14桁の数字でない場合、または実在しない日時の場合はunparsedを返す
 * @param raw YYYYMMDDhhmmss形式の文字列（例: "20250218080534"）
 * @returns 解析結果
 */
export function parseSnapshotTimestamp(raw: string): SnapshotTimestamp {
  if (!/^\d{14}$/.test(raw)) {
    return { kind: 'unparsed', raw };
  }

  // 各部分を抽出
  const year = parseInt(raw.substring(0, 4), 10);
  const month = parseInt(raw.substring(4, 6), 10);
  const day = parseInt(raw.substring(6, 8), 10);
  const hour = parseInt(raw.substring(8, 10), 10);
  const minute = parseInt(raw.substring(10, 12), 10);
  const second = parseInt(raw.substring(12, 14), 10);

  // 壁時計の値をそのままUTCとして保持する
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));

  // 繰り上がりが発生した場合（例: 2月30日、25時）は無効な日時
  if (date.getUTCFullYear() !== year ||
      date.getUTCMonth() !== month - 1 ||
      date.getUTCDate() !== day ||
      date.getUTCHours() !== hour ||
      date.getUTCMinutes() !== minute ||
      date.getUTCSeconds() !== second) {
    return { kind: 'unparsed', raw };
  }

  return {
    kind: 'parsed',
    epochMs: date.getTime(),
    display: `${raw.substring(0, 4)}/${raw.substring(4, 6)}/${raw.substring(6, 8)} ` +
      `${raw.substring(8, 10)}:${raw.substring(10, 12)}:${raw.substring(12, 14)}`
  };
}

/**
 * 表示用の時刻文字列を返す（解析失敗時は元の文字列）
 */
export function displayTimestamp(timestamp: SnapshotTimestamp): string {
  return timestamp.kind === 'parsed' ? timestamp.display : timestamp.raw;
}

/**
 * 2つの時刻の差を分単位で返す
 * どちらかが解析失敗の場合はnull
 * @param from 開始時刻
 * @param to 終了時刻
 * @returns 経過分数（逆行している場合は負の値）
 */
export function minutesBetween(from: SnapshotTimestamp, to: SnapshotTimestamp): number | null {
  if (from.kind !== 'parsed' || to.kind !== 'parsed') {
    return null;
  }
  return (to.epochMs - from.epochMs) / MS_PER_MINUTE;
}
