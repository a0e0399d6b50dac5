/**
 * 時系列検証
 * ファイル名順と時刻順の食い違いを報告する（補正はしない）
 */
import { SnapshotEvent } from '../types/data';
import { TimestampInversion } from '../types/parse';
import { minutesBetween } from '../utils/time-utils';

/**
 * 時刻が逆行している箇所を検出する
 * 各イベントを直前の「時刻が解析できたイベント」と比較するため、
 * 解析できないイベントを挟んだ逆行も報告する
 * @param events ファイル名順のイベント列
 * @returns 逆行箇所の一覧
 */
export function findTimestampInversions(events: readonly SnapshotEvent[]): TimestampInversion[] {
  const inversions: TimestampInversion[] = [];
  let lastParsed: SnapshotEvent | undefined;

  events.forEach((current, index) => {
    if (current.timestamp.kind !== 'parsed') return;

    if (lastParsed) {
      const delta = minutesBetween(lastParsed.timestamp, current.timestamp);
      if (delta !== null && delta < 0) {
        inversions.push({
          index,
          previousFilename: lastParsed.filename,
          filename: current.filename,
          deltaMinutes: delta
        });
      }
    }
    lastParsed = current;
  });

  return inversions;
}
