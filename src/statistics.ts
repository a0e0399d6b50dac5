/**
 * シーケンス別統計モジュール
 * イベント列から状態ごとの出現回数・滞在時間・割合を算出する純粋関数を提供
 */
import { SequenceCode, SnapshotEvent } from './types/data';
import { SequenceStats, StateStats, UtilizationSummary } from './types/stats';
import { SEQUENCE_CODES, isSequenceCode } from './sequence';
import { minutesBetween } from './utils/time-utils';

/**
 * 隣接する2イベント間の滞在時間（分）
 * 時刻が解析できない場合、および時刻が逆行している場合は0
 * @param current 対象イベント
 * @param next 直後のイベント
 * @returns 滞在時間（分）
 */
export function dwellMinutes(current: SnapshotEvent, next: SnapshotEvent): number {
  const delta = minutesBetween(current.timestamp, next.timestamp);
  if (delta === null || delta < 0) {
    return 0;
  }
  return delta;
}

/**
 * シーケンス別統計を計算
 * 最後のイベントは後続がないため滞在時間に寄与しない
 * @param events ファイル名順のイベント列
 * @returns シーケンスコード -> 統計値（イベントが0件の場合は空）
 */
export function computeStats(events: readonly SnapshotEvent[]): SequenceStats {
  if (events.length === 0) {
    return {};
  }

  const counts = new Map<SequenceCode, number>(SEQUENCE_CODES.map(code => [code, 0]));
  const durations = new Map<SequenceCode, number>(SEQUENCE_CODES.map(code => [code, 0]));

  for (let i = 0; i < events.length; i++) {
    const code = events[i].sequenceState;
    if (!isSequenceCode(code)) continue;

    counts.set(code, (counts.get(code) ?? 0) + 1);
    if (i < events.length - 1) {
      durations.set(code, (durations.get(code) ?? 0) + dwellMinutes(events[i], events[i + 1]));
    }
  }

  // 時間の割合の分母
  let totalTime = 0;
  for (const duration of durations.values()) {
    totalTime += duration;
  }

  const stats: SequenceStats = {};
  for (const code of SEQUENCE_CODES) {
    const count = counts.get(code) ?? 0;
    const totalDuration = durations.get(code) ?? 0;

    const entry: StateStats = {
      count,
      percentageOfEvents: count / events.length * 100,
      totalDurationMinutes: totalDuration,
      avgDurationMinutes: count > 0 ? totalDuration / count : 0,
      percentageOfTime: totalTime > 0 ? totalDuration / totalTime * 100 : 0
    };
    stats[code] = entry;
  }

  return stats;
}

/**
 * 全体サマリーを計算
 * @param stats シーケンス別統計
 * @returns 加工中時間・待機時間・稼働効率
 */
export function summarizeUtilization(stats: SequenceStats): UtilizationSummary {
  const duration = (code: SequenceCode): number => stats[code]?.totalDurationMinutes ?? 0;

  const workingMinutes = duration('03') + duration('04');
  const waitingMinutes = duration('00') + duration('01');
  const totalMinutes = SEQUENCE_CODES.reduce((sum, code) => sum + duration(code), 0);

  return {
    workingMinutes,
    waitingMinutes,
    totalMinutes,
    efficiency: totalMinutes > 0 ? workingMinutes / totalMinutes * 100 : 0
  };
}
