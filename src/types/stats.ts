/**
 * 統計値の型定義
 */
import { SequenceCode } from './data';

export interface StateStats {
  count: number;
  percentageOfEvents: number;
  totalDurationMinutes: number;
  avgDurationMinutes: number;
  percentageOfTime: number;
}

/**
 * シーケンスコード -> 統計値
 * イベントが0件の場合は空
 */
export type SequenceStats = Partial<Record<SequenceCode, StateStats>>;

export interface UtilizationSummary {
  /** seq=03,04 の合計時間（分） */
  workingMinutes: number;
  /** seq=00,01 の合計時間（分） */
  waitingMinutes: number;
  totalMinutes: number;
  /** 加工中時間の割合（%） */
  efficiency: number;
}
