/**
 * シーケンス状態の語彙
 * コア・表示側で共有する固定の対応表
 */
import { SequenceCode } from './types/data';

export interface StateDescriptor {
  code: string;
  label: string;
  displayName: string;
  displayColor: string;
  backgroundColor: string;
}

export const SEQUENCE_CODES: readonly SequenceCode[] = ['00', '01', '02', '03', '04'];

const STATE_TABLE: Record<SequenceCode, Omit<StateDescriptor, 'code'>> = {
  '00': { label: 'idle', displayName: '待機中', displayColor: '#6B7280', backgroundColor: '#F3F4F6' },
  '01': { label: 'init', displayName: '初期化', displayColor: '#2563EB', backgroundColor: '#DBEAFE' },
  '02': { label: 'prep', displayName: '加工準備', displayColor: '#D97706', backgroundColor: '#FEF3C7' },
  '03': { label: 'running', displayName: '加工中', displayColor: '#EA580C', backgroundColor: '#FED7AA' },
  '04': { label: 'done', displayName: '加工完了', displayColor: '#16A34A', backgroundColor: '#DCFCE7' }
};

// 未知のコード用（エラー配色）
const UNKNOWN_STATE: Omit<StateDescriptor, 'code'> = {
  label: 'unknown',
  displayName: '不明',
  displayColor: '#DC2626',
  backgroundColor: '#FEE2E2'
};

export function isSequenceCode(code: string): code is SequenceCode {
  return SEQUENCE_CODES.some(known => known === code);
}

/**
 * シーケンスコードの表示情報を取得
 * @param code シーケンスコード（2桁）
 * @returns 表示情報、未知のコードの場合はunknown
 */
export function describeState(code: string): StateDescriptor {
  const entry = isSequenceCode(code) ? STATE_TABLE[code] : UNKNOWN_STATE;
  return { code, ...entry };
}
