/**
 * シーケンス状態語彙のテスト
 */
import { describeState, isSequenceCode, SEQUENCE_CODES } from '../../src/sequence';

describe('sequence', () => {
  it('既知の5状態を定義順に持つ', () => {
    expect(SEQUENCE_CODES).toEqual(['00', '01', '02', '03', '04']);
  });

  it('既知のコードの表示情報を返す', () => {
    expect(describeState('00')).toEqual({
      code: '00',
      label: 'idle',
      displayName: '待機中',
      displayColor: '#6B7280',
      backgroundColor: '#F3F4F6'
    });
    expect(describeState('03')).toEqual({
      code: '03',
      label: 'running',
      displayName: '加工中',
      displayColor: '#EA580C',
      backgroundColor: '#FED7AA'
    });
    expect(describeState('01').label).toBe('init');
    expect(describeState('02').label).toBe('prep');
    expect(describeState('04').label).toBe('done');
  });

  it('未知のコードはunknownとエラー配色を返す', () => {
    expect(describeState('99')).toEqual({
      code: '99',
      label: 'unknown',
      displayName: '不明',
      displayColor: '#DC2626',
      backgroundColor: '#FEE2E2'
    });
    expect(describeState('').label).toBe('unknown');
    expect(describeState('3').label).toBe('unknown');
  });

  it('isSequenceCodeは00-04のみ受け付ける', () => {
    expect(isSequenceCode('04')).toBe(true);
    expect(isSequenceCode('05')).toBe(false);
    expect(isSequenceCode('03 ')).toBe(false);
  });
});
