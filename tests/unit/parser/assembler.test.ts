/**
 * イベントアセンブラのテスト
 * src/parser/assembler.ts, src/parser/index.tsの単体テスト
 */
import { assembleEvents, sortByFilename } from '../../../src/parser/assembler';
import { findTimestampInversions } from '../../../src/parser/chronology';
import { parseFiles } from '../../../src/parser';
import { SnapshotFile } from '../../../src/types/data';
import { cycleFiles, cycleFilenames, makeEvent, snapshotFile, TAG_A, TAG_B, TAG_C } from '../../fixtures/test-data';

describe('assembleEvents', () => {
  it('入力順に関係なくファイル名の辞書順で処理する', () => {
    const shuffled = [cycleFiles[3], cycleFiles[0], cycleFiles[4], cycleFiles[2], cycleFiles[1]];

    const { events } = assembleEvents(shuffled);

    expect(events.map(event => event.filename)).toEqual(cycleFilenames);
  });

  it('解析後の時刻で並べ替えない', () => {
    const files: SnapshotFile[] = [
      { name: 'b.csv', content: '20250218080000,0001,6C,01,' },
      { name: 'a.csv', content: '20250218080100,0001,6C,00,' }
    ];

    const { events } = assembleEvents(files);

    expect(events.map(event => event.filename)).toEqual(['a.csv', 'b.csv']);
  });

  it('タグごとの検出履歴を処理順に構築する', () => {
    const { tagHistories } = assembleEvents(cycleFiles);

    expect(Array.from(tagHistories.keys())).toEqual([TAG_A, TAG_B, TAG_C]);
    expect(tagHistories.get(TAG_A)?.map(entry => entry.sequenceState)).toEqual(['02', '03', '04']);
    expect(tagHistories.get(TAG_B)?.map(entry => entry.sourceFilename)).toEqual([
      '20250218080543.csv',
      '20250218080548.csv'
    ]);
    expect(tagHistories.get(TAG_C)).toEqual([
      {
        tagId: TAG_C,
        timestamp: {
          kind: 'parsed',
          epochMs: Date.UTC(2025, 1, 18, 8, 5, 48),
          display: '2025/02/18 08:05:48'
        },
        sequenceState: '04',
        sourceFilename: '20250218080548.csv'
      }
    ]);
  });

  it('すべてのイベントのタグが履歴に対応するエントリを持つ', () => {
    const { events, tagHistories } = assembleEvents(cycleFiles);

    for (const event of events) {
      for (const tagId of event.tagIds) {
        const history = tagHistories.get(tagId) ?? [];
        const match = history.find(entry =>
          entry.sourceFilename === event.filename &&
          entry.sequenceState === event.sequenceState &&
          entry.timestamp === event.timestamp
        );
        expect(match).toBeDefined();
      }
    }
  });

  it('同一イベント内の重複タグは履歴に2件追加する', () => {
    const files: SnapshotFile[] = [
      { name: 'dup.csv', content: '20250218080534,0001,6C,03,\n20250218080534,0001,6C,03,T1\n20250218080534,0001,6C,03,T1' }
    ];

    const { events, tagHistories } = assembleEvents(files);

    expect(events[0].tagIds).toEqual(['T1', 'T1']);
    expect(tagHistories.get('T1')).toHaveLength(2);
  });

  it('不正なファイルがあっても他のファイルの処理を続ける', () => {
    const files: SnapshotFile[] = [
      snapshotFile('20250218080534', '02', [TAG_A]),
      { name: '20250218080540.csv', content: '20250218080540,0001' },
      snapshotFile('20250218080550', '03', [TAG_A])
    ];

    const { events, warnings } = assembleEvents(files);

    expect(events.map(event => event.filename)).toEqual(['20250218080534.csv', '20250218080550.csv']);
    expect(warnings).toEqual([
      {
        kind: 'MalformedHeader',
        filename: '20250218080540.csv',
        fieldCount: 2,
        message: 'ファイル 20250218080540.csv のヘッダーが不正です (フィールド数: 2, 必要数: 4)'
      }
    ]);
  });

  it('空のファイルは警告なしでスキップする', () => {
    const files: SnapshotFile[] = [
      { name: 'empty.csv', content: '\n\n' },
      snapshotFile('20250218080534', '02')
    ];

    const { events, warnings } = assembleEvents(files);

    expect(events).toHaveLength(1);
    expect(warnings).toEqual([]);
  });

  it('タイムスタンプが解析できないイベントを警告付きで保持する', () => {
    const files: SnapshotFile[] = [{ name: 'x.csv', content: 'notadate,0001,6C,01,' }];

    const { events, warnings } = assembleEvents(files);

    expect(events).toHaveLength(1);
    expect(warnings).toEqual([
      {
        kind: 'UnparseableTimestamp',
        filename: 'x.csv',
        rawTimestamp: 'notadate',
        message: 'ファイル x.csv のタイムスタンプを解析できません: notadate'
      }
    ]);
  });
});

describe('sortByFilename', () => {
  it('元の配列を変更しない', () => {
    const files = [{ name: 'b' }, { name: 'a' }, { name: 'c' }];

    const sorted = sortByFilename(files);

    expect(sorted.map(file => file.name)).toEqual(['a', 'b', 'c']);
    expect(files.map(file => file.name)).toEqual(['b', 'a', 'c']);
  });

  it('コードポイント順で比較する', () => {
    const sorted = sortByFilename([{ name: 'b.csv' }, { name: 'B.csv' }, { name: 'a.csv' }]);
    expect(sorted.map(file => file.name)).toEqual(['B.csv', 'a.csv', 'b.csv']);
  });
});

describe('findTimestampInversions', () => {
  it('時刻が逆行している隣接ペアを報告する', () => {
    const events = [
      makeEvent('a.csv', '20250218081000', '00'),
      makeEvent('b.csv', '20250218080900', '01'),
      makeEvent('c.csv', '20250218081100', '02')
    ];

    expect(findTimestampInversions(events)).toEqual([
      { index: 1, previousFilename: 'a.csv', filename: 'b.csv', deltaMinutes: -1 }
    ]);
  });

  it('同時刻は報告しない', () => {
    const events = [
      makeEvent('a.csv', '20250218081000', '00'),
      makeEvent('b.csv', '20250218081000', '01')
    ];

    expect(findTimestampInversions(events)).toEqual([]);
  });

  it('解析できないイベントを挟んだ逆行を直前の解析済みイベントと比較して報告する', () => {
    const events = [
      makeEvent('a.csv', '20250218081000', '00'),
      makeEvent('b.csv', '20250218081000', '01'),
      makeEvent('c.csv', 'notadate', '02'),
      makeEvent('d.csv', '20250218080800', '03'),
      makeEvent('e.csv', '20250218081500', '04')
    ];

    expect(findTimestampInversions(events)).toEqual([
      { index: 3, previousFilename: 'b.csv', filename: 'd.csv', deltaMinutes: -2 }
    ]);
  });
});

describe('parseFiles', () => {
  it('ファイルがない場合はnoValidDataを返す', () => {
    const batch = parseFiles([]);

    expect(batch.noValidData).toBe(true);
    expect(batch.events).toEqual([]);
    expect(batch.tagHistories.size).toBe(0);
    expect(batch.warnings).toEqual([]);
    expect(batch.inversions).toEqual([]);
  });

  it('有効なイベントがない場合はnoValidDataと警告を返す', () => {
    const batch = parseFiles([
      { name: 'empty.csv', content: '' },
      { name: 'bad.csv', content: 'a,b' }
    ]);

    expect(batch.noValidData).toBe(true);
    expect(batch.warnings.map(warning => warning.kind)).toEqual(['MalformedHeader']);
  });

  it('ファイル名順と時刻順の食い違いを報告する', () => {
    const batch = parseFiles([
      { name: 'a.csv', content: '20250218080100,0001,6C,00,' },
      { name: 'b.csv', content: '20250218080000,0001,6C,01,' }
    ]);

    expect(batch.noValidData).toBe(false);
    expect(batch.inversions).toEqual([
      { index: 1, previousFilename: 'a.csv', filename: 'b.csv', deltaMinutes: -1 }
    ]);
  });
});
