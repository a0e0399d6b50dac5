/**
 * Analyzerモジュール
 * ファイル読み込みから統計・レポート生成までの処理をまとめる
 */
import { AnalyzerParams, AnalysisResult, RuntimeOptions } from './types/options';
import { AnalyzerConfig } from './types/config';
import { SnapshotFile } from './types/data';
import { ParsedBatch } from './types/parse';
import { readSnapshotDirectory, readSnapshotFiles } from './io/file';
import { parseFiles } from './parser';
import { computeStats } from './statistics';
import { buildReport } from './report';

/**
 * コアロジック：スナップショットを解析してレポートを生成する
 * @param params 解析パラメータ
 * @returns 実行結果
 */
export async function analyzeSnapshots(params: AnalyzerParams): Promise<AnalysisResult> {
  const { config, options } = params;
  const startTime = Date.now();

  let files: SnapshotFile[];
  try {
    files = await loadSnapshots(config, options);
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error : new Error(String(error)),
      warnings: []
    };
  }
  console.log(`読み込み完了: ${files.length} ファイル`);

  const batch = parseFiles(files);
  logBatch(batch, options.verbose === true);

  if (batch.noValidData) {
    return {
      success: false,
      error: new Error('有効なデータが見つかりません。CSVファイルの形式を確認してください。'),
      warnings: batch.warnings
    };
  }

  const stats = computeStats(batch.events);
  const report = buildReport(batch, stats, {
    topTags: config.report.top_tags,
    recentEvents: config.report.recent_events,
    historyLimit: config.report.history_limit
  });

  return {
    success: true,
    report,
    duration: Date.now() - startTime
  };
}

/**
 * 入力ファイルを読み込む
 * ファイル指定が優先、次にオプションのディレクトリ、最後に設定ファイルのディレクトリ
 */
async function loadSnapshots(config: AnalyzerConfig, options: RuntimeOptions): Promise<SnapshotFile[]> {
  const { extension, encoding } = config.input;

  if (options.files && options.files.length > 0) {
    console.log(`指定された ${options.files.length} ファイルを読み込みます`);
    return readSnapshotFiles(options.files, encoding);
  }

  const directory = options.directory || config.input.directory;
  if (!directory) {
    throw new Error('入力ファイルまたはディレクトリが指定されていません');
  }

  console.log(`ディレクトリ ${directory} から *${extension} を読み込みます`);
  return readSnapshotDirectory(directory, extension, encoding);
}

/**
 * 解析結果のログ出力
 */
function logBatch(batch: ParsedBatch, verbose: boolean): void {
  console.log(`解析完了: ${batch.events.length} イベント, ${batch.tagHistories.size} タグ`);

  for (const warning of batch.warnings) {
    console.warn(`警告: ${warning.message}`);
  }
  for (const inversion of batch.inversions) {
    console.warn(`警告: ファイル名順と時刻順が一致しません: ${inversion.previousFilename} -> ${inversion.filename} (${inversion.deltaMinutes.toFixed(1)}分)`);
  }

  if (verbose) {
    for (const event of batch.events) {
      console.log(`  ${event.filename}: seq=${event.sequenceState}, タグ数=${event.tagIds.length}`);
    }
  }
}
