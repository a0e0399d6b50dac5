/**
 * コマンドライン引数パーサー
 */
import { Command } from 'commander';
import { CliOptions } from '../src/types/options';
import { AnalyzerConfig } from '../src/types/config';
import { VERSION, MODULE_NAME } from '../src';
import { parseReportFormat } from '../src/config';

type RawOptions = {
  dir?: string;
  config: string;
  format?: string;
  topTags?: string;
  recent?: string;
  output?: string;
  verbose: boolean;
};

/**
 * コマンドライン引数を解析し、オプションオブジェクトを返す
 * @param args コマンドライン引数
 * @returns 解析されたオプション
 */
export function parseOptions(args: string[]): CliOptions {
  const program = new Command();

  // プログラム情報の設定
  program
    .name(MODULE_NAME)
    .description('RFIDスキャンログから加工機のシーケンス別稼働状況を集計するツール')
    .version(VERSION);

  program.argument('[files...]', 'スナップショットCSVファイル（省略時は --dir を使用）');

  // オプション引数
  program
    .option(
      '-d, --dir <path>',
      'スナップショットCSVの格納ディレクトリ',
    )
    .option(
      '-c, --config <path>',
      '設定ファイルのパス',
      './analyzer.yaml'
    )
    .option(
      '-f, --format <format>',
      '出力形式 (text または json)',
    )
    .option(
      '-t, --top-tags <number>',
      '表示する上位タグ数',
    )
    .option(
      '-r, --recent <number>',
      '表示する時系列ログ件数',
    )
    .option(
      '-o, --output <path>',
      'レポートの出力先ファイル（省略時は標準出力）',
    )
    .option(
      '-v, --verbose',
      '詳細ログを出力',
      false
    );

  // ヘルプテキスト
  program.addHelpText('after', `
例:
  # ディレクトリ内のCSVをすべて解析
  $ rfid-sequence-analyzer --dir ./logs

  # ファイルを直接指定
  $ rfid-sequence-analyzer ./logs/20250218080534.csv ./logs/20250218080544.csv

  # JSON形式でファイルに出力
  $ rfid-sequence-analyzer --dir ./logs --format json --output report.json
  `);

  // 引数の解析
  program.parse(args);
  const options = program.opts<RawOptions>();

  return {
    files: program.args,
    directory: options.dir,
    configFile: options.config,
    format: options.format !== undefined ? parseReportFormat(options.format, '--format') : undefined,
    topTags: options.topTags !== undefined ? parseCountOption(options.topTags, '--top-tags') : undefined,
    recentEvents: options.recent !== undefined ? parseCountOption(options.recent, '--recent') : undefined,
    output: options.output,
    verbose: options.verbose
  };
}

/**
 * 件数オプションのパース
 * @param value 文字列値
 * @param optionName オプション名
 * @returns 0以上の整数
 * @throws バリデーションエラー
 */
export function parseCountOption(value: string, optionName: string): number {
  if (!/^\d+$/.test(value)) {
    throw new Error(`${optionName} は0以上の整数で指定してください: ${value}`);
  }
  return parseInt(value, 10);
}

/**
 * コマンドラインオプションで設定をオーバーライド
 * @param config 元の設定
 * @param options コマンドラインオプション
 * @returns 更新された設定
 */
export function overrideConfig(config: AnalyzerConfig, options: CliOptions): AnalyzerConfig {
  return {
    input: {
      ...config.input,
      directory: options.directory || config.input.directory
    },
    report: {
      ...config.report,
      format: options.format ?? config.report.format,
      top_tags: options.topTags ?? config.report.top_tags,
      recent_events: options.recentEvents ?? config.report.recent_events
    }
  };
}
