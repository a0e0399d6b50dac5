/**
 * ランタイムオプションの型定義
 */
import { AnalyzerConfig, ReportFormat } from './config';
import { ParseWarning } from './parse';
import { AnalysisReport } from './report';

export interface RuntimeOptions {
  /**
   * 入力ファイル（指定時はディレクトリより優先）
   */
  files?: string[];

  /**
   * 入力ディレクトリ
   * 省略された場合はconfigのinput.directoryを使用
   */
  directory?: string;

  /**
   * 詳細ログ出力フラグ
   */
  verbose?: boolean;
}

/**
 * コマンドライン引数の型定義
 * RuntimeOptionsを拡張
 */
export interface CliOptions extends RuntimeOptions {
  /**
   * 設定ファイルのパス
   * デフォルト: "./analyzer.yaml"
   */
  configFile: string;

  /**
   * 出力形式（設定ファイルの値を上書き）
   */
  format?: ReportFormat;

  /**
   * 表示する上位タグ数
   */
  topTags?: number;

  /**
   * 表示する時系列ログ件数
   */
  recentEvents?: number;

  /**
   * レポートの出力先ファイル（省略時は標準出力）
   */
  output?: string;
}

/**
 * Analyzerの入力パラメータ
 */
export interface AnalyzerParams {
  config: AnalyzerConfig;
  options: RuntimeOptions;
}

/**
 * Analyzerの実行結果
 */
export type AnalysisResult =
  | { success: true; report: AnalysisReport; duration: number }
  | { success: false; error: Error; warnings: ParseWarning[] };
