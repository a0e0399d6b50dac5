/**
 * Analyzer設定ファイルの型定義
 */

export interface AnalyzerConfig {
  input: InputConfig;
  report: ReportConfig;
}

export interface InputConfig {
  /** スナップショットCSVの格納ディレクトリ（省略時はCLI引数で指定） */
  directory?: string;
  extension: string;
  encoding: BufferEncoding;
}

export type ReportFormat = 'text' | 'json';

export interface ReportConfig {
  format: ReportFormat;
  top_tags: number;
  recent_events: number;
  history_limit: number;
}
