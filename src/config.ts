/**
 * 設定ファイル読み込み・解析モジュール
 */
import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { AnalyzerConfig, ReportFormat } from './types/config';

/**
 * デフォルト設定値
 */
export const defaultConfig: AnalyzerConfig = {
  input: {
    extension: '.csv',
    encoding: 'utf-8'
  },
  report: {
    format: 'text',
    top_tags: 5,
    recent_events: 20,
    history_limit: 10
  }
};

type YamlSection = Record<string, unknown>;

function isSection(value: unknown): value is YamlSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 設定ファイルを読み込み、解析する
 * @param configPath 設定ファイルのパス（デフォルト: './analyzer.yaml'）
 * @returns 設定オブジェクト
 */
export async function loadConfig(configPath: string = './analyzer.yaml'): Promise<AnalyzerConfig> {
  // ファイルの存在確認
  if (!fs.existsSync(configPath)) {
    console.warn(`警告: 設定ファイル ${configPath} が見つかりません。デフォルト設定を使用します。`);
    return mergeWithDefaults({});
  }

  try {
    const fileContent = await fs.promises.readFile(configPath, 'utf-8');
    const parsed: unknown = yaml.load(fileContent);

    // 空ファイルはデフォルト設定
    if (parsed === undefined || parsed === null) {
      return mergeWithDefaults({});
    }
    if (!isSection(parsed)) {
      throw new Error('設定ファイルのルートはマッピングである必要があります');
    }

    return mergeWithDefaults(parsed);
  } catch (error) {
    console.error('設定ファイルの読み込み中にエラーが発生しました:', error);
    throw new Error(`設定ファイルの読み込みに失敗しました: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * ユーザー設定とデフォルト設定をマージする
 * 型が不正な値はキー名付きのエラーとする
 * @param userConfig YAMLから読み込んだ値
 * @returns マージされた設定
 */
export function mergeWithDefaults(userConfig: YamlSection): AnalyzerConfig {
  const input = section(userConfig, 'input');
  const report = section(userConfig, 'report');

  const merged: AnalyzerConfig = {
    input: {
      directory: optionalString(input, 'input.directory', 'directory'),
      extension: optionalString(input, 'input.extension', 'extension') ?? defaultConfig.input.extension,
      encoding: optionalEncoding(input) ?? defaultConfig.input.encoding
    },
    report: {
      format: optionalFormat(report) ?? defaultConfig.report.format,
      top_tags: optionalCount(report, 'report.top_tags', 'top_tags') ?? defaultConfig.report.top_tags,
      recent_events: optionalCount(report, 'report.recent_events', 'recent_events') ?? defaultConfig.report.recent_events,
      history_limit: optionalCount(report, 'report.history_limit', 'history_limit') ?? defaultConfig.report.history_limit
    }
  };

  return merged;
}

function section(config: YamlSection, key: string): YamlSection {
  const value = config[key];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isSection(value)) {
    throw new Error(`${key} はマッピングである必要があります`);
  }
  return value;
}

function optionalString(values: YamlSection, name: string, key: string): string | undefined {
  const value = values[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || value === '') {
    throw new Error(`${name} は空でない文字列である必要があります`);
  }
  return value;
}

function optionalCount(values: YamlSection, name: string, key: string): number | undefined {
  const value = values[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new Error(`${name} は0以上の整数である必要があります`);
  }
  return value;
}

function optionalEncoding(values: YamlSection): BufferEncoding | undefined {
  const value = optionalString(values, 'input.encoding', 'encoding');
  if (value === undefined) return undefined;
  if (!Buffer.isEncoding(value)) {
    throw new Error(`input.encoding に未対応の文字コードが指定されました: ${value}`);
  }
  return value;
}

function optionalFormat(values: YamlSection): ReportFormat | undefined {
  const value = optionalString(values, 'report.format', 'format');
  if (value === undefined) return undefined;
  return parseReportFormat(value, 'report.format');
}

/**
 * 出力形式の文字列を検証する
 * @param value 文字列値
 * @param name エラーメッセージ用の項目名
 */
export function parseReportFormat(value: string, name: string): ReportFormat {
  if (value !== 'text' && value !== 'json') {
    throw new Error(`${name} は text または json で指定してください: ${value}`);
  }
  return value;
}
