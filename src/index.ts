/**
 * Analyzerモジュールのメインエントリーポイント
 *
 * 外部からのインポート用エクスポート一覧
 */
import { analyzeSnapshots } from './analyzer';
import { parseFiles, parseRecord, assembleEvents, findTimestampInversions } from './parser';
import { computeStats, summarizeUtilization, dwellMinutes } from './statistics';
import { describeState, isSequenceCode, SEQUENCE_CODES } from './sequence';
import { buildReport } from './report';
import { loadConfig } from './config';
import { createFormatter, TextFormatter, JsonFormatter } from './formatters';

// メインの解析関数をエクスポート
export { analyzeSnapshots };

// コア
export { parseFiles, parseRecord, assembleEvents, findTimestampInversions };
export { computeStats, summarizeUtilization, dwellMinutes };

// 状態の語彙
export { describeState, isSequenceCode, SEQUENCE_CODES };
export type { StateDescriptor } from './sequence';

// レポート・フォーマッタ
export { buildReport, createFormatter, TextFormatter, JsonFormatter };

// 設定
export { loadConfig };

// 型定義をエクスポート
export * from './types/config';
export * from './types/data';
export * from './types/options';
export * from './types/parse';
export * from './types/report';
export * from './types/stats';

/**
 * メインモジュール情報
 */
export const VERSION = '0.1.0';
export const MODULE_NAME = 'rfid-sequence-analyzer';
