import { ReportFormat } from '../types/config';
import { JsonFormatter } from './json';
import { TextFormatter } from './text';
import { ReportFormatter } from './types';

export { TextFormatter, abbreviateTagId } from './text';
export { JsonFormatter, toJsonReport } from './json';
export type { ReportFormatter } from './types';

/**
 * 出力形式に応じたフォーマッタを返す
 */
export function createFormatter(format: ReportFormat): ReportFormatter {
  return format === 'json' ? new JsonFormatter() : new TextFormatter();
}
