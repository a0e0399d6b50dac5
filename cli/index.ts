#!/usr/bin/env node
/**
 * Analyzer CLIエントリーポイント
 */
import * as fs from 'fs';
import chalk from 'chalk';
import { parseOptions, overrideConfig } from './options-parser';
import { analyzeSnapshots, createFormatter, loadConfig } from '../src';

/**
 * メイン実行関数
 */
async function main() {
  // コマンドライン引数の解析
  const cliOptions = parseOptions(process.argv);

  // 設定ファイルを読み込み、コマンドラインオプションで上書き
  const config = overrideConfig(await loadConfig(cliOptions.configFile), cliOptions);

  console.log(chalk.blue('スナップショットの解析を開始します...'));

  // コア処理の実行
  const result = await analyzeSnapshots({
    config,
    options: {
      files: cliOptions.files,
      directory: config.input.directory,
      verbose: cliOptions.verbose
    }
  });

  if (!result.success) {
    console.error(chalk.red(`❌ ${result.error.message}`));
    result.warnings.forEach(warning => {
      console.error(chalk.yellow(`  - ${warning.message}`));
    });
    process.exit(1);
  }

  const output = createFormatter(config.report.format).format(result.report);

  if (cliOptions.output) {
    await fs.promises.writeFile(cliOptions.output, `${output}\n`, 'utf-8');
    console.log(`レポートを出力しました: ${chalk.yellow(cliOptions.output)}`);
  } else {
    console.log(output);
  }

  console.log(chalk.green('✅ 処理が完了しました'));
  console.log(`  レコード数: ${chalk.yellow(result.report.overview.recordCount.toString())}`);
  console.log(`  処理時間: ${chalk.yellow(result.duration / 1000)} 秒`);
  if (result.report.warnings.length > 0) {
    console.log(`  警告: ${chalk.yellow(result.report.warnings.length.toString())} 件`);
  }
}

// スクリプト実行
main().catch(error => {
  console.error(chalk.red('予期しないエラーが発生しました:'), error);
  process.exit(1);
});
