/**
 * ファイル操作モジュール
 * スナップショットファイルの読み込みを提供
 */
import * as fs from 'fs';
import * as path from 'path';
import { SnapshotFile } from '../types/data';

/**
 * ディレクトリ内のスナップショットファイルをすべて読み込む
 * @param dirPath ディレクトリパス
 * @param extension 対象拡張子（大文字小文字は区別しない）
 * @param encoding 文字コード
 * @returns ファイル名と内容の配列（順不同）
 */
export async function readSnapshotDirectory(
  dirPath: string,
  extension: string = '.csv',
  encoding: BufferEncoding = 'utf-8'
): Promise<SnapshotFile[]> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    throw new Error(`ディレクトリの読み込みに失敗しました: ${dirPath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const suffix = extension.toLowerCase();
  const filePaths = entries
    .filter(entry => entry.isFile() && entry.name.toLowerCase().endsWith(suffix))
    .map(entry => path.join(dirPath, entry.name));

  return readSnapshotFiles(filePaths, encoding);
}

/**
 * 指定されたファイルを読み込む
 * @param filePaths ファイルパスの配列
 * @param encoding 文字コード
 * @returns ファイル名（ベース名）と内容の配列
 */
export async function readSnapshotFiles(
  filePaths: string[],
  encoding: BufferEncoding = 'utf-8'
): Promise<SnapshotFile[]> {
  const files: SnapshotFile[] = [];

  // 大量のファイルを同時に開かないよう1件ずつ読み込む
  for (const filePath of filePaths) {
    try {
      const content = await fs.promises.readFile(filePath, encoding);
      files.push({ name: path.basename(filePath), content });
    } catch (error) {
      throw new Error(`ファイル読み込みエラー: ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  return files;
}
