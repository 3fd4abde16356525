import { readFile } from "node:fs/promises";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";

/**
 * 按行切分文本，去掉空行（仅含空白的行同样跳过）。
 */
export function splitLines(text: string): string[] {
  return text.split(/\r?\n/g).filter((line) => line.trim().length > 0);
}

/**
 * 逐行读取文本流，如 process.stdin。
 */
export async function readLines(input: Readable): Promise<string[]> {
  const lines: string[] = [];
  const reader = createInterface({ input, crlfDelay: Infinity });

  for await (const line of reader) {
    if (line.trim()) {
      lines.push(line);
    }
  }

  return lines;
}

/**
 * 读取域名列表文件，每行一个域名。
 */
export async function readLinesFromFile(path: string): Promise<string[]> {
  return splitLines(await readFile(path, "utf8"));
}
