import { readFile } from "node:fs/promises";

export function tailLines(text: string, maxLines: number): string {
  if (maxLines <= 0) return "";
  const lines = String(text ?? "").replace(/\r\n/g, "\n").replace(/\n+$/, "").split("\n");
  return lines.slice(-maxLines).join("\n");
}

export async function readLogTail(logFile: string, maxLines: number): Promise<string> {
  const text = await readFile(logFile, "utf8").catch(() => "");
  return tailLines(text, maxLines);
}
