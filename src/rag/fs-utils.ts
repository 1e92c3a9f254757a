import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";

/** Write via a sibling temp file and rename, so readers see old or new bytes only. */
export async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${randomUUID()}.tmp`;
  await writeFile(tmp, data);
  await rename(tmp, filePath);
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const data = await readFile(filePath, "utf-8");
  const parsed: unknown = JSON.parse(data);
  return parsed;
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
