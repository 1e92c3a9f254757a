import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";

export function fingerprint(bytes: Uint8Array | string): string {
  return createHash("sha256").update(bytes).digest("hex");
}

export async function hashFile(filePath: string): Promise<string> {
  const buffer = await readFile(filePath);
  return fingerprint(buffer);
}
