import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

export async function writeBadge(outputPath: string, svg: string) {
  const dir = dirname(outputPath);
  if (dir !== ".") {
    await mkdir(dir, { recursive: true });
  }
  await writeFile(outputPath, svg, "utf-8");
}
