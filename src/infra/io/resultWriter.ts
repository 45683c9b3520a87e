import { promises as fs } from "node:fs";
import path from "node:path";
import { RunResult } from "../../domain/types.js";
import { runResultSchema } from "../../pipelines/resultAssembly.js";

export async function writeRunResult(
  result: RunResult,
  outputDir: string,
  fileName: string,
): Promise<string> {
  const validated = runResultSchema.parse(result);
  const target = path.resolve(outputDir, fileName);

  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, `${JSON.stringify(validated, null, 2)}\n`, "utf-8");
  return target;
}
