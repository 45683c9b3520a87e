import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigurationMissingError } from "../src/domain/errors.js";
import { loadOutlines, loadRunConfig, outlineKey, prepareRunInput } from "../src/infra/io/inputLoader.js";
import { writeRunResult } from "../src/infra/io/resultWriter.js";
import { assembleRunResult } from "../src/pipelines/resultAssembly.js";

const TMP_DIR = path.resolve(".tmp-tests", "input");

async function writeJson(name: string, value: unknown): Promise<void> {
  await fs.writeFile(path.join(TMP_DIR, name), JSON.stringify(value), "utf-8");
}

describe("inputLoader", () => {
  beforeEach(async () => {
    await fs.mkdir(TMP_DIR, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(TMP_DIR, { recursive: true, force: true });
  });

  it("reads persona, job and documents from a run configuration", async () => {
    await writeJson("run.json", {
      persona: { role: " Travel Planner " },
      job_to_be_done: { task: "Plan a trip" },
      documents: [{ filename: "cities.pdf" }, { filename: "food.pdf", title: "Food" }],
    });

    expect(await loadRunConfig(path.join(TMP_DIR, "run.json"))).toEqual({
      persona: "Travel Planner",
      job: "Plan a trip",
      documents: ["cities.pdf", "food.pdf"],
    });
  });

  it("rejects a run configuration that is not JSON", async () => {
    await fs.writeFile(path.join(TMP_DIR, "run.json"), "{ nope", "utf-8");
    await expect(loadRunConfig(path.join(TMP_DIR, "run.json"))).rejects.toBeInstanceOf(
      ConfigurationMissingError,
    );
  });

  it("loads outline files by stem and skips other JSON", async () => {
    await writeJson("cities.json", {
      title: "Cities",
      outline: [
        { text: "Nice", page: "2", level: "H2" },
        { text: "Marseille", page: 4, level: 1 },
      ],
    });
    await writeJson("stats.json", { rows: [] });

    const outlines = await loadOutlines(TMP_DIR);

    expect([...outlines.keys()]).toEqual(["cities"]);
    expect(outlines.get("cities")).toEqual({
      title: "Cities",
      entries: [
        { text: "Nice", page: 2, level: 2 },
        { text: "Marseille", page: 4, level: 1 },
      ],
    });
    expect(outlineKey("cities.pdf")).toBe("cities");
  });

  it("lists supported documents in name order without a run configuration", async () => {
    await fs.writeFile(path.join(TMP_DIR, "b.txt"), "b", "utf-8");
    await fs.writeFile(path.join(TMP_DIR, "a.md"), "a", "utf-8");
    await fs.writeFile(path.join(TMP_DIR, "c.xlsx"), "c", "utf-8");

    const input = await prepareRunInput({ inputDir: TMP_DIR });

    expect(input.documents.map((document) => document.id)).toEqual(["a.md", "b.txt"]);
    expect(input.runConfig).toEqual({ persona: null, job: null, documents: null });
  });

  it("skips requested documents that do not exist", async () => {
    await fs.writeFile(path.join(TMP_DIR, "cities.txt"), "x", "utf-8");
    await writeJson("challenge1b_input.json", {
      documents: [{ filename: "cities.txt" }, { filename: "missing.txt" }, { filename: "cities.txt" }],
    });

    const input = await prepareRunInput({ inputDir: TMP_DIR });

    expect(input.documents).toEqual([{ id: "cities.txt", path: path.join(TMP_DIR, "cities.txt") }]);
    expect(input.outlines.size).toBe(0);
  });

  it("fails on a missing input directory or run configuration", async () => {
    await expect(prepareRunInput({ inputDir: path.join(TMP_DIR, "nowhere") })).rejects.toThrow(
      "Input directory not found",
    );
    await expect(prepareRunInput({ inputDir: TMP_DIR, runConfigPath: "run.json" })).rejects.toThrow(
      "Run configuration not found",
    );
  });

  it("writes the result as indented JSON", async () => {
    const result = assembleRunResult({
      inputDocuments: ["a.pdf"],
      personaJob: { persona: "Researcher", job: "Document analysis" },
      extracted: [],
      subsections: [],
      processingTimestamp: 42,
    });

    const target = await writeRunResult(result, path.join(TMP_DIR, "out"), "result.json");

    expect(target).toBe(path.join(TMP_DIR, "out", "result.json"));
    expect(await fs.readFile(target, "utf-8")).toBe(`${JSON.stringify(result, null, 2)}\n`);
  });
});
