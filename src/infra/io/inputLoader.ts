import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigurationMissingError } from "../../domain/errors.js";
import { DocumentOutline, DocumentRef } from "../../domain/types.js";
import { createComponentLogger } from "../logging/logger.js";
import { isSupportedDocumentExtension } from "../parsers/documentLoader.js";

export const DEFAULT_RUN_CONFIG_FILE = "challenge1b_input.json";

const levelSchema = z.union([
  z.number().int(),
  z
    .string()
    .regex(/^\s*[Hh]?\d+\s*$/)
    .transform((value) => Number(value.trim().replace(/^[Hh]/, ""))),
]);

const outlineFileSchema = z.object({
  title: z.string().nullish(),
  outline: z.array(
    z.object({
      text: z.string(),
      page: z.coerce.number().int(),
      level: levelSchema,
    }),
  ),
});

const runConfigSchema = z.object({
  persona: z.object({ role: z.string().min(1) }).partial().optional(),
  job_to_be_done: z.object({ task: z.string().min(1) }).partial().optional(),
  documents: z
    .array(z.object({ filename: z.string().min(1), title: z.string().optional() }))
    .optional(),
});

export interface RunConfig {
  persona: string | null;
  job: string | null;
  documents: string[] | null;
}

export interface RunInput {
  inputDir: string;
  documents: DocumentRef[];
  outlines: Map<string, DocumentOutline>;
  runConfig: RunConfig;
}

export interface PrepareRunInputOptions {
  inputDir: string;
  runConfigPath?: string | null;
}

const log = createComponentLogger("input-loader");

export async function prepareRunInput(options: PrepareRunInputOptions): Promise<RunInput> {
  const inputDir = path.resolve(options.inputDir);
  if (!(await isDirectory(inputDir))) {
    throw new ConfigurationMissingError(`Input directory not found: ${inputDir}`, inputDir);
  }

  let runConfig: RunConfig = { persona: null, job: null, documents: null };
  let runConfigFile: string | null = null;
  if (options.runConfigPath) {
    runConfigFile = path.resolve(inputDir, options.runConfigPath);
    if (!(await isFile(runConfigFile))) {
      throw new ConfigurationMissingError(`Run configuration not found: ${runConfigFile}`, runConfigFile);
    }
    runConfig = await loadRunConfig(runConfigFile);
  } else {
    const candidate = path.join(inputDir, DEFAULT_RUN_CONFIG_FILE);
    if (await isFile(candidate)) {
      runConfigFile = candidate;
      runConfig = await loadRunConfig(candidate);
    }
  }

  const outlines = await loadOutlines(inputDir, runConfigFile);
  const documents = await resolveDocuments(inputDir, runConfig.documents);

  log.info(
    { inputDir, documents: documents.length, outlines: outlines.size, runConfig: runConfigFile },
    "Run input prepared",
  );
  return { inputDir, documents, outlines, runConfig };
}

export async function loadRunConfig(filePath: string): Promise<RunConfig> {
  let raw: unknown;
  try {
    raw = await readJson(filePath);
  } catch (error) {
    throw new ConfigurationMissingError(
      `Run configuration is not readable JSON: ${error instanceof Error ? error.message : "unknown error"}`,
      filePath,
    );
  }
  const parsed = runConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationMissingError(
      `Run configuration is invalid: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`,
      filePath,
    );
  }

  return {
    persona: parsed.data.persona?.role?.trim() || null,
    job: parsed.data.job_to_be_done?.task?.trim() || null,
    documents: parsed.data.documents?.map((document) => document.filename) ?? null,
  };
}

export async function loadOutlines(
  inputDir: string,
  excludeFile: string | null = null,
): Promise<Map<string, DocumentOutline>> {
  const outlines = new Map<string, DocumentOutline>();
  const entries = await fs.readdir(inputDir);

  for (const name of entries.sort()) {
    const filePath = path.join(inputDir, name);
    if (path.extname(name).toLowerCase() !== ".json" || filePath === excludeFile) {
      continue;
    }

    let raw: unknown;
    try {
      raw = await readJson(filePath);
    } catch (error) {
      log.warn({ err: error, file: name }, "Skipping unreadable outline file");
      continue;
    }

    const parsed = outlineFileSchema.safeParse(raw);
    if (!parsed.success) {
      log.debug({ file: name }, "JSON file is not an outline");
      continue;
    }

    outlines.set(path.parse(name).name, {
      title: parsed.data.title?.trim() || null,
      entries: parsed.data.outline.map((entry) => ({
        text: entry.text,
        page: entry.page,
        level: entry.level,
      })),
    });
  }

  return outlines;
}

export function outlineKey(documentId: string): string {
  return path.parse(documentId).name;
}

async function resolveDocuments(
  inputDir: string,
  requested: string[] | null,
): Promise<DocumentRef[]> {
  if (requested) {
    const documents: DocumentRef[] = [];
    const seen = new Set<string>();
    for (const filename of requested) {
      const id = path.basename(filename);
      const filePath = path.join(inputDir, id);
      if (seen.has(id)) {
        continue;
      }
      seen.add(id);
      if (!(await isFile(filePath))) {
        log.warn({ document: id }, "Requested document not found, skipping");
        continue;
      }
      documents.push({ id, path: filePath });
    }
    return documents;
  }

  const entries = await fs.readdir(inputDir);
  const documents: DocumentRef[] = [];
  for (const name of entries.sort()) {
    const filePath = path.join(inputDir, name);
    if (isSupportedDocumentExtension(name) && (await isFile(filePath))) {
      documents.push({ id: name, path: filePath });
    }
  }
  return documents;
}

async function readJson(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, "utf-8");
  return JSON.parse(content);
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

async function isFile(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isFile();
  } catch {
    return false;
  }
}
