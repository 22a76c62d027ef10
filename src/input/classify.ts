import fs from "node:fs/promises";
import path from "node:path";
import { InvalidInputError, errorMessage } from "../errors.js";
import type { SourceItem } from "../types.js";

export type InputMode = "single" | "batch";

export interface ClassifiedInput {
  mode: InputMode;
  items: SourceItem[];
}

async function isFile(candidate: string): Promise<boolean> {
  try {
    const stats = await fs.stat(candidate);
    return stats.isFile();
  } catch {
    return false;
  }
}

/** Blank lines and `#` comments are dropped; everything else is a URL candidate. */
export function parseBatchFile(content: string): SourceItem[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"))
    .map((url, index) => ({ position: index + 1, url }));
}

export async function classifyInput(raw: string, cwd: string): Promise<ClassifiedInput> {
  const candidatePath = path.resolve(cwd, raw);

  if (!(await isFile(candidatePath))) {
    return { mode: "single", items: [{ position: 1, url: raw.trim() }] };
  }

  let content: string;
  try {
    content = await fs.readFile(candidatePath, "utf8");
  } catch (error) {
    throw new InvalidInputError(`Failed to read input file ${candidatePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const items = parseBatchFile(content);
  if (items.length === 0) {
    throw new InvalidInputError(`Input file contains no URLs: ${candidatePath}`);
  }

  return { mode: "batch", items };
}
