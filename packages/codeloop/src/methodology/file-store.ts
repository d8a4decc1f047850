import { createHash } from "node:crypto";
import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { dump, load } from "js-yaml";
import type { ILogObj, Logger } from "tslog";
import * as z from "zod";
import { describeError, FatalIOError } from "../core/errors.js";
import { defaultLogger } from "../logging/logger.js";
import { type Methodology, type MethodologyMatch, type MethodologyStore, rankMethodologies } from "./store.js";

const methodologySchema = z.object({
  problem: z.string().min(1),
  methodology: z.string().min(1),
});

/**
 * File name for a problem: lowercase words joined by dashes, then a short hash
 * of the full text so problems sharing a slug get separate files.
 *
 * @internal Exported for testing
 */
export function methodologyFileName(problem: string): string {
  const slug = problem
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 60)
    .replace(/-+$/, "");
  const hash = createHash("sha256").update(problem).digest("hex").slice(0, 8);
  return `${slug || "methodology"}-${hash}.yaml`;
}

/**
 * Methodologies stored as one YAML document per file in a directory.
 *
 * @example
 * ```yaml
 * problem: Add a CLI flag for the log level
 * methodology: |
 *   1. Find where the commander program is built
 *   2. ...
 * ```
 */
export class FileMethodologyStore implements MethodologyStore {
  private readonly logger: Logger<ILogObj>;

  constructor(
    readonly directory: string,
    logger?: Logger<ILogObj>,
  ) {
    this.logger = logger ?? defaultLogger.getSubLogger({ name: "methodology" });
  }

  async load(): Promise<Methodology[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return [];
      }
      throw new FatalIOError(`Cannot read methodology directory ${this.directory}`, error);
    }

    const entries: Methodology[] = [];
    for (const name of names.filter((n) => n.endsWith(".yaml") || n.endsWith(".yml")).sort()) {
      const path = join(this.directory, name);
      try {
        const parsed = methodologySchema.safeParse(load(await readFile(path, "utf-8")));
        if (parsed.success) {
          entries.push(parsed.data);
        } else {
          this.logger.warn(`Skipping invalid methodology file ${path}`, parsed.error.issues);
        }
      } catch (error) {
        this.logger.warn(`Skipping unreadable methodology file ${path}: ${describeError(error)}`);
      }
    }
    return entries;
  }

  async find(problem: string, limit?: number): Promise<MethodologyMatch[]> {
    return rankMethodologies(problem, await this.load(), limit);
  }

  async add(problem: string, methodology: string): Promise<void> {
    const path = join(this.directory, methodologyFileName(problem));
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(path, dump({ problem, methodology }, { lineWidth: -1 }), "utf-8");
    } catch (error) {
      throw new FatalIOError(`Cannot write methodology ${path}`, error);
    }
    this.logger.debug(`Stored methodology ${path}`);
  }
}
