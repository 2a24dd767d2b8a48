import { readFileSync } from "node:fs";
import type { z } from "zod";

import { dumpYamlFile, formatIssues, parseYaml } from "./config.js";
import { errorCode, errorMessage } from "./errors.js";
import type { Logger } from "./types.js";

/**
 * A YAML file holding one mapping, validated against `schema` on every read.
 * The file is read again on each access so that other processes (a
 * `--cleanup` run, say) always see the last written state.
 */
export class YamlFileStore<T extends z.ZodTypeAny> {
  constructor(
    readonly filePath: string,
    private readonly schema: T,
    private readonly logger: Logger,
  ) {}

  read(): z.output<T> {
    let raw: unknown = {};
    try {
      raw = parseYaml(readFileSync(this.filePath, "utf8"), this.filePath);
    } catch (error) {
      if (errorCode(error) !== "ENOENT") {
        this.logger.warn(
          { file: this.filePath, error: errorMessage(error) },
          "Could not read state file, starting from an empty state",
        );
      }
    }

    const result = this.schema.safeParse(raw);
    if (result.success) return result.data;
    this.logger.warn(
      { file: this.filePath, issues: formatIssues(result.error) },
      "Malformed state file, starting from an empty state",
    );
    return this.schema.parse({});
  }

  write(data: z.input<T>): void {
    dumpYamlFile(this.filePath, data);
  }
}
