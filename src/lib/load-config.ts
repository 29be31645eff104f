import fs from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { validateConfig } from "@/config-resolver";
import { CONFIG_PATH, EXAMPLE_CONFIG_NAME } from "./constants";
import { ValidationError, describeError } from "./errors";
import type { DigestConfig } from "./types";

/** Reads a YAML (or JSON) config file and validates it. */
export async function loadConfig(configPath: string = CONFIG_PATH): Promise<DigestConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      const name = path.basename(configPath);
      throw new Error(`${name} is missing. Copy ${EXAMPLE_CONFIG_NAME} to ${name} and customise your settings before running the script.`);
    }
    throw error;
  }
  return parseConfig(raw);
}

export function parseConfig(raw: string): DigestConfig {
  let document: unknown;
  try {
    document = YAML.parse(raw);
  } catch (error) {
    throw new ValidationError([{ path: "<root>", message: `Not valid YAML: ${describeError(error)}` }]);
  }
  return validateConfig(document);
}
