// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { readFile } from "node:fs/promises";
import { ConfigurationError } from "./errors.js";

/** One site URL per line; blank lines and `#` comments are dropped, order is kept. */
export function parseSiteList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"));
}

export async function readSiteList(path: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigurationError(
      `Cannot read site list ${path}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
  return parseSiteList(text.replace(/^\uFEFF/, ""));
}
