/**
 * CLI constants
 */

import { readFileSync } from "node:fs";

const readVersion = (): string => {
  const parsed: unknown = JSON.parse(
    readFileSync(new URL("../../package.json", import.meta.url), "utf-8")
  );
  return typeof parsed === "object" &&
    parsed !== null &&
    "version" in parsed &&
    typeof parsed.version === "string"
    ? parsed.version
    : "0.0.0";
};

export const VERSION = readVersion();
