/**
 * http-interactions — src/lib/version.ts
 * WHAT: Package name/version lookup for release tags and the --version flag.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import fs from "node:fs";
import { fileURLToPath } from "node:url";

// src/lib/version.ts and dist/lib/version.js both sit two levels below the package root
const packageJsonPath = fileURLToPath(new URL("../../package.json", import.meta.url));

let cached: { name: string; version: string } | null = null;

export function packageInfo(): { name: string; version: string } {
  if (cached) return cached;
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, "utf-8"));
    const name =
      typeof parsed === "object" && parsed !== null && "name" in parsed && typeof parsed.name === "string"
        ? parsed.name
        : "http-interactions";
    const version =
      typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string"
        ? parsed.version
        : "unknown";
    cached = { name, version };
  } catch {
    cached = { name: "http-interactions", version: "unknown" };
  }
  return cached;
}
