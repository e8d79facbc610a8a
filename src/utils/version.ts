import { readFileSync } from "node:fs";

import { z } from "zod";

import { getCliAssetPath } from "./cli-root.js";

const packageMetadataSchema = z.object({
  version: z.string().trim().min(1),
});

let cachedVersion: string | undefined;

export function getCliVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  try {
    const packageJsonRaw = readFileSync(getCliAssetPath("package.json"), "utf-8");
    const parsed = packageMetadataSchema.safeParse(JSON.parse(packageJsonRaw));
    if (parsed.success) {
      cachedVersion = parsed.data.version;
      return cachedVersion;
    }
  } catch {
    // Unreadable package metadata falls back to "unknown" below.
  }

  cachedVersion = "unknown";
  return cachedVersion;
}
