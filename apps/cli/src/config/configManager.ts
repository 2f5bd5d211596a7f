import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import YAML from "yaml";
import { z } from "zod";
import { AppConfigSchema } from "./schema";
import type { AppConfig } from "./schema";

export const DEFAULT_CONFIG_PATH = "config/default.yaml";

function deepFreeze<T>(obj: T): T {
  Object.freeze(obj);
  if (obj && typeof obj === "object") {
    for (const val of Object.values(obj)) {
      if (val && typeof val === "object" && !Object.isFrozen(val)) {
        deepFreeze(val);
      }
    }
  }
  return obj;
}

let cached: { path: string; config: AppConfig } | null = null;

const HERE = path.dirname(fileURLToPath(import.meta.url));
const REPO_ROOT = path.resolve(HERE, "..", "..", "..", "..");

function resolveConfigPath(preferred: string): string {
  const candidates = [
    preferred,
    path.resolve(process.cwd(), preferred),
    path.join(REPO_ROOT, preferred),
    path.join(REPO_ROOT, DEFAULT_CONFIG_PATH),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  throw new Error(
    `Unable to locate configuration file. Tried: ${candidates.join(", ")}`
  );
}

export function loadConfig(configPath = DEFAULT_CONFIG_PATH): AppConfig {
  const resolved = resolveConfigPath(configPath);
  if (cached && cached.path === resolved) return cached.config;

  const raw = fs.readFileSync(resolved, "utf-8");
  try {
    const cfg = AppConfigSchema.parse(YAML.parse(raw));
    cached = { path: resolved, config: deepFreeze(cfg) };
    return cached.config;
  } catch (err) {
    if (err instanceof z.ZodError) {
      console.error(`❌ [config] schema validation failed: ${resolved}`);
      err.issues.forEach((issue) => {
        console.error(`  ${issue.path.join(".")}: ${issue.message}`);
      });
      throw new Error(`Invalid configuration ${resolved} - see errors above`);
    }
    throw err;
  }
}

export function resetConfigCache(): void {
  cached = null;
}
