// backend/services/shared/env.ts

/**
 * Purpose:
 * - Load env files by layer with deterministic precedence:
 *     1) repo root
 *     2) service family dir (e.g., backend/services)
 *     3) service root (e.g., backend/services/user)
 *   Within each layer `.env` is read first, then the mode-specific file
 *   (e.g., .env.dev). Later files override earlier ones.
 *
 * Notes:
 * - In production, injected env is expected; files are optional there.
 * - dotenv-expand resolves `${VAR}` references across files.
 * - Injected process env always beats file values.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { expand } from "dotenv-expand";

/** Find the first directory upward from `start` that contains any of the markers. */
function findRootWithMarkers(start: string, markers: string[]): string | null {
  let dir = path.resolve(start);
  for (;;) {
    for (const m of markers) {
      if (fs.existsSync(path.join(dir, m))) return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/** Parse a single env file if it exists; null when absent. */
function parseIfExists(absPath: string): Record<string, string> | null {
  if (!fs.existsSync(absPath)) return null;
  try {
    return dotenv.parse(fs.readFileSync(absPath));
  } catch (err) {
    throw new Error(`Failed to load env file: ${absPath}: ${String(err)}`);
  }
}

export type EnvCascadeResult = {
  mode: string;
  loaded: string[];
};

/**
 * Cascading loader for a service.
 *
 *   dev:        [.env.dev, .env]
 *   test:       [.env.test, .env]
 *   production: [.env]            (optional)
 *   other:      [.env.<mode>, .env]
 */
export function loadEnvCascadeForService(
  serviceRootAbs: string
): EnvCascadeResult {
  const mode = (process.env.NODE_ENV || "dev").trim();

  const serviceRoot = path.resolve(serviceRootAbs);
  const serviceFamilyDir = path.dirname(serviceRoot);
  const repoRoot =
    findRootWithMarkers(serviceRoot, [".git", "package.json"]) ||
    path.resolve(serviceRoot, "..", "..", "..");

  const names = mode === "production" ? [".env"] : [`.env.${mode}`, ".env"];

  // repo → family → service; .env first inside a layer so the mode file wins
  const layers = Array.from(new Set([repoRoot, serviceFamilyDir, serviceRoot]));
  const loaded: string[] = [];
  const merged: Record<string, string> = {};
  for (const dir of layers) {
    for (const name of [...names].reverse()) {
      const abs = path.join(dir, name);
      const parsed = parseIfExists(abs);
      if (!parsed) continue;
      Object.assign(merged, parsed);
      loaded.push(abs);
    }
  }

  if (loaded.length === 0 && mode !== "production") {
    throw new Error(
      `No env files found for NODE_ENV=${mode} under: ${layers.join(", ")}`
    );
  }

  // Values already present in process.env (injected) are never overwritten.
  expand({ parsed: merged });

  return { mode, loaded };
}

/** Assert required environment variables are present (non-empty). */
export function assertEnv(keys: string[]): void {
  const missing = keys.filter((k) => {
    const v = process.env[k];
    return v == null || v.trim() === "";
  });
  if (missing.length) {
    throw new Error(`Missing required env vars: ${missing.join(", ")}`);
  }
}
