// backend/services/shared/config/env.ts
/**
 * Env loading + fail-fast accessors shared by every service.
 *
 * Layers are loaded in order, later files override earlier ones:
 *   1) repo root
 *   2) service family dir (backend/services)
 *   3) service root (backend/services/<svc>)
 * Within each layer .env is read first and the mode file (.env.dev /
 * .env.docker) over it. Variables injected by the process environment
 * are never overwritten. dotenv-expand resolves ${VAR} references across files.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";

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

/** Parse one env file if it exists; null when absent. */
function readEnvFile(absPath: string): Record<string, string> | null {
  if (!fs.existsSync(absPath)) return null;
  try {
    return dotenv.parse(fs.readFileSync(absPath));
  } catch (err) {
    throw new Error(`Failed to load env file: ${absPath}`, { cause: err });
  }
}

/** Env file names tried at every layer for a given NODE_ENV. */
export function envFilesForMode(mode: string): string[] {
  if (mode === "dev") return [".env", ".env.dev"];
  if (mode === "docker") return [".env", ".env.docker"];
  return [".env"];
}

/**
 * Cascading loader for a service rooted at `serviceRootAbs`.
 * Dev/docker must load at least one file; production and test may rely on
 * injected env.
 */
export function loadEnvCascadeForService(serviceRootAbs: string): string[] {
  const mode = (process.env.NODE_ENV || "").trim();
  if (!mode)
    throw new Error("NODE_ENV is required (dev | docker | production | test).");

  const serviceRoot = path.resolve(serviceRootAbs);
  const serviceFamilyDir = path.dirname(serviceRoot);
  const repoRoot =
    findRootWithMarkers(serviceRoot, [".git", "package.json"]) ||
    path.resolve(serviceRoot, "..", "..", "..");

  const candidates: string[] = [];
  for (const dir of [repoRoot, serviceFamilyDir, serviceRoot]) {
    for (const name of envFilesForMode(mode)) {
      candidates.push(path.join(dir, name));
    }
  }

  // later files win over earlier ones; variables already in process.env win over all files
  const merged: Record<string, string> = {};
  const loaded: string[] = [];
  for (const file of candidates) {
    const parsed = readEnvFile(file);
    if (!parsed) continue;
    Object.assign(merged, parsed);
    loaded.push(file);
  }
  dotenvExpand.expand({ parsed: merged });

  const allowMissing = mode === "production" || mode === "test";
  if (loaded.length === 0 && !allowMissing) {
    throw new Error(
      `No env files found for mode="${mode}". Looked in:\n` +
        candidates.map((p) => `  - ${p}`).join("\n")
    );
  }
  return loaded;
}

/** Assert required environment variables are present (non-empty). */
export function assertRequiredEnv(keys: string[]): void {
  const missing = keys.filter(
    (k) => !process.env[k] || !String(process.env[k]).trim()
  );
  if (missing.length)
    throw new Error(`Missing required env vars: ${missing.join(", ")}`);
}

export function getEnv(name: string): string | undefined {
  const v = process.env[name];
  return v && v.trim() ? v.trim() : undefined;
}

export function requireEnv(name: string): string {
  const v = getEnv(name);
  if (v === undefined) throw new Error(`Missing required env var: ${name}`);
  return v;
}

export function requireNumber(name: string): number {
  const raw = requireEnv(name);
  const n = Number(raw);
  if (!Number.isFinite(n))
    throw new Error(`Invalid number for env var ${name}: "${raw}"`);
  return n;
}

export function requireEnum<T extends string>(
  name: string,
  value: string,
  allowed: readonly T[]
): T {
  const hit = allowed.find((a) => a === value);
  if (hit === undefined) {
    throw new Error(
      `Invalid env var ${name}="${value}". Allowed: ${allowed.join(", ")}`
    );
  }
  return hit;
}

/** Mask credentials in a connection string before it is logged. */
export function redactUri(uri: string): string {
  try {
    const u = new URL(uri);
    if (u.password) u.password = "***";
    if (u.username) u.username = "***";
    return u.toString();
  } catch {
    return uri.replace(/\/\/([^@]+)@/, "//***:***@");
  }
}
