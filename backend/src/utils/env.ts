import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

export function loadDotEnv(): void {
  const candidates = [
    path.resolve(process.cwd(), ".env"),
    path.resolve(process.cwd(), "backend", ".env")
  ];

  const envPath = candidates.find((p) => fs.existsSync(p));
  if (!envPath) return;

  dotenv.config({ path: envPath });
}

export function getEnv(name: string): string | undefined {
  const value = process.env[name];
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
}

export function getIntEnv(name: string, fallback: number): number {
  const value = getEnv(name);
  if (!value) return fallback;
  const n = Number.parseInt(value, 10);
  return Number.isFinite(n) ? n : fallback;
}

export function getListEnv(name: string, fallback: readonly string[]): string[] {
  const value = getEnv(name);
  if (!value) return [...fallback];
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length ? items : [...fallback];
}
