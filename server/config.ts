import * as dotenv from "dotenv";
import * as path from "node:path";

// .env.local wins over .env; neither overrides variables already set
dotenv.config({ path: ".env.local", override: false });
dotenv.config({ path: ".env", override: false });

export function optionalEnv(name: string, fallback: string): string {
  const v = process.env[name];
  if (!v || !v.trim()) return fallback;
  return v.trim();
}

export function parseIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const n = parseInt(raw, 10);
  return Number.isFinite(n) ? n : fallback;
}

export interface AppConfig {
  apiKey: string | null;
  port: number;
  uploadDir: string;
  outputDir: string;
  templatesDir: string;
  retentionHours: number;
  pageDelayMs: number;
  maxUploadMb: number;
  requestTimeoutMs: number;
  textModel: string;
  imageModel: string;
}

export function loadConfig(): AppConfig {
  const apiKey = optionalEnv("API_KEY", optionalEnv("GEMINI_API_KEY", ""));
  return {
    apiKey: apiKey || null,
    port: parseIntEnv("API_PORT", 5000),
    uploadDir: path.resolve(optionalEnv("UPLOAD_DIR", "uploads")),
    outputDir: path.resolve(optionalEnv("OUTPUT_DIR", "outputs")),
    templatesDir: path.resolve(optionalEnv("TEMPLATES_DIR", "templates")),
    retentionHours: parseIntEnv("RETENTION_HOURS", 24),
    pageDelayMs: parseIntEnv("PAGE_DELAY_MS", 1000),
    maxUploadMb: parseIntEnv("MAX_UPLOAD_MB", 16),
    requestTimeoutMs: parseIntEnv("REQUEST_TIMEOUT_MS", 120_000),
    textModel: optionalEnv("TEXT_MODEL", "gemini-2.5-flash"),
    imageModel: optionalEnv("IMAGE_MODEL", "gemini-2.5-flash-image"),
  };
}
