import fs from "node:fs";
import path from "node:path";
import { parse } from "yaml";
import { BUILTIN_PROVIDERS, SettingsFileSchema } from "./types.js";
import type { BuiltinProvider, ModelSettings, Settings } from "./types.js";
import { log } from "./utils/logger.js";

// ─── Environment / API Keys ──────────────────────────────────────────────────

/** Default env var names for built-in providers */
const BUILTIN_ENV_KEYS: Record<BuiltinProvider, string> = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  gemini: "GEMINI_API_KEY",
};

function isBuiltinProvider(provider: string): provider is BuiltinProvider {
  return (BUILTIN_PROVIDERS as readonly string[]).includes(provider);
}

/** Resolve the env var name holding the API key for a model */
export function resolveEnvVar(settings: ModelSettings): string {
  if (settings.envVar) return settings.envVar;
  if (isBuiltinProvider(settings.provider)) {
    return BUILTIN_ENV_KEYS[settings.provider];
  }
  // Custom provider: try the <PROVIDER>_API_KEY convention
  return `${settings.provider.toUpperCase()}_API_KEY`;
}

export function validateEnvForModel(
  settings: ModelSettings,
  env: NodeJS.ProcessEnv = process.env,
): void {
  const envVar = resolveEnvVar(settings);
  if (!env[envVar]) {
    throw new Error(
      `Missing environment variable: ${envVar} (required for ${settings.provider} model ${settings.model})`,
    );
  }
}

// ─── Defaults ────────────────────────────────────────────────────────────────

export const DEFAULT_SETTINGS: Settings = {
  model: {
    provider: "openai",
    model: "gpt-4o-mini",
    displayName: "GPT-4o Mini",
  },
  recordsFile: "pet_data.json",
  port: 8501,
};

export const CONFIG_FILE_NAME = "petcare.yaml";

// ─── Config File Loading ─────────────────────────────────────────────────────

export function loadSettings(configPath?: string): Settings {
  // If explicit path provided, it must exist
  if (configPath) {
    if (!fs.existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    return parseSettingsFile(configPath);
  }

  // Auto-detect petcare.yaml in project root
  const autoPath = path.join(getProjectRoot(), CONFIG_FILE_NAME);
  if (fs.existsSync(autoPath)) {
    log.dim(`Loading settings from ${autoPath}`);
    return parseSettingsFile(autoPath);
  }

  return DEFAULT_SETTINGS;
}

function parseSettingsFile(filePath: string): Settings {
  const content = fs.readFileSync(filePath, "utf-8");
  // An empty YAML document parses to null
  const raw: unknown = parse(content) ?? {};
  const result = SettingsFileSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid config file ${filePath}: ${issues}`);
  }

  return {
    model: result.data.model ?? DEFAULT_SETTINGS.model,
    recordsFile: result.data.recordsFile ?? DEFAULT_SETTINGS.recordsFile,
    port: result.data.port ?? DEFAULT_SETTINGS.port,
  };
}

// ─── Paths ───────────────────────────────────────────────────────────────────

export function getProjectRoot(): string {
  return process.cwd();
}

export function getRecordsPath(settings: Settings): string {
  return path.resolve(getProjectRoot(), settings.recordsFile);
}
