/**
 * Environment variable validation
 *
 * Validates required environment variables at startup and fails fast
 * if any are missing.
 */

import type { EvidenceComponent } from "../workflow/types";

type NodeEnv = "development" | "production" | "test";

export interface EnvConfig {
  // Required
  GEMINI_API_KEY: string;

  // Optional with defaults
  PORT: number;
  NODE_ENV: NodeEnv;
  DOMAIN_DESCRIPTION: string;

  /** File Search store per evidence component; unset components cannot be retrieved. */
  FILE_SEARCH_STORES: Partial<Record<EvidenceComponent, string>>;
}

const REQUIRED_VARS = ["GEMINI_API_KEY"] as const;

const OPTIONAL_VARS_WITH_DEFAULTS = {
  PORT: "5000",
  NODE_ENV: "development",
  DOMAIN_DESCRIPTION: "durian pest and disease management",
} as const;

const STORE_VARS: Record<EvidenceComponent, string> = {
  entities: "FILE_SEARCH_STORE_ENTITIES",
  relationships: "FILE_SEARCH_STORE_RELATIONSHIPS",
  episodes: "FILE_SEARCH_STORE_EPISODES",
  communities: "FILE_SEARCH_STORE_COMMUNITIES",
};

function isSet(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== "";
}

function parseNodeEnv(value: string | undefined): NodeEnv {
  return value === "production" || value === "test" ? value : "development";
}

/**
 * Validates that all required environment variables are set.
 * Call this at app startup before any other initialization.
 *
 * @throws Error if any required variables are missing
 */
export function validateEnv(): void {
  const missing: string[] = [];
  const warnings: string[] = [];

  for (const varName of REQUIRED_VARS) {
    if (!isSet(process.env[varName])) {
      missing.push(varName);
    }
  }

  const unsetStores = Object.values(STORE_VARS).filter((varName) => !isSet(process.env[varName]));
  if (unsetStores.length === Object.keys(STORE_VARS).length) {
    warnings.push("No FILE_SEARCH_STORE_* variables set - knowledge store retrieval will return nothing");
  }

  const port = process.env.PORT;
  if (isSet(port) && !Number.isInteger(Number(port))) {
    warnings.push(`PORT "${port}" is not a number - falling back to ${OPTIONAL_VARS_WITH_DEFAULTS.PORT}`);
  }

  for (const warning of warnings) {
    console.warn(`⚠️  ENV WARNING: ${warning}`);
  }

  if (missing.length > 0) {
    const message = `Missing required environment variables:\n${missing.map((v) => `  - ${v}`).join("\n")}`;
    console.error(`\n❌ STARTUP FAILED\n${message}\n`);
    throw new Error(message);
  }

  console.log("✅ Environment variables validated");
}

/**
 * Get a validated environment configuration object.
 * Only call after validateEnv() has succeeded.
 */
export function getEnvConfig(): EnvConfig {
  const port = parseInt(process.env.PORT || OPTIONAL_VARS_WITH_DEFAULTS.PORT, 10);

  const stores: Partial<Record<EvidenceComponent, string>> = {};
  for (const [component, varName] of Object.entries(STORE_VARS)) {
    const value = process.env[varName];
    if (isSet(value) && isComponent(component)) {
      stores[component] = value.trim();
    }
  }

  return {
    GEMINI_API_KEY: requireEnvVar("GEMINI_API_KEY"),
    PORT: Number.isNaN(port) ? parseInt(OPTIONAL_VARS_WITH_DEFAULTS.PORT, 10) : port,
    NODE_ENV: parseNodeEnv(process.env.NODE_ENV),
    DOMAIN_DESCRIPTION: getEnvVar("DOMAIN_DESCRIPTION", OPTIONAL_VARS_WITH_DEFAULTS.DOMAIN_DESCRIPTION),
    FILE_SEARCH_STORES: stores,
  };
}

function isComponent(value: string): value is EvidenceComponent {
  return value in STORE_VARS;
}

/**
 * Type-safe environment variable getter with default.
 * Use for optional variables that have sensible defaults.
 */
export function getEnvVar(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

/**
 * Type-safe required environment variable getter.
 * Throws if the variable is not set. Use after validateEnv().
 */
export function requireEnvVar(name: string): string {
  const value = process.env[name];
  if (!isSet(value)) {
    throw new Error(`Required environment variable ${name} is not set`);
  }
  return value;
}
