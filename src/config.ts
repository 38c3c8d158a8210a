import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { z } from "zod";
import type { VerifyPolicy } from "./options.js";
import { logError } from "./log.js";

const FileConfigSchema = z.object({
  url: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  site: z.string().optional(),
  insecure: z.boolean().optional(),
  caBundle: z.string().optional(),
  timeout: z.number().int().positive().optional(),
  readOnly: z.boolean().optional(),
});

export type FileConfig = z.infer<typeof FileConfigSchema>;

export interface Config {
  url?: string;
  username?: string;
  password?: string;
  site: string;
  insecure: boolean;
  caBundle?: string;
  timeout?: number;
  readOnly: boolean;
  verbose: boolean;
}

export const CONFIG_DIR = join(process.env.HOME ?? homedir(), ".config", "unifi-session");
export const CONFIG_FILE = join(CONFIG_DIR, "config.json");

export function loadFileConfig(file = CONFIG_FILE): FileConfig {
  if (!existsSync(file)) return {};
  try {
    const parsed = FileConfigSchema.safeParse(JSON.parse(readFileSync(file, "utf-8")));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}

export function saveConfig(config: FileConfig, file = CONFIG_FILE): void {
  mkdirSync(dirname(file), { recursive: true });
  const merged = { ...loadFileConfig(file), ...config };
  writeFileSync(file, JSON.stringify(merged, null, 2) + "\n", { mode: 0o600 });
}

function str(v: unknown): string | undefined {
  return typeof v === "string" && v !== "" ? v : undefined;
}

function int(v: unknown): number | undefined {
  if (v === undefined || v === null || v === "") return undefined;
  const n = Number(v);
  return Number.isInteger(n) && n > 0 ? n : undefined;
}

/** Flags > environment > config file > defaults */
export function resolveConfig(
  cliOpts: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
  file: FileConfig = loadFileConfig(),
): Config {
  return {
    url: str(cliOpts.url) ?? str(env.UNIFI_URL) ?? file.url,
    username: str(cliOpts.username) ?? str(env.UNIFI_USERNAME) ?? file.username,
    password: str(cliOpts.password) ?? str(env.UNIFI_PASSWORD) ?? file.password,
    site: str(cliOpts.site) ?? str(env.UNIFI_SITE) ?? file.site ?? "default",
    insecure: !!(cliOpts.insecure || env.UNIFI_INSECURE === "1" || file.insecure),
    caBundle: str(cliOpts.caBundle) ?? str(env.UNIFI_CA_BUNDLE) ?? file.caBundle,
    timeout: int(cliOpts.timeout) ?? int(env.UNIFI_TIMEOUT) ?? file.timeout,
    readOnly: !!(cliOpts.readOnly || env.UNIFI_READ_ONLY === "1" || file.readOnly),
    verbose: !!(cliOpts.verbose || env.UNIFI_DEBUG === "1"),
  };
}

/**
 * TLS policy for the client: a CA bundle pins the controller's certificate,
 * otherwise verification is on unless --insecure was given.
 */
export function verifyPolicy(config: Config): VerifyPolicy {
  if (config.caBundle) return config.caBundle;
  return !config.insecure;
}

export type CompleteConfig = Config & { url: string; username: string; password: string };

export function missingConfig(config: Config): string | undefined {
  if (!config.url) {
    return "Missing UniFi controller URL. Set via --url, UNIFI_URL env var, or run: unifi-session configure";
  }
  if (!config.username || !config.password) {
    return "Missing credentials. Set via --username/--password, UNIFI_USERNAME/UNIFI_PASSWORD env vars, or run: unifi-session configure";
  }
  return undefined;
}

export function isCompleteConfig(config: Config): config is CompleteConfig {
  return missingConfig(config) === undefined;
}

export function requireConfig(config: Config): asserts config is CompleteConfig {
  const missing = missingConfig(config);
  if (missing) {
    logError({ error: missing });
    process.exit(1);
  }
}
