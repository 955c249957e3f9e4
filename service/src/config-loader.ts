import * as fs from "node:fs";
import * as path from "node:path";
import { parseConfig, type Config } from "@refdata/shared";
import { createLogger } from "./utils/logger.js";

const log = createLogger("config");

export const DEFAULT_CONFIG_PATH = "refdata.config.json";

const DEFAULT_LOG_PATHS: Record<Config["log"]["backend"], string> = {
  sqlite: "data/refdata.db",
  jsonl: "data/log",
};

export type Credentials = {
  apiKey?: string;
  apiSecret?: string;
  /** PEM text of the Ed25519 private key, when signing with one. */
  privateKey?: string;
};

export type LoadedConfig = {
  config: Config;
  credentials: Credentials;
  /** Resolved log location for the configured backend. */
  logPath: string;
};

type Env = Record<string, string | undefined>;

/**
 * Read the config file named by `REFDATA_CONFIG` (default
 * `refdata.config.json`); a missing file means all defaults. Credentials
 * come from the environment variables the config names.
 */
export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): LoadedConfig {
  const file = path.resolve(cwd, env.REFDATA_CONFIG ?? DEFAULT_CONFIG_PATH);

  let raw: unknown = {};
  if (fs.existsSync(file)) {
    try {
      raw = JSON.parse(fs.readFileSync(file, "utf-8"));
    } catch (err) {
      throw new Error(`Invalid JSON in config file ${file}`, { cause: err });
    }
    log.info("Loaded config", { file });
  } else if (env.REFDATA_CONFIG) {
    throw new Error(`Config file not found: ${file}`);
  } else {
    log.info("No config file, using defaults", { file });
  }

  const config = parseConfig(raw);
  const credentials: Credentials = {
    apiKey: nonEmpty(env[config.exchange.apiKeyEnv]),
    apiSecret: nonEmpty(env[config.exchange.apiSecretEnv]),
    privateKey: readPrivateKey(config, cwd),
  };
  const logPath = path.resolve(cwd, config.log.path ?? DEFAULT_LOG_PATHS[config.log.backend]);

  return { config, credentials, logPath };
}

function readPrivateKey(config: Config, cwd: string): string | undefined {
  const { signing, privateKeyPath } = config.exchange;
  if (signing !== "ed25519" || !privateKeyPath) return undefined;

  const file = path.resolve(cwd, privateKeyPath);
  if (!fs.existsSync(file)) {
    throw new Error(`Private key file not found: ${file}`);
  }
  return fs.readFileSync(file, "utf-8");
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}
