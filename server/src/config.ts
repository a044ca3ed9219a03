import fs from "node:fs";
import path from "node:path";
import { parse } from "yaml";
import { ConfigurationError, errorMessage } from "./errors";

export interface AppConfig {
  title: string;
  description: string;
  numClasses: number;
  imagesFolder: string;
  maxHistory: number;
  allowedExtensions: string[];
  databasePath: string;
  port: number;
  host: string;
  /** Attribution for writes whose request names no annotator. */
  username: string;
}

type Env = Record<string, string | undefined>;

const DEFAULTS = {
  title: "Image Annotation Tool",
  description: "Annotate images",
  num_classes: 5,
  images_folder: "images",
  max_history: 10,
  allowed_extensions: [".jpg", ".jpeg", ".png"],
  port: 8000,
  host: "127.0.0.1",
};

const KNOWN_KEYS = new Set([
  "title",
  "description",
  "num_classes",
  "images_folder",
  "max_history",
  "allowed_extensions",
  "database",
  "port",
  "host",
]);

export const DEFAULT_CONFIG_PATH = "config.yaml";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(raw: Record<string, unknown>, key: string, fallback: string): string {
  const value = raw[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "string") {
    throw new ConfigurationError(`${key} must be a string`);
  }
  return value;
}

function readInteger(
  raw: Record<string, unknown>,
  key: string,
  fallback: number,
  min: number,
): number {
  const value = raw[key] ?? fallback;
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${key} must be an integer >= ${min}, got ${String(value)}`);
  }
  return value;
}

function readExtensions(raw: Record<string, unknown>): string[] {
  const value = raw.allowed_extensions ?? DEFAULTS.allowed_extensions;
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigurationError("allowed_extensions must be a non-empty list");
  }
  return value.map((ext) => {
    if (typeof ext !== "string" || ext.trim() === "") {
      throw new ConfigurationError("allowed_extensions entries must be non-empty strings");
    }
    const lower = ext.trim().toLowerCase();
    return lower.startsWith(".") ? lower : `.${lower}`;
  });
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigurationError(`PORT must be an integer between 0 and 65535, got ${value}`);
  }
  return port;
}

export function resolveUsername(env: Env): string {
  return env.ANNOTATOR?.trim() || env.USER || env.USERNAME || "unknown";
}

/**
 * Validates a parsed config document (the YAML root) and applies the
 * environment overrides. `raw` may be undefined when no file exists.
 */
export function parseConfig(raw: unknown, env: Env = {}): AppConfig {
  const doc = raw ?? {};
  if (!isRecord(doc)) {
    throw new ConfigurationError("Configuration must be a mapping of options");
  }

  const unknownKeys = Object.keys(doc).filter((key) => !KNOWN_KEYS.has(key));
  if (unknownKeys.length > 0) {
    throw new ConfigurationError(`Unknown configuration option(s): ${unknownKeys.join(", ")}`);
  }

  const imagesFolder = readString(doc, "images_folder", DEFAULTS.images_folder);
  if (imagesFolder.trim() === "") {
    throw new ConfigurationError("images_folder must not be empty");
  }

  return {
    title: readString(doc, "title", DEFAULTS.title),
    description: readString(doc, "description", DEFAULTS.description),
    numClasses: readInteger(doc, "num_classes", DEFAULTS.num_classes, 1),
    imagesFolder,
    maxHistory: readInteger(doc, "max_history", DEFAULTS.max_history, 0),
    allowedExtensions: readExtensions(doc),
    databasePath: readString(doc, "database", path.join(imagesFolder, "annotations.db")),
    port: env.PORT ? parsePort(env.PORT) : readInteger(doc, "port", DEFAULTS.port, 0),
    host: env.HOST || readString(doc, "host", DEFAULTS.host),
    username: resolveUsername(env),
  };
}

export function loadConfig(
  configPath: string = process.env.IMAGE_RATER_CONFIG ?? DEFAULT_CONFIG_PATH,
  env: Env = process.env,
): AppConfig {
  if (!fs.existsSync(configPath)) {
    return parseConfig(undefined, env);
  }

  let raw: unknown;
  try {
    raw = parse(fs.readFileSync(configPath, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Could not read ${configPath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  return parseConfig(raw, env);
}
