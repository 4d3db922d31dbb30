import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";

export interface ServerConfig {
  port: number;
  upload_dir: string;
  max_file_size: number;
}

export interface StorageConfig {
  driver: string;
  local_path: string;
  cdn_url: string;
  cdn_ssl_url: string;
  /** Path to a credentials YAML file, or the credential mapping itself. */
  credentials: unknown;
  container?: string;
  path?: string;
  ssl: boolean;
  styles: string[];
}

export interface Config {
  environment: string;
  server: ServerConfig;
  storage: StorageConfig;
}

type Raw = Record<string, unknown>;

function section(raw: Raw, key: string): Raw {
  const value = raw[key];
  return isMapping(value) ? value : {};
}

function isMapping(value: unknown): value is Raw {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

function num(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function bool(value: unknown): boolean | undefined {
  return typeof value === "boolean" ? value : undefined;
}

function strList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((v): v is string => typeof v === "string" && v !== "");
}

/** Credentials fall back to CLOUDFILES_* environment variables when app.yaml names none. */
function envCredentials(): Raw | undefined {
  const username = process.env.CLOUDFILES_USERNAME;
  const apiKey = process.env.CLOUDFILES_API_KEY;
  if (!username || !apiKey) return undefined;

  const creds: Raw = { username, api_key: apiKey };
  if (process.env.CLOUDFILES_SERVICENET) creds.servicenet = process.env.CLOUDFILES_SERVICENET === "true";
  if (process.env.CLOUDFILES_AUTH_URL) creds.auth_url = process.env.CLOUDFILES_AUTH_URL;
  if (process.env.CLOUDFILES_CONTAINER) creds.container = process.env.CLOUDFILES_CONTAINER;
  if (process.env.CLOUDFILES_CNAME) creds.cname = process.env.CLOUDFILES_CNAME;
  return creds;
}

export function loadConfig(
  candidates: string[] = [path.resolve("app.yaml"), path.resolve("../app.yaml")],
): Config {
  let raw: Raw = {};
  for (const p of candidates) {
    if (fs.existsSync(p)) {
      const parsed = yaml.load(fs.readFileSync(p, "utf-8"));
      raw = isMapping(parsed) ? parsed : {};
      break;
    }
  }

  const server = section(raw, "server");
  const storage = section(raw, "storage");
  const driver = str(storage.driver) ?? "memory";

  return {
    environment:
      str(raw.environment) ?? process.env.APP_ENV ?? process.env.NODE_ENV ?? "development",
    server: {
      port: num(server.port) ?? 8080,
      upload_dir: str(server.upload_dir) ?? "./uploads/tmp",
      max_file_size: num(server.max_file_size) ?? 10485760,
    },
    storage: {
      driver,
      local_path: str(storage.local_path) ?? "./uploads/containers",
      cdn_url: str(storage.cdn_url) ?? (driver === "filesystem" ? "/files" : "http://cdn.local"),
      cdn_ssl_url: str(storage.cdn_ssl_url) ?? (driver === "filesystem" ? "/files" : "https://cdn.local"),
      credentials: storage.credentials ?? envCredentials(),
      container: str(storage.container),
      path: str(storage.path),
      ssl: bool(storage.ssl) ?? false,
      styles: strList(storage.styles) ?? [],
    },
  };
}
