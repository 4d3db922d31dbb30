import fsp from "node:fs/promises";
import { Readable } from "node:stream";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigurationError, isErrnoException } from "../errors.js";

/** Where a credential set comes from: a YAML file, an open stream of YAML, or a parsed mapping. */
export type CredentialSource =
  | { kind: "path"; path: string }
  | { kind: "stream"; stream: Readable }
  | { kind: "inline"; values: Record<string, unknown> };

export interface Credentials {
  readonly username: string;
  readonly api_key: string;
  readonly servicenet: boolean;
  readonly auth_url?: string;
  readonly container_name?: string;
  readonly cname?: string;
}

const credentialsSchema = z.object({
  username: z.string().min(1),
  api_key: z.string().min(1),
  servicenet: z.boolean().default(false),
  auth_url: z.string().url().optional(),
  container: z.string().min(1).optional(),
  container_name: z.string().min(1).optional(),
  cname: z.string().url().optional(),
});

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Builds a CredentialSource from an untyped option value:
 * a string is a file path, a Readable is a stream, a plain object is an inline mapping.
 */
export function credentialSourceFrom(value: unknown): CredentialSource {
  if (typeof value === "string") return { kind: "path", path: value };
  if (value instanceof Readable) return { kind: "stream", stream: value };
  if (isMapping(value)) return { kind: "inline", values: value };
  throw new ConfigurationError("Credentials are not a path, stream, or mapping");
}

/** `apiKey`, `APIKey`, `API_KEY` and `api-key` all become `api_key`. */
export function normalizeKey(key: string): string {
  return key
    .trim()
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/[-\s]+/g, "_")
    .toLowerCase();
}

function normalizeKeys(values: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(values)) {
    out[normalizeKey(key)] = value;
  }
  return out;
}

function parseYaml(text: string, origin: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = yaml.load(text);
  } catch (err) {
    throw new ConfigurationError(`Credentials in ${origin} are not valid YAML`, { cause: err });
  }
  if (!isMapping(parsed)) {
    throw new ConfigurationError(`Credentials in ${origin} must be a YAML mapping`);
  }
  return parsed;
}

async function readStream(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

async function load(source: CredentialSource): Promise<Record<string, unknown>> {
  switch (source.kind) {
    case "path": {
      let text: string;
      try {
        text = await fsp.readFile(source.path, "utf-8");
      } catch (err) {
        const reason = isErrnoException(err) && err.code === "ENOENT" ? "does not exist" : "cannot be read";
        throw new ConfigurationError(`Credentials file ${source.path} ${reason}`, { cause: err });
      }
      return parseYaml(text, source.path);
    }
    case "stream":
      return parseYaml(await readStream(source.stream), "stream");
    case "inline":
      return source.values;
    default:
      throw new ConfigurationError("Credentials are not a path, stream, or mapping");
  }
}

/**
 * Loads a credential set. When the document holds a mapping under the
 * environment name, that mapping is the credential set; otherwise the whole
 * document is.
 */
export async function resolveCredentials(
  source: CredentialSource,
  environment: string,
): Promise<Credentials> {
  const document = await load(source);
  const scoped = Object.hasOwn(document, environment) ? document[environment] : undefined;
  const values = normalizeKeys(isMapping(scoped) ? scoped : document);

  const result = credentialsSchema.safeParse(values);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new ConfigurationError(`Invalid Cloud Files credentials (${problems})`);
  }

  const { username, api_key, servicenet, auth_url, cname } = result.data;
  const containerName = result.data.container ?? result.data.container_name;
  const credentials: Credentials = {
    username,
    api_key,
    servicenet,
    ...(auth_url !== undefined && { auth_url }),
    ...(containerName !== undefined && { container_name: containerName }),
    ...(cname !== undefined && { cname }),
  };
  return Object.freeze(credentials);
}
