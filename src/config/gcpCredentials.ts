import { z } from "zod";
import { ConfigurationError, errorMessage } from "../shared/errors";
import { readText } from "../shared/fileStore";
import { nonEmpty } from "./loadConfig";

export const ServiceAccountSchema = z.object({
  type: z.string().default("service_account"),
  project_id: z.string().optional(),
  private_key_id: z.string().optional(),
  private_key: z.string().min(1),
  client_email: z.string().min(1),
  client_id: z.string().optional(),
  auth_uri: z.string().optional(),
  token_uri: z.string().optional(),
  auth_provider_x509_cert_url: z.string().optional(),
  client_x509_cert_url: z.string().optional(),
  universe_domain: z.string().default("googleapis.com")
});

export type GcpServiceAccount = z.infer<typeof ServiceAccountSchema>;

export type GcpCredentialSource =
  | "GCP_CREDENTIALS_JSON"
  | "GCP_CREDENTIALS_BASE64"
  | "GCP_CREDENTIALS_FILE"
  | "GCP_FIELDS";

export interface ResolvedGcpCredentials {
  source: GcpCredentialSource;
  credentials: GcpServiceAccount;
}

const FIELD_VARS: Record<Exclude<keyof GcpServiceAccount, "universe_domain">, string> = {
  type: "GCP_TYPE",
  project_id: "GCP_PROJECT_ID",
  private_key_id: "GCP_PRIVATE_KEY_ID",
  private_key: "GCP_PRIVATE_KEY",
  client_email: "GCP_CLIENT_EMAIL",
  client_id: "GCP_CLIENT_ID",
  auth_uri: "GCP_AUTH_URI",
  token_uri: "GCP_TOKEN_URI",
  auth_provider_x509_cert_url: "GCP_AUTH_PROVIDER_X509_CERT_URL",
  client_x509_cert_url: "GCP_CLIENT_X509_CERT_URL"
};

/**
 * First source present wins: GCP_CREDENTIALS_JSON, GCP_CREDENTIALS_BASE64,
 * GCP_CREDENTIALS_FILE, then the individual GCP_* fields. Sources are never
 * merged, and a malformed source is an error rather than a fall-through.
 * Returns null when no source is configured.
 */
export async function resolveGcpCredentials(
  env: NodeJS.ProcessEnv,
  readFile: (filePath: string) => Promise<string> = readText
): Promise<ResolvedGcpCredentials | null> {
  const json = nonEmpty(env.GCP_CREDENTIALS_JSON);
  if (json !== undefined) {
    const text = json.startsWith("{") ? json : decodeBase64(json, "GCP_CREDENTIALS_JSON");
    return parseServiceAccount(text, "GCP_CREDENTIALS_JSON");
  }

  const base64 = nonEmpty(env.GCP_CREDENTIALS_BASE64);
  if (base64 !== undefined) {
    return parseServiceAccount(decodeBase64(base64, "GCP_CREDENTIALS_BASE64"), "GCP_CREDENTIALS_BASE64");
  }

  const filePath = nonEmpty(env.GCP_CREDENTIALS_FILE);
  if (filePath !== undefined) {
    let text: string;
    try {
      text = await readFile(filePath);
    } catch (error) {
      throw new ConfigurationError(
        "GCP_CREDENTIALS_INVALID",
        `GCP_CREDENTIALS_FILE '${filePath}' cannot be read: ${errorMessage(error)}`
      );
    }
    return parseServiceAccount(text, "GCP_CREDENTIALS_FILE");
  }

  return resolveFromFields(env);
}

function resolveFromFields(env: NodeJS.ProcessEnv): ResolvedGcpCredentials | null {
  const raw: Record<string, string> = {};
  for (const [field, variable] of Object.entries(FIELD_VARS)) {
    const value = nonEmpty(env[variable]);
    if (value !== undefined) {
      raw[field] = value;
    }
  }
  if (Object.keys(raw).length === 0) {
    return null;
  }
  if (raw.private_key !== undefined) {
    raw.private_key = raw.private_key.replace(/\\n/g, "\n");
  }
  const universe = nonEmpty(env.GCP_UNIVERSE_DOMAIN);
  if (universe !== undefined) {
    raw.universe_domain = universe;
  }

  const missing = ["GCP_CLIENT_EMAIL", "GCP_PRIVATE_KEY"].filter((variable) => nonEmpty(env[variable]) === undefined);
  if (missing.length > 0) {
    throw new ConfigurationError("GCP_CREDENTIALS_INVALID", `Individual GCP credential fields are incomplete; missing ${missing.join(", ")}.`, {
      missing
    });
  }
  return toResolved(raw, "GCP_FIELDS");
}

function parseServiceAccount(text: string, source: GcpCredentialSource): ResolvedGcpCredentials {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError("GCP_CREDENTIALS_INVALID", `${source} is not valid JSON: ${errorMessage(error)}`);
  }
  return toResolved(json, source);
}

function toResolved(value: unknown, source: GcpCredentialSource): ResolvedGcpCredentials {
  const parsed = ServiceAccountSchema.safeParse(value);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join("."));
    throw new ConfigurationError("GCP_CREDENTIALS_INVALID", `${source} is missing service account fields: ${fields.join(", ")}.`, {
      fields
    });
  }
  return { source, credentials: parsed.data };
}

function decodeBase64(value: string, source: GcpCredentialSource): string {
  if (!/^[A-Za-z0-9+/=_\s-]+$/.test(value)) {
    throw new ConfigurationError("GCP_CREDENTIALS_INVALID", `${source} is neither JSON nor base64.`);
  }
  return Buffer.from(value, "base64").toString("utf8");
}
