import crypto from "node:crypto";
import { z } from "zod";
import type { SheetsConfig } from "../config/types.screener.js";
import { createChildLogger } from "../logging/logger.js";

const DEFAULT_TOKEN_URI = "https://oauth2.googleapis.com/token";
const DRIVE_FILES_URL = "https://www.googleapis.com/drive/v3/files";
const SHEETS_API_URL = "https://sheets.googleapis.com/v4/spreadsheets";
const SPREADSHEET_MIME_TYPE = "application/vnd.google-apps.spreadsheet";

export const GOOGLE_SCOPES = [
  "https://www.googleapis.com/auth/spreadsheets",
  "https://www.googleapis.com/auth/drive",
];

const log = createChildLogger("sheets");

const ServiceAccountSchema = z
  .object({
    client_email: z.string().min(1),
    private_key: z.string().min(1),
    token_uri: z.string().url().default(DEFAULT_TOKEN_URI),
  })
  .passthrough();

export type ServiceAccountCredentials = z.infer<typeof ServiceAccountSchema>;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().optional(),
});

const DriveFilesSchema = z.object({
  files: z.array(z.object({ id: z.string(), name: z.string() })).default([]),
});

const ValuesResponseSchema = z.object({
  values: z.array(z.array(z.union([z.string(), z.number(), z.boolean()]))).default([]),
});

export function parseServiceAccountCredentials(raw: string | undefined): ServiceAccountCredentials {
  if (!raw) {
    throw new Error("GOOGLE_CREDS_JSON env var is not set.");
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`GOOGLE_CREDS_JSON is not valid JSON: ${String(err)}`);
  }
  const parsed = ServiceAccountSchema.safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new Error(`GOOGLE_CREDS_JSON is not a service account key (check ${fields})`);
  }
  return parsed.data;
}

function base64UrlJson(value: unknown): string {
  return Buffer.from(JSON.stringify(value)).toString("base64url");
}

export function createServiceAccountAssertion(params: {
  credentials: ServiceAccountCredentials;
  scopes: string[];
  nowSeconds?: number;
}): string {
  const iat = params.nowSeconds ?? Math.floor(Date.now() / 1000);
  const header = base64UrlJson({ alg: "RS256", typ: "JWT" });
  const claims = base64UrlJson({
    iss: params.credentials.client_email,
    scope: params.scopes.join(" "),
    aud: params.credentials.token_uri,
    iat,
    exp: iat + 3600,
  });
  const signature = crypto
    .createSign("RSA-SHA256")
    .update(`${header}.${claims}`)
    .sign(params.credentials.private_key, "base64url");
  return `${header}.${claims}.${signature}`;
}

async function googleFetchJson(url: string, init: RequestInit = {}): Promise<unknown> {
  log.debug({ url }, `google ${init.method ?? "GET"}`);
  const response = await fetch(url, init);
  if (!response.ok) {
    const body = await response.text();
    throw new Error(`google ${response.status}: ${body}`);
  }
  return response.json();
}

export async function fetchAccessToken(credentials: ServiceAccountCredentials): Promise<string> {
  const assertion = createServiceAccountAssertion({ credentials, scopes: GOOGLE_SCOPES });
  const json = await googleFetchJson(credentials.token_uri, {
    method: "POST",
    headers: { "Content-Type": "application/x-www-form-urlencoded" },
    body: new URLSearchParams({
      grant_type: "urn:ietf:params:oauth:grant-type:jwt-bearer",
      assertion,
    }).toString(),
  });
  const parsed = TokenResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error("google token endpoint returned no access token");
  }
  return parsed.data.access_token;
}

function bearer(token: string): Record<string, string> {
  return { Authorization: `Bearer ${token}` };
}

export async function findSpreadsheetId(params: { token: string; name: string }): Promise<string> {
  const escaped = params.name.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
  const query = new URLSearchParams({
    q: `name = '${escaped}' and mimeType = '${SPREADSHEET_MIME_TYPE}' and trashed = false`,
    fields: "files(id,name)",
    pageSize: "10",
  });
  const json = await googleFetchJson(`${DRIVE_FILES_URL}?${query.toString()}`, {
    headers: bearer(params.token),
  });
  const parsed = DriveFilesSchema.safeParse(json);
  const file = parsed.success ? parsed.data.files[0] : undefined;
  if (!file) {
    throw new Error(`Unable to open Google Sheet '${params.name}': not found`);
  }
  return file.id;
}

/** Every row of the worksheet as displayed text; trailing empty cells are omitted by the API. */
export async function fetchWorksheetValues(params: {
  token: string;
  spreadsheetId: string;
  worksheet: string;
}): Promise<string[][]> {
  const range = `'${params.worksheet.replace(/'/g, "''")}'`;
  const query = new URLSearchParams({
    majorDimension: "ROWS",
    valueRenderOption: "FORMATTED_VALUE",
  });
  const spreadsheet = encodeURIComponent(params.spreadsheetId);
  const json = await googleFetchJson(
    `${SHEETS_API_URL}/${spreadsheet}/values/${encodeURIComponent(range)}?${query.toString()}`,
    { headers: bearer(params.token) },
  );
  const parsed = ValuesResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Unable to read worksheet '${params.worksheet}': unexpected response`);
  }
  return parsed.data.values.map((row) => row.map((cell) => String(cell)));
}

export async function loadScreenerValues(config: SheetsConfig): Promise<string[][]> {
  const credentials = parseServiceAccountCredentials(config.credentialsJson);
  const token = await fetchAccessToken(credentials);
  const spreadsheetId =
    config.spreadsheetId ?? (await findSpreadsheetId({ token, name: config.spreadsheetName }));
  const values = await fetchWorksheetValues({
    token,
    spreadsheetId,
    worksheet: config.worksheetName,
  });
  log.info(
    { spreadsheetId, worksheet: config.worksheetName, rows: values.length },
    "loaded worksheet values",
  );
  return values;
}
