import { randomUUID } from "node:crypto";
import { JWT } from "google-auth-library";
import { z } from "zod";
import type { GcpServiceAccount } from "../../config/gcpCredentials";
import { HttpKernel, NormalizedHttpError } from "../../infrastructure/http/httpClient";
import { ConnectionError, errorMessage } from "../../shared/errors";
import { traceRef } from "../../shared/ids";

export const DRIVE_SCOPE = "https://www.googleapis.com/auth/drive";
export const XLSX_MIME = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";
export const GOOGLE_SHEET_MIME = "application/vnd.google-apps.spreadsheet";

const UPLOAD_URL = "https://www.googleapis.com/upload/drive/v3/files?uploadType=multipart&fields=id";
const FILES_URL = "https://www.googleapis.com/drive/v3/files";

const UploadResponseSchema = z.object({ id: z.string().min(1) });

export interface UploadedSheet {
  fileId: string;
  url: string;
}

export interface DriveUploader {
  uploadSpreadsheet(bytes: Buffer, name: string): Promise<UploadedSheet>;
}

export type AccessTokenSource = () => Promise<string>;

export function serviceAccountTokenSource(credentials: GcpServiceAccount): AccessTokenSource {
  const client = new JWT({
    email: credentials.client_email,
    key: credentials.private_key,
    scopes: [DRIVE_SCOPE]
  });
  return async () => {
    const { token } = await client.getAccessToken();
    if (!token) {
      throw new ConnectionError("GCP_AUTH_FAILED", "Service account did not return an access token.");
    }
    return token;
  };
}

export function sheetEditUrl(fileId: string): string {
  return `https://docs.google.com/spreadsheets/d/${encodeURIComponent(fileId)}/edit`;
}

/** Uploads .xlsx files as Google Sheets that anyone with the link may edit. */
export class GoogleDriveClient implements DriveUploader {
  constructor(
    private readonly tokenSource: AccessTokenSource,
    private readonly http: HttpKernel = new HttpKernel({ maxRetries: 1 })
  ) {}

  async uploadSpreadsheet(bytes: Buffer, name: string): Promise<UploadedSheet> {
    const token = await this.tokenSource();
    const boundary = `sheet_${randomUUID()}`;
    const metadata = { name, mimeType: GOOGLE_SHEET_MIME };
    const body = Buffer.concat([
      Buffer.from(
        `--${boundary}\r\nContent-Type: application/json; charset=UTF-8\r\n\r\n${JSON.stringify(metadata)}\r\n` +
          `--${boundary}\r\nContent-Type: ${XLSX_MIME}\r\n\r\n`,
        "utf8"
      ),
      bytes,
      Buffer.from(`\r\n--${boundary}--`, "utf8")
    ]);

    const uploaded = await this.call("upload", () =>
      this.http.fetchJson(
        UPLOAD_URL,
        {
          method: "POST",
          headers: {
            authorization: `Bearer ${token}`,
            "content-type": `multipart/related; boundary=${boundary}`
          },
          body
        },
        traceRef()
      )
    );
    const parsed = UploadResponseSchema.safeParse(uploaded);
    if (!parsed.success) {
      throw new ConnectionError("SHEET_CREATE_FAILED", "Drive upload response did not include a file id.");
    }
    const fileId = parsed.data.id;

    await this.call("share", () =>
      this.http.fetchJson(
        `${FILES_URL}/${encodeURIComponent(fileId)}/permissions`,
        {
          method: "POST",
          headers: {
            authorization: `Bearer ${token}`,
            "content-type": "application/json"
          },
          body: JSON.stringify({ type: "anyone", role: "writer", allowFileDiscovery: false })
        },
        traceRef()
      )
    );

    return { fileId, url: sheetEditUrl(fileId) };
  }

  private async call(step: string, work: () => Promise<{ payload: unknown }>): Promise<unknown> {
    try {
      return (await work()).payload;
    } catch (error) {
      const status = error instanceof NormalizedHttpError ? error.status : undefined;
      throw new ConnectionError("SHEET_CREATE_FAILED", `Drive ${step} failed: ${errorMessage(error)}`, { status });
    }
  }
}
