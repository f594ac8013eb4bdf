import fs from "node:fs";
import path from "node:path";
import type { Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { z } from "zod";
import { OpenApiError } from "./errors.js";
import { parseBody, type OpenApiClient } from "./openapi.js";
import type { UploadType } from "./types.js";

export const DOWNLOAD_PATH = "/v1.0/robot/messageFiles/download";

/** Maximum file size for upload (20MB) */
export const MAX_FILE_SIZE = 20 * 1024 * 1024;

const UploadResultSchema = z.object({
  errcode: z.number(),
  errmsg: z.string().default(""),
  media_id: z.string().default(""),
});

const DownloadUrlSchema = z.object({ downloadUrl: z.string().min(1) });

/**
 * Upload a local file through the oapi media endpoint and return its media id, usable in
 * `sampleFile`, `sampleAudio` and `sampleVideo` messages.
 */
export async function uploadMedia(api: OpenApiClient, filePath: string, type: UploadType): Promise<string> {
  const stats = await fs.promises.stat(filePath);
  if (stats.size > MAX_FILE_SIZE) {
    throw new OpenApiError(`file too large (${stats.size} bytes > ${MAX_FILE_SIZE}): ${filePath}`);
  }

  const fileName = path.basename(filePath) || "<unknown>";
  const formData = new FormData();
  formData.append("media", new Blob([await fs.promises.readFile(filePath)]), fileName);
  formData.append("type", type);

  const token = await api.accessToken();
  api.log?.info?.(`[DingTalk][Media] Uploading ${type}: ${filePath}`);
  const resp = await api.request(`${api.oapiUrl}/media/upload`, {
    method: "POST",
    params: { access_token: token, type },
    data: formData,
  });

  const result = parseBody(resp.data, UploadResultSchema, "media upload");
  if (result.errcode !== 0) {
    throw new OpenApiError(`upload error: ${result.errcode} - ${result.errmsg}`);
  }
  if (!result.media_id) {
    throw new OpenApiError("upload returned no media_id");
  }
  return result.media_id;
}

/**
 * Resolve a message's download code to a temporary URL without fetching the file.
 */
export async function getDownloadUrl(api: OpenApiClient, downloadCode: string): Promise<string> {
  const result = await api.post(DOWNLOAD_PATH, { downloadCode, robotCode: api.robotCode }, DownloadUrlSchema);
  return result.downloadUrl;
}

/**
 * Stream the file behind `downloadCode` into `destination` (a writable or a file path).
 */
export async function downloadFile(
  api: OpenApiClient,
  downloadCode: string,
  destination: Writable | string,
): Promise<void> {
  const url = await getDownloadUrl(api, downloadCode);
  const resp = await api.request(url, { method: "GET", responseType: "stream" });
  const body = resp.data;
  if (!isReadable(body)) {
    throw new OpenApiError(`download ${downloadCode}: response is not a stream`);
  }
  const sink = typeof destination === "string" ? fs.createWriteStream(destination) : destination;
  await pipeline(body, sink);
}

function isReadable(value: unknown): value is NodeJS.ReadableStream {
  return (
    typeof value === "object" &&
    value !== null &&
    "pipe" in value &&
    typeof value.pipe === "function" &&
    "on" in value &&
    typeof value.on === "function"
  );
}
