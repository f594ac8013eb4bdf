import { readFileSync } from "node:fs";
import type { ResolvedCredentials, StreamConfig } from "./types.js";

function tryReadJsonFile(path?: string): unknown {
  if (!path) {
    return null;
  }
  try {
    const raw = readFileSync(path, "utf-8");
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function readString(source: unknown, key: string): string {
  if (!source || typeof source !== "object" || !(key in source)) {
    return "";
  }
  const value: unknown = Reflect.get(source, key);
  return typeof value === "string" ? value.trim() : "";
}

/**
 * Inline clientId/clientSecret win, then the legacy appKey/appSecret, then `clientJsonFile`.
 */
export function resolveStreamCredentials(cfg?: Partial<StreamConfig>): ResolvedCredentials | null {
  if (!cfg) {
    return null;
  }
  const fromFile = tryReadJsonFile(cfg.clientJsonFile);

  const clientId = cfg.clientId?.trim() || cfg.appKey?.trim() || readString(fromFile, "clientId");
  const clientSecret = cfg.clientSecret?.trim() || cfg.appSecret?.trim() || readString(fromFile, "clientSecret");

  if (!clientId || !clientSecret) {
    return null;
  }
  return { clientId, clientSecret };
}
