import type { StreamConfigSchema, z } from "./config-schema.js";

export type StreamConfig = z.output<typeof StreamConfigSchema>;

export type ResolvedCredentials = {
  clientId: string;
  clientSecret: string;
};

export type ProbeResult = {
  ok: boolean;
  error?: string;
  clientId?: string;
};

// ============ OpenAPI Types ============

export type UploadType = "image" | "voice" | "video" | "file";

export type SendMessageTarget =
  | { kind: "group"; openConversationId: string }
  | { kind: "batch"; userIds: string[] };

export type SendMessageResult = {
  processQueryKey: string;
};
