/**
 * Payload schemas for CALLBACK topics.
 *
 * Field reference: https://open.dingtalk.com/document/orgapp/receive-message
 */

import { z } from "zod";

/** Robot message callback. */
export const TOPIC_ROBOT = "/v1.0/im/bot/messages/get" as const;
/** Interactive card callback. */
export const TOPIC_CARD = "/v1.0/card/instances/callback" as const;

const numeric = z.union([z.number(), z.string()]).pipe(z.coerce.number());

export const TextContentSchema = z.object({ content: z.string() });

export const FileContentSchema = z.object({
  downloadCode: z.string(),
  fileName: z.string(),
});

export const AudioContentSchema = z.object({
  duration: numeric,
  downloadCode: z.string(),
  recognition: z.string(),
});

export const VideoContentSchema = z.object({
  duration: numeric,
  downloadCode: z.string(),
  videoType: z.string(),
});

export const PictureContentSchema = z.object({
  downloadCode: z.string(),
  pictureDownloadCode: z.string().default(""),
});

export const RichTextItemSchema = z.union([
  z.object({ text: z.string() }),
  z.object({ downloadCode: z.string(), type: z.string() }),
]);

export const RichTextContentSchema = z.object({ richText: z.array(RichTextItemSchema) });

export const UnknownContentSchema = z.object({ unknownMsgType: z.string() });

// most specific shapes first: zod strips unknown keys, so a picture shape would swallow audio
export const MessageContentSchema = z.union([
  TextContentSchema,
  FileContentSchema,
  AudioContentSchema,
  VideoContentSchema,
  PictureContentSchema,
  RichTextContentSchema,
  UnknownContentSchema,
]);

export const AtUserSchema = z.object({
  dingtalkId: z.string(),
  staffId: z.string().default(""),
});

const RobotMessageObjectSchema = z.object({
  msgId: z.string(),
  msgtype: z.string(),
  content: MessageContentSchema,
  conversationId: z.string(),
  /** "1" single chat, "2" group chat */
  conversationType: z.union([z.string(), z.number()]).transform((v) => String(v)),
  conversationTitle: z.string().default(""),
  atUsers: z.array(AtUserSchema).default([]),
  isInAtList: z.boolean().default(false),
  chatbotCorpId: z.string().default(""),
  chatbotUserId: z.string(),
  senderId: z.string(),
  senderNick: z.string(),
  senderCorpId: z.string().default(""),
  senderStaffId: z.string().default(""),
  sessionWebhookExpiredTime: numeric,
  sessionWebhook: z.string(),
  isAdmin: z.boolean().default(false),
  createAt: numeric,
  robotCode: z.string().optional(),
});

/**
 * Text messages carry their body under `text`, every other type under `content`.
 */
export const RobotMessageSchema = z.preprocess((raw) => {
  if (raw && typeof raw === "object" && !("content" in raw) && "text" in raw) {
    return { ...raw, content: raw.text };
  }
  return raw;
}, RobotMessageObjectSchema);

export type MessageContent = z.infer<typeof MessageContentSchema>;
export type RobotMessage = z.infer<typeof RobotMessageSchema>;

export const CardCallbackSchema = z
  .object({
    outTrackId: z.string(),
    userId: z.string().default(""),
    corpId: z.string().default(""),
    type: z.string().default(""),
    /** JSON text with the card's action payload. */
    content: z.string().default(""),
  })
  .passthrough();

export type CardCallback = z.infer<typeof CardCallbackSchema>;

export function isTextContent(content: MessageContent): content is z.infer<typeof TextContentSchema> {
  return "content" in content;
}
