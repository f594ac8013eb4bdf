/**
 * Class-style handlers on top of the function listeners the client takes.
 */

import axios, { type AxiosInstance } from "axios";
import { errorMessage } from "../errors.js";
import type { DownstreamFrame, EventAck, EventData } from "./frames.js";
import type { RobotMessage } from "./messages.js";
import type { EventListener, TopicListener } from "./registry.js";

/**
 * Base handler for event messages
 */
export abstract class EventHandler {
  abstract process(event: EventData): Promise<EventAck>;

  toListener(): EventListener {
    return (event) => this.process(event);
  }
}

export interface ChatbotReplyOptions {
  atUserIds?: string[];
  isAtAll?: boolean;
}

export type ChatbotReplyResult = { ok: true } | { ok: false; error: string };

/**
 * Chatbot handler: receives robot messages and answers through the conversation's session webhook.
 */
export abstract class ChatbotHandler {
  constructor(protected readonly http: AxiosInstance = axios.create({ timeout: 30_000 })) {}

  abstract process(message: RobotMessage, frame: DownstreamFrame): Promise<void>;

  toListener(): TopicListener<RobotMessage> {
    return (message, frame) => this.process(message, frame);
  }

  async replyText(message: RobotMessage, content: string, options?: ChatbotReplyOptions): Promise<ChatbotReplyResult> {
    return this.reply(message, { msgtype: "text", text: { content } }, options);
  }

  async replyMarkdown(
    message: RobotMessage,
    title: string,
    text: string,
    options?: ChatbotReplyOptions,
  ): Promise<ChatbotReplyResult> {
    return this.reply(message, { msgtype: "markdown", markdown: { title, text } }, options);
  }

  async replyCard(
    message: RobotMessage,
    title: string,
    text: string,
    buttons: Array<{ title: string; actionURL: string }> = [],
  ): Promise<ChatbotReplyResult> {
    const actionCard: Record<string, unknown> = { title, text, btnOrientation: "0" };
    if (buttons.length > 0) {
      actionCard.btns = buttons;
    }
    return this.reply(message, { msgtype: "actionCard", actionCard });
  }

  private async reply(
    message: RobotMessage,
    body: Record<string, unknown>,
    options?: ChatbotReplyOptions,
  ): Promise<ChatbotReplyResult> {
    if (!message.sessionWebhook) {
      return { ok: false, error: "message has no session webhook" };
    }
    if (Date.now() > message.sessionWebhookExpiredTime) {
      return { ok: false, error: "session webhook expired" };
    }

    if (options?.atUserIds?.length || options?.isAtAll) {
      body.at = { atUserIds: options.atUserIds ?? [], isAtAll: options.isAtAll ?? false };
    }

    try {
      const resp = await this.http.post(message.sessionWebhook, body, {
        headers: { "Content-Type": "application/json" },
        validateStatus: () => true,
      });
      if (resp.status < 200 || resp.status >= 300) {
        return { ok: false, error: `session webhook http error: ${resp.status}` };
      }
      return { ok: true };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }
}
