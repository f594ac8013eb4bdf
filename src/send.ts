/**
 * Proactive robot messages.
 *
 * - POST /v1.0/robot/oToMessages/batchSend  (one or more users)
 * - POST /v1.0/robot/groupMessages/send     (group conversation)
 *
 * Message shapes: https://open.dingtalk.com/document/orgapp/types-of-messages-sent-by-robots
 */

import { z } from "zod";
import type { OpenApiClient } from "./openapi.js";
import type { SendMessageResult, SendMessageTarget } from "./types.js";

export const BATCH_SEND_PATH = "/v1.0/robot/oToMessages/batchSend";
export const GROUP_SEND_PATH = "/v1.0/robot/groupMessages/send";

export type ActionButton = { title: string; url: string };

export type MessageTemplate =
  | { msgKey: "sampleText"; content: string }
  | { msgKey: "sampleMarkdown"; title: string; text: string }
  | { msgKey: "sampleImageMsg"; photoUrl: string }
  | { msgKey: "sampleLink"; text: string; title: string; picUrl: string; messageUrl: string }
  | { msgKey: "sampleActionCard"; title: string; text: string; singleTitle: string; singleUrl: string }
  | { msgKey: "sampleActionCard2"; title: string; text: string; actions: [ActionButton, ActionButton] }
  | {
      msgKey: "sampleActionCard3";
      title: string;
      text: string;
      actions: [ActionButton, ActionButton, ActionButton];
    }
  | {
      msgKey: "sampleActionCard4";
      title: string;
      text: string;
      actions: [ActionButton, ActionButton, ActionButton, ActionButton];
    }
  | {
      msgKey: "sampleActionCard5";
      title: string;
      text: string;
      actions: [ActionButton, ActionButton, ActionButton, ActionButton, ActionButton];
    }
  | { msgKey: "sampleActionCard6"; title: string; text: string; buttons: [ActionButton, ActionButton] }
  | { msgKey: "sampleAudio"; mediaId: string; duration: string }
  | { msgKey: "sampleFile"; mediaId: string; fileName: string; fileType: string }
  | { msgKey: "sampleVideo"; duration: string; videoMediaId: string; videoType: string; picMediaId: string };

export type MessageKey = MessageTemplate["msgKey"];

function actionParams(actions: ActionButton[]): Record<string, string> {
  const params: Record<string, string> = {};
  actions.forEach((action, i) => {
    params[`actionTitle${i + 1}`] = action.title;
    params[`actionURL${i + 1}`] = action.url;
  });
  return params;
}

/**
 * `msgParam` object in the vendor's field casing.
 */
export function templateParams(template: MessageTemplate): Record<string, string> {
  switch (template.msgKey) {
    case "sampleText":
      return { content: template.content };
    case "sampleMarkdown":
      return { title: template.title, text: template.text };
    case "sampleImageMsg":
      return { photoURL: template.photoUrl };
    case "sampleLink":
      return {
        text: template.text,
        title: template.title,
        picUrl: template.picUrl,
        messageUrl: template.messageUrl,
      };
    case "sampleActionCard":
      return {
        title: template.title,
        text: template.text,
        singleTitle: template.singleTitle,
        singleURL: template.singleUrl,
      };
    case "sampleActionCard2":
    case "sampleActionCard3":
    case "sampleActionCard4":
    case "sampleActionCard5":
      return { title: template.title, text: template.text, ...actionParams(template.actions) };
    case "sampleActionCard6": {
      const [first, second] = template.buttons;
      return {
        title: template.title,
        text: template.text,
        buttonTitle1: first.title,
        buttonUrl1: first.url,
        buttonTitle2: second.title,
        buttonUrl2: second.url,
      };
    }
    case "sampleAudio":
      return { mediaId: template.mediaId, duration: template.duration };
    case "sampleFile":
      return { mediaId: template.mediaId, fileName: template.fileName, fileType: template.fileType };
    case "sampleVideo":
      return {
        duration: template.duration,
        videoMediaId: template.videoMediaId,
        videoType: template.videoType,
        picMediaId: template.picMediaId,
      };
  }
}

export function toMsgParam(template: MessageTemplate): { msgKey: MessageKey; msgParam: string } {
  return { msgKey: template.msgKey, msgParam: JSON.stringify(templateParams(template)) };
}

const SendResponseSchema = z.object({ processQueryKey: z.string().default("") }).passthrough();

/**
 * A robot message bound to its target. Build with {@link RobotSendMessage.group},
 * {@link RobotSendMessage.batch} or {@link RobotSendMessage.single}, then `send()`.
 */
export class RobotSendMessage {
  private constructor(
    private readonly api: OpenApiClient,
    readonly target: SendMessageTarget,
    readonly template: MessageTemplate,
  ) {}

  static group(api: OpenApiClient, openConversationId: string, template: MessageTemplate): RobotSendMessage {
    return new RobotSendMessage(api, { kind: "group", openConversationId }, template);
  }

  static batch(api: OpenApiClient, userIds: string[], template: MessageTemplate): RobotSendMessage {
    if (userIds.length === 0) {
      throw new RangeError("batch message needs at least one user id");
    }
    return new RobotSendMessage(api, { kind: "batch", userIds: [...userIds] }, template);
  }

  static single(api: OpenApiClient, userId: string, template: MessageTemplate): RobotSendMessage {
    return RobotSendMessage.batch(api, [userId], template);
  }

  get path(): string {
    return this.target.kind === "group" ? GROUP_SEND_PATH : BATCH_SEND_PATH;
  }

  toJSON(): Record<string, unknown> {
    const { msgKey, msgParam } = toMsgParam(this.template);
    const target =
      this.target.kind === "group"
        ? { openConversationId: this.target.openConversationId }
        : { userIds: this.target.userIds };
    return { robotCode: this.api.robotCode, ...target, msgKey, msgParam };
  }

  async send(): Promise<SendMessageResult> {
    const body = this.toJSON();
    const target = this.target.kind === "group" ? `group=${this.target.openConversationId}` : `users=${this.target.userIds.join(",")}`;
    this.api.log?.info?.(`[DingTalk][OpenAPI] send ${this.template.msgKey} to ${target}`);
    const data = await this.api.post(this.path, body, SendResponseSchema);
    return { processQueryKey: data.processQueryKey };
  }
}
