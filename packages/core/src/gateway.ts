import { v4 as uuidv4 } from "uuid";
import type { Logger } from "pino";
import {
  isConciergeError,
  type ChatReply,
  type ConversationHandler,
  type Gateway,
  type SessionId,
} from "@concierge/types";
import { makeNoopLogger } from "./logger.js";
import { DEGRADED_REPLIES, INTERNAL_ERROR_REPLY } from "./replies.js";

export interface ChatGatewayOptions {
  handler: ConversationHandler;
  logger?: Logger;
}

/**
 * The chat surface: `{ message, sessionId? }` in, `{ response, sessionId }` out.
 *
 * Assigns a fresh session id when the client sends none. Every failure is
 * turned into an apology carrying the unchanged session id; storage failures
 * are flagged with a 500 status hint so the client knows to retry.
 */
export class ChatGateway implements Gateway {
  private readonly handler: ConversationHandler;
  private readonly log: Logger;

  constructor(opts: ChatGatewayOptions) {
    this.handler = opts.handler;
    this.log = (opts.logger ?? makeNoopLogger()).child({ component: "gateway" });
  }

  async handleMessage(message: string, sessionId?: string): Promise<ChatReply> {
    const id = (sessionId !== undefined && sessionId.trim() !== "" ? sessionId : uuidv4()) as SessionId;

    try {
      const result = await this.handler.processMessage(message, id);
      return { response: result.response, sessionId: result.sessionId, status: 200 };
    } catch (err) {
      if (!isConciergeError(err)) {
        this.log.error({ err, sessionId: id }, "chat turn crashed");
        return { response: INTERNAL_ERROR_REPLY, sessionId: id, status: 500 };
      }
      this.log.error({ err, code: err.code, sessionId: id }, "chat turn failed");
      return {
        response: DEGRADED_REPLIES[err.code],
        sessionId: id,
        status: err.code === "STORAGE_FAILURE" ? 500 : 200,
      };
    }
  }
}
