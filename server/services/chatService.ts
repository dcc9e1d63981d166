import type { ChatConversation, ChatMessage, ChatRole } from "@shared/schema";
import type { IStorage } from "../storage";
import { NotFoundError } from "../errors";
import { generateRid } from "../utils/rid";
import { logger } from "../logger";
import type { AssistantClient, AssistantMessage } from "./assistantClient";

export const SYSTEM_PROMPT =
  "You are a helpful health and fitness assistant. " +
  "Be friendly and professional, and keep answers focused on the user's question. " +
  "You do not give medical diagnoses; suggest consulting a professional when appropriate.";

/** Number of stored messages sent to the provider as context. */
export const HISTORY_LIMIT = 20;

const TITLE_LENGTH = 60;

export interface ChatReply {
  conversationId: string;
  response: string;
}

function titleFrom(message: string): string {
  const singleLine = message.replace(/\s+/g, " ").trim();
  return singleLine.length > TITLE_LENGTH
    ? `${singleLine.slice(0, TITLE_LENGTH - 3)}...`
    : singleLine;
}

export class ChatService {
  constructor(
    private readonly storage: IStorage,
    private readonly assistant: AssistantClient,
  ) {}

  async reply(userId: string, message: string, conversationId?: string): Promise<ChatReply> {
    const conversation = await this.resolveConversation(userId, message, conversationId);

    // Stored before the provider call so the user's message survives a provider failure.
    await this.addMessage(conversation.id, userId, "user", message);

    const history = await this.storage.listChatMessages(conversation.id, HISTORY_LIMIT);
    const prompt: AssistantMessage[] = [
      { role: "system", content: SYSTEM_PROMPT },
      ...history.map((entry) => ({ role: entry.role, content: entry.content })),
    ];

    const response = await this.assistant.complete(prompt);

    await this.addMessage(conversation.id, userId, "assistant", response);
    await this.storage.touchConversation(conversation.id);

    logger.info('[Chat] Reply generated', {
      userId,
      conversationId: conversation.id,
      historySize: history.length,
    });

    return { conversationId: conversation.id, response };
  }

  async listConversations(userId: string): Promise<ChatConversation[]> {
    return await this.storage.listConversations(userId);
  }

  async listMessages(userId: string, conversationId: string): Promise<ChatMessage[]> {
    const conversation = await this.storage.getConversation(userId, conversationId);
    if (!conversation) {
      throw new NotFoundError("Conversation not found");
    }
    return await this.storage.listChatMessages(conversation.id);
  }

  private async resolveConversation(userId: string, message: string, conversationId?: string): Promise<ChatConversation> {
    if (conversationId) {
      const owned = await this.storage.getConversation(userId, conversationId);
      if (!owned) {
        throw new NotFoundError("Conversation not found");
      }
      return owned;
    }

    const latest = await this.storage.getLatestActiveConversation(userId);
    if (latest) {
      return latest;
    }

    return await this.storage.createConversation({
      id: generateRid("conversation"),
      userId,
      title: titleFrom(message),
      status: "active",
    });
  }

  private async addMessage(conversationId: string, userId: string, role: ChatRole, content: string): Promise<ChatMessage> {
    return await this.storage.addChatMessage({
      id: generateRid("message"),
      conversationId,
      userId,
      role,
      content,
    });
  }
}
