import type { RequestHandler } from "express";
import type { AppConfig } from "./config/appConfig";
import type { IStorage } from "./storage";
import { createAuthenticate } from "./middleware/auth";
import { createCredentialService, type CredentialService } from "./services/credentialService";
import { createTokenService, type TokenService } from "./services/tokenService";
import { AssistantClient, type ChatCompletionsApi } from "./services/assistantClient";
import { UserService } from "./services/userService";
import { IngestionService } from "./services/ingestionService";
import { GoalService } from "./services/goalService";
import { ChatService } from "./services/chatService";

/** Everything a request handler needs, built once at startup and passed down explicitly. */
export interface AppContext {
  config: AppConfig;
  storage: IStorage;
  credentials: CredentialService;
  tokens: TokenService;
  authenticate: RequestHandler;
  users: UserService;
  ingestion: IngestionService;
  goals: GoalService;
  chat: ChatService;
}

export interface ContextOverrides {
  /** Clock for token issue/verify, in epoch milliseconds. */
  now?: () => number;
  assistantApi?: ChatCompletionsApi;
}

export function createAppContext(config: AppConfig, storage: IStorage, overrides: ContextOverrides = {}): AppContext {
  const credentials = createCredentialService({ rounds: config.auth.bcryptRounds });
  const tokens = createTokenService({
    secretKey: config.auth.secretKey,
    ttlSeconds: config.auth.accessTokenTtlSeconds,
    issuer: config.auth.issuer,
    audience: config.auth.audience,
    now: overrides.now,
  });
  const assistant = new AssistantClient({
    ...config.assistant,
    api: overrides.assistantApi,
  });

  return {
    config,
    storage,
    credentials,
    tokens,
    authenticate: createAuthenticate({ tokens, storage }),
    users: new UserService(storage, credentials, tokens),
    ingestion: new IngestionService(storage),
    goals: new GoalService(storage),
    chat: new ChatService(storage, assistant),
  };
}
