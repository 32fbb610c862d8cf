import { ApiClient } from "./apiClient.js";
import type { AppConfig } from "./config.js";
import { Coordinator } from "./coordinator.js";
import { HistoryCache } from "./historyCache.js";
import { RateLimiter } from "./rateLimiter.js";
import { FileHistoryBackend } from "./storage.js";
import { TokenManager } from "./tokenManager.js";

export type Runtime = {
  tokens: TokenManager;
  limiter: RateLimiter;
  api: ApiClient;
  cache: HistoryCache;
  coordinator: Coordinator;
};

/** Wires one credential set: a single token manager and rate limiter shared by everything. */
export function createRuntime(config: AppConfig): Runtime {
  const tokens = new TokenManager(config.credentials);
  const limiter = new RateLimiter();
  const api = new ApiClient(config.credentials.apiHost, tokens, limiter);
  const cache = new HistoryCache(new FileHistoryBackend(config.dataDir));
  const coordinator = new Coordinator({ api, tokens, cache }, config.poller);
  return { tokens, limiter, api, cache, coordinator };
}
