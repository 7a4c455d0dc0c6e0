import type { AppConfig } from "@/config";
import Snoowrap = require("snoowrap");

export function createRedditClient(config: AppConfig["reddit"]): Snoowrap {
  const redditClient = new Snoowrap({
    userAgent: config.userAgent,
    clientId: config.clientId,
    clientSecret: config.clientSecret,
    username: config.userName,
    password: config.password,
  });

  redditClient.config({
    requestDelay: 50,
    requestTimeout: config.requestTimeoutMs,
    continueAfterRatelimitError: false,
  });

  return redditClient;
}
