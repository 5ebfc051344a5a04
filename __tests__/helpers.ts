/**
 * Shared fixtures and fakes for tests
 */

import { Article } from "../src/lib/model";
import { CompletionClient, CompletionRequest } from "../src/lib/llm/client";

export const wheatArticle: Article = {
  title: "Wheat prices rise 15%",
  summary: "",
  source: "Fastmarkets",
  link: "https://example.com/wheat",
};

export const droneArticle: Article = {
  title: "New drone technology launched",
  summary: "",
  source: "APK-Inform",
  link: "https://example.com/drone",
};

export const tariffArticle: Article = {
  title: "Export tariffs increased",
  summary: "",
  source: "Margin.kz",
  link: "https://example.com/tariffs",
};

export const footballArticle: Article = {
  title: "Football results",
  summary: "Local team wins the cup",
  source: "Sports Daily",
  link: "https://example.com/football",
};

/**
 * Completion client that replays canned responses (or errors) and records requests
 */
export class FakeCompletionClient implements CompletionClient {
  readonly model = "test-model";
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly respond: (request: CompletionRequest) => string | Error) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const response = this.respond(request);
    if (response instanceof Error) {
      throw response;
    }
    return response;
  }
}
