import { createAnthropic } from "@ai-sdk/anthropic";
import { createOpenAI } from "@ai-sdk/openai";
import type { LanguageModel } from "ai";
import type { ServerConfig } from "../config.js";

/** Builds the chat model named by the configuration */
export function createModel(llm: ServerConfig["llm"]): LanguageModel {
  if (llm.provider === "anthropic") {
    return createAnthropic({ apiKey: llm.apiKey })(llm.model);
  }
  return createOpenAI({ apiKey: llm.apiKey })(llm.model);
}
