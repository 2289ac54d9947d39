import type { LlmProvider } from "./provider.js";
import { OpenAIResponsesProvider } from "./providers/openai_responses.js";
import { loadEnvFile } from "../config/loadEnv.js";

export const getProviderFromEnv = (): LlmProvider => {
  loadEnvFile();
  if (process.env.OPENAI_API_KEY || process.env.OPENAI_BASE_URL) {
    return new OpenAIResponsesProvider();
  }
  throw new Error(
    "Missing LLM endpoint. Set OPENAI_API_KEY (optionally OPENAI_MODEL), or OPENAI_BASE_URL for a local OpenAI-compatible server."
  );
};

export type { LlmCallOptions, LlmMessage, LlmProvider, LlmResponse } from "./provider.js";
