import { OpenAIAdapter } from "../adapters/openai.js";
import type { AgentRequestIR } from "../adapters/ir.js";
import { BaseLlmProvider, type LlmCallOptions, type LlmMessage, type LlmResponse } from "../provider.js";

export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";

const defaultModel = (): string => process.env.OPENAI_MODEL || "gpt-4.1-mini";
const baseUrl = (): string => (process.env.OPENAI_BASE_URL || DEFAULT_OPENAI_BASE_URL).replace(/\/$/, "");

export class OpenAIRefusalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OpenAIRefusalError";
  }
}

const toMetadata = (value: LlmCallOptions["metadata"]): AgentRequestIR["metadata"] => {
  if (!value) return undefined;
  const out: Record<string, string | number | boolean> = {};
  for (const [k, v] of Object.entries(value)) {
    if (typeof v === "string" || typeof v === "number" || typeof v === "boolean") {
      out[k] = v;
    }
  }
  return Object.keys(out).length > 0 ? out : undefined;
};

const toIR = (messages: LlmMessage[], opts?: LlmCallOptions): AgentRequestIR => ({
  messages,
  instructions: opts?.instructions,
  model: opts?.model || defaultModel(),
  temperature: opts?.temperature,
  maxOutputTokens: opts?.maxOutputTokens,
  metadata: toMetadata(opts?.metadata)
});

/**
 * Talks to `POST {base}/responses`. Without OPENAI_API_KEY the request goes out
 * unauthenticated, which local OpenAI-compatible servers accept.
 */
export class OpenAIResponsesProvider extends BaseLlmProvider {
  name = "openai_responses";
  private readonly adapter = new OpenAIAdapter();

  private async request(body: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const key = process.env.OPENAI_API_KEY;
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (key) {
      headers.Authorization = `Bearer ${key}`;
    }

    const response = await fetch(`${baseUrl()}/responses`, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`OpenAI Responses API error ${response.status}: ${text}`);
    }

    const json: unknown = await response.json();
    return json;
  }

  async complete(messages: LlmMessage[], opts?: LlmCallOptions): Promise<LlmResponse> {
    const ir = toIR(messages, opts);
    const raw = await this.request(this.adapter.toRequestBody(ir), opts?.signal);
    const parsed = this.adapter.fromRawResponse(raw);

    if (parsed.text.length === 0 && (parsed.refusals?.length ?? 0) > 0) {
      throw new OpenAIRefusalError(`Model refused to answer: ${parsed.refusals?.join(" | ")}`);
    }

    return {
      text: parsed.text,
      responseId: parsed.responseId,
      raw: parsed.raw,
      usage: parsed.usage
    };
  }
}
