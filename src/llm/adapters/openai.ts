import { parseResponsesOutput } from "../responses/parse.js";
import type { ResponsesAdapter } from "./base.js";
import type { AgentRequestIR, AgentResponseIR } from "./ir.js";

type ResponseInputItem = {
  type: "message";
  role: "system" | "developer" | "user" | "assistant";
  content: Array<{ type: "input_text"; text: string }>;
};

const toInputItems = (ir: AgentRequestIR): ResponseInputItem[] =>
  ir.messages.map((message) => ({
    type: "message",
    role: message.role,
    content: [{ type: "input_text", text: message.content }]
  }));

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export class OpenAIAdapter implements ResponsesAdapter {
  readonly provider = "openai" as const;

  readonly caps = {
    supportsInstructions: true,
    supportsTemperature: true
  };

  toRequestBody(ir: AgentRequestIR): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: ir.model,
      input: toInputItems(ir)
    };

    if (this.caps.supportsTemperature && typeof ir.temperature === "number") body.temperature = ir.temperature;
    if (typeof ir.maxOutputTokens === "number") body.max_output_tokens = ir.maxOutputTokens;
    if (this.caps.supportsInstructions && typeof ir.instructions === "string") body.instructions = ir.instructions;
    if (ir.metadata) body.metadata = ir.metadata;

    return body;
  }

  fromRawResponse(raw: unknown): AgentResponseIR {
    const parsed = parseResponsesOutput(raw);
    const rawObj = isRecord(raw) ? raw : {};
    const fallback = typeof rawObj.output_text === "string" ? rawObj.output_text : "";

    return {
      text: parsed.text || fallback,
      responseId: typeof rawObj.id === "string" ? rawObj.id : undefined,
      usage: rawObj.usage,
      refusals: parsed.refusals,
      raw
    };
  }
}
