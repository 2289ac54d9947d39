import type { AgentRequestIR, AgentResponseIR } from "./ir.js";

export type AdapterCapabilities = {
  supportsInstructions: boolean;
  supportsTemperature: boolean;
};

export interface ResponsesAdapter {
  readonly provider: "openai";
  readonly caps: AdapterCapabilities;
  toRequestBody(ir: AgentRequestIR): Record<string, unknown>;
  fromRawResponse(raw: unknown): AgentResponseIR;
}
