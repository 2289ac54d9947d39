import { BaseLlmProvider, type LlmCallOptions, type LlmMessage, type LlmResponse } from "../../src/llm/provider.js";

export class MockProvider extends BaseLlmProvider {
  name = "mock";
  readonly calls: Array<{ messages: LlmMessage[]; opts?: LlmCallOptions }> = [];
  private readonly outputs: string[];

  constructor(outputs: string[]) {
    super();
    this.outputs = [...outputs];
  }

  async complete(messages: LlmMessage[], opts?: LlmCallOptions): Promise<LlmResponse> {
    this.calls.push({ messages, opts });
    const text = this.outputs.shift();
    if (text === undefined) {
      throw new Error("MockProvider outputs exhausted");
    }
    return {
      text,
      raw: { output: [{ type: "message", role: "assistant", content: [{ type: "output_text", text }] }] }
    };
  }
}
