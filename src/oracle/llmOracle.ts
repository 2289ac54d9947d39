import { DEFAULT_ORACLE_SETTINGS, type OracleSettings } from "../config/repairConfig.js";
import type { LlmMessage, LlmProvider } from "../llm/provider.js";
import { ORACLE_SYSTEM_PROMPT, buildOracleUserPrompt } from "./prompts.js";
import type { FixOracle, OracleRequest } from "./types.js";

export class LlmFixOracle implements FixOracle {
  readonly name: string;
  private readonly provider: LlmProvider;
  private readonly settings: OracleSettings;

  constructor(provider: LlmProvider, settings: Partial<OracleSettings> = {}) {
    this.provider = provider;
    this.settings = { ...DEFAULT_ORACLE_SETTINGS, ...settings };
    this.name = `llm:${provider.name}`;
  }

  buildMessages(request: OracleRequest): LlmMessage[] {
    return [
      { role: "system", content: ORACLE_SYSTEM_PROMPT },
      { role: "user", content: buildOracleUserPrompt(request, this.settings.maxFileChars) }
    ];
  }

  async propose(request: OracleRequest, opts: { signal?: AbortSignal } = {}): Promise<string> {
    return this.provider.completeText(this.buildMessages(request), {
      temperature: this.settings.temperature,
      maxOutputTokens: this.settings.maxOutputTokens,
      metadata: { attempt: request.attempt },
      signal: opts.signal
    });
  }
}
