export type AgentMessageIR = {
  role: "system" | "developer" | "user" | "assistant";
  content: string;
};

export type AgentRequestIR = {
  messages: AgentMessageIR[];
  instructions?: string;
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  metadata?: Record<string, string | number | boolean>;
};

export type AgentResponseIR = {
  text: string;
  responseId?: string;
  usage?: unknown;
  refusals?: string[];
  raw: unknown;
};
