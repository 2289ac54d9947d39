export type AuditEvent = {
  kind: "run" | "llm_call" | "apply" | "session";
  data: unknown;
  ts: number;
};

export type AuditLog = {
  projectPath: string;
  startedAt: string;
  events: AuditEvent[];
};
