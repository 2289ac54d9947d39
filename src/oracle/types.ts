export type ConfigFileId = "properties" | "build_script";

export type FixProposal =
  | { action: "append"; targetFile: ConfigFileId; content: string; classification: string }
  | {
      action: "replace_match";
      targetFile: ConfigFileId;
      matchPattern: string;
      /** Extra RegExp flags (`i`, `s`, `u`) on top of the implied `m`. */
      matchFlags?: string;
      content: string;
      classification: string;
    }
  | { action: "no_fix"; targetFile: "none"; content: ""; classification?: string }
  | { action: "invalid"; targetFile: "none"; content: ""; reason: string };

export type ActionableProposal = Extract<FixProposal, { action: "append" | "replace_match" }>;

export type ConfigFileSnapshot = {
  fileName: string;
  content: string;
};

export type OracleRequest = {
  diagnostic: string;
  files: Record<ConfigFileId, ConfigFileSnapshot>;
  attempt: number;
  maxAttempts: number;
};

/**
 * Stateless and possibly nondeterministic. Implementations must honour
 * `signal` so a timed-out call stops consuming the endpoint.
 */
export interface FixOracle {
  readonly name: string;
  propose(request: OracleRequest, opts?: { signal?: AbortSignal }): Promise<string>;
}

export const isActionable = (proposal: FixProposal): proposal is ActionableProposal =>
  proposal.action === "append" || proposal.action === "replace_match";
