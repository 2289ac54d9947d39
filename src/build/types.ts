export type BuildResult = {
  success: boolean;
  rawOutput: string;
  exitCode: number;
  timedOut: boolean;
  durationMs: number;
};

export type BuildEntry = {
  command: string;
  args: string[];
  source: "wrapper" | "global";
};

export type DiagnosticExcerpt = {
  text: string;
  matchedPatterns: string[];
  fallback: boolean;
};
