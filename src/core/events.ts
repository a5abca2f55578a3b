export type ToolEvent =
  | { type: "tool.initialize"; tool: string }
  | { type: "tool.validate"; tool: string; valid: boolean }
  | { type: "tool.run.start"; tool: string }
  | { type: "tool.run.complete"; tool: string; success: boolean; elapsedMs: number }
  | { type: "tool.run.error"; tool: string; error: unknown; elapsedMs: number };

export type ToolEventHandler = (event: ToolEvent) => void;
