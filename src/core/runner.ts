import { performance } from "node:perf_hooks";
import type { ToolEvent, ToolEventHandler } from "./events.js";
import { defaultLogger, type Logger } from "./logger.js";
import type { ProcessingTool } from "./tool.js";
import type { ToolContext } from "../types.js";

export interface RunToolOptions {
  onEvent?: ToolEventHandler;
  logger?: Logger;
  now?: () => number;
}

export type ToolRunStatus = "completed" | "invalid" | "failed";

export interface ToolRunResult {
  tool: string;
  status: ToolRunStatus;
  elapsedMs: number;
}

/**
 * Drives a tool through initialize, validate and run. Validation failures
 * and unsuccessful runs are reported in the result; errors thrown by the tool
 * propagate after a `tool.run.error` event.
 */
export function runTool(tool: ProcessingTool, context: ToolContext, options: RunToolOptions = {}): ToolRunResult {
  const logger = options.logger ?? context.logger ?? defaultLogger;
  const now = options.now ?? (() => performance.now());

  const emit = (event: ToolEvent): void => {
    if (!options.onEvent) return;
    try {
      options.onEvent(event);
    } catch (error) {
      logger.error("Tool event handler threw", { type: event.type, error: String(error) });
    }
  };

  tool.initialize(context);
  emit({ type: "tool.initialize", tool: tool.name });

  const valid = tool.validate();
  emit({ type: "tool.validate", tool: tool.name, valid });
  if (!valid) {
    return { tool: tool.name, status: "invalid", elapsedMs: 0 };
  }

  emit({ type: "tool.run.start", tool: tool.name });
  const startedAt = now();
  let success: boolean;
  try {
    success = tool.run();
  } catch (error) {
    emit({ type: "tool.run.error", tool: tool.name, error, elapsedMs: now() - startedAt });
    throw error;
  }

  const elapsedMs = now() - startedAt;
  emit({ type: "tool.run.complete", tool: tool.name, success, elapsedMs });
  if (!success) {
    logger.warn(`Tool ${tool.name} did not complete successfully`);
  }
  return { tool: tool.name, status: success ? "completed" : "failed", elapsedMs };
}
