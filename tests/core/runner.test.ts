import { describe, expect, it, vi } from "vitest";
import type { ToolEvent } from "../../src/core/events.js";
import { runTool } from "../../src/core/runner.js";
import { createFakeHost, FakeDatasource } from "../helpers/fake-gis.js";
import { RandomPointsTool } from "../helpers/sample-tools.js";

function clock(...ticks: number[]) {
  const values = [...ticks];
  return () => values.shift() ?? 0;
}

describe("runTool", () => {
  it("initializes, validates and runs a tool", () => {
    const host = createFakeHost();
    const tool = new RandomPointsTool(() => new FakeDatasource());
    tool.requireParameter("output").value.name = "points.shp";
    const events: ToolEvent[] = [];

    const result = runTool(tool, host.context, { onEvent: (event) => events.push(event), now: clock(10, 35) });

    expect(result).toEqual({ tool: "Random points", status: "completed", elapsedMs: 25 });
    expect(tool.runs).toBe(1);
    expect(events).toEqual([
      { type: "tool.initialize", tool: "Random points" },
      { type: "tool.validate", tool: "Random points", valid: true },
      { type: "tool.run.start", tool: "Random points" },
      { type: "tool.run.complete", tool: "Random points", success: true, elapsedMs: 25 },
    ]);
  });

  it("does not run a tool that fails validation", () => {
    const host = createFakeHost();
    const tool = new RandomPointsTool(() => new FakeDatasource());

    const result = runTool(tool, host.context);

    expect(result.status).toBe("invalid");
    expect(tool.runs).toBe(0);
    expect(host.messages.messages).toEqual(["Output name is not specified."]);
  });

  it("reports unsuccessful runs as failed", () => {
    const host = createFakeHost({ "points.shp": "original" });
    const tool = new RandomPointsTool(() => new FakeDatasource());
    tool.requireParameter("output").value.name = "points.shp";

    const result = runTool(tool, host.context, { now: clock(0, 4) });

    expect(result).toEqual({ tool: "Random points", status: "failed", elapsedMs: 4 });
    expect(host.logger.entries.map((entry) => entry.message)).toEqual([
      "Output was not written (target already exists): points.shp",
      "Tool Random points did not complete successfully",
    ]);
  });

  it("emits an error event and rethrows when the tool throws", () => {
    const host = createFakeHost();
    const failure = new Error("generator crashed");
    const tool = new RandomPointsTool(() => {
      throw failure;
    });
    tool.requireParameter("output").value.name = "points.shp";
    const onEvent = vi.fn();

    expect(() => runTool(tool, host.context, { onEvent, now: clock(1, 3) })).toThrow("generator crashed");
    expect(onEvent).toHaveBeenLastCalledWith({ type: "tool.run.error", tool: "Random points", error: failure, elapsedMs: 2 });
  });

  it("keeps running when an event handler throws", () => {
    const host = createFakeHost();
    const tool = new RandomPointsTool(() => new FakeDatasource());
    tool.requireParameter("output").value.name = "points.shp";

    const result = runTool(tool, host.context, {
      onEvent: () => {
        throw new Error("observer down");
      },
    });

    expect(result.status).toBe("completed");
    expect(host.logger.entries.filter((entry) => entry.message === "Tool event handler threw")).toHaveLength(4);
  });
});
