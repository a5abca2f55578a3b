import { loadToolboxConfig, type ToolboxConfig } from "./config.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { GisToolOptions, ProcessingTool } from "./tool.js";
import { NodeFsDatasourceStore } from "../output/node-fs-store.js";
import type { DatasourceStore, PluginIdentity, ToolContext } from "../types.js";

export type HostServices = Pick<ToolContext, "layers" | "layerService" | "messageService">;

export type ToolFactory = (options: GisToolOptions) => ProcessingTool;

export interface ToolEntry {
  key: string;
  plugin?: PluginIdentity;
  create: ToolFactory;
}

/**
 * Registry of tool factories sharing one configuration. Tools it creates get
 * the configured logger and output defaults.
 */
export class Toolbox {
  readonly config: ToolboxConfig;
  readonly logger: Logger;
  readonly store: DatasourceStore;
  private readonly list: ToolEntry[] = [];

  constructor(config: ToolboxConfig, options: { logger?: Logger; store?: DatasourceStore } = {}) {
    this.config = config;
    this.logger = options.logger ?? createConsoleLogger({ level: config.logLevel });
    this.store =
      options.store ?? new NodeFsDatasourceStore({ sidecarExtensions: config.sidecarExtensions, logger: this.logger });
  }

  add(entry: ToolEntry): void {
    if (entry.key.trim() === "") {
      throw new Error("Tool key cannot be empty");
    }
    if (this.list.some((existing) => existing.key === entry.key)) {
      throw new Error(`Tool ${entry.key} is already registered`);
    }
    this.list.push(entry);
  }

  get entries(): readonly ToolEntry[] {
    return this.list;
  }

  create(key: string): ProcessingTool {
    const entry = this.list.find((candidate) => candidate.key === key);
    if (!entry) throw new Error(`No tool registered under '${key}'`);
    return entry.create({
      pluginIdentity: entry.plugin,
      logger: this.logger,
      outputDefaults: this.config.output,
    });
  }

  /** Completes host services with the toolbox store and logger. */
  contextFor(host: HostServices): ToolContext {
    return { ...host, store: this.store, logger: this.logger };
  }
}

export function buildToolbox(raw: unknown, options: { logger?: Logger; store?: DatasourceStore } = {}): Toolbox {
  return new Toolbox(loadToolboxConfig(raw), options);
}
