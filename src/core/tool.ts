import type { OutputDefaults } from "./config.js";
import { ToolError } from "./errors.js";
import { defaultLogger, type Logger } from "./logger.js";
import {
  discoverParameters,
  type DiscoveredParameters,
} from "../discovery/discover.js";
import type { ParameterDeclarations, SlotId, SlotKind, SlotParameter } from "../discovery/declarations.js";
import { OutputDispatcher } from "../output/dispatcher.js";
import { NodeFsDatasourceStore } from "../output/node-fs-store.js";
import { bindLayers } from "../parameters/layer.js";
import type { OutputLayerInfo } from "../parameters/output-layer.js";
import {
  isLayerParameter,
  isOutputParameter,
  isParameterOfKind,
  isValueParameter,
  type Parameter,
} from "../parameters/types.js";
import { validateParameter } from "../parameters/validate.js";
import type {
  Datasource,
  MessageService,
  PluginIdentity,
  ToolContext,
} from "../types.js";

/** Surface the host drives: initialize once, validate, then run. */
export interface ProcessingTool {
  readonly name: string;
  readonly description: string;
  readonly pluginIdentity?: PluginIdentity;
  readonly parameters: readonly Parameter[];
  initialize(context?: ToolContext): void;
  validate(): boolean;
  run(): boolean;
}

export interface GisToolOptions {
  pluginIdentity?: PluginIdentity;
  logger?: Logger;
  /** Initial flags for output-layer parameters. */
  outputDefaults?: OutputDefaults;
}

/**
 * Base class for GIS tools. Subclasses declare their parameter slots and
 * implement `run`; parameters are discovered once, on first access.
 */
export abstract class GisTool<D extends ParameterDeclarations = ParameterDeclarations> implements ProcessingTool {
  abstract readonly name: string;
  abstract readonly description: string;
  readonly pluginIdentity?: PluginIdentity;

  protected abstract readonly declarations: D;

  private discovered?: DiscoveredParameters;
  private context?: ToolContext;
  private messages?: MessageService;
  private dispatcher?: OutputDispatcher;
  private readonly baseLogger: Logger;
  private readonly outputDefaults?: OutputDefaults;

  constructor(options: GisToolOptions = {}) {
    this.pluginIdentity = options.pluginIdentity;
    this.baseLogger = options.logger ?? defaultLogger;
    this.outputDefaults = options.outputDefaults;
  }

  /** Parameters in slot-declaration order; the same instances on every read. */
  get parameters(): readonly Parameter[] {
    return this.discover().list;
  }

  get initialized(): boolean {
    return this.context !== undefined;
  }

  parameter<S extends SlotId<D>>(slot: S): SlotParameter<D, S> | undefined {
    const parameter = this.discover().slots.get(slot);
    const declaration = this.declarations[slot];
    if (!parameter || !declaration || !isParameterOfKind<SlotKind<D, S>>(parameter, declaration.kind)) {
      return undefined;
    }
    return parameter;
  }

  requireParameter<S extends SlotId<D>>(slot: S): SlotParameter<D, S> {
    const parameter = this.parameter(slot);
    if (!parameter) {
      throw new ToolError("UNKNOWN_PARAMETER", `Tool ${this.name} has no parameter ${slot}`, {
        details: { tool: this.name, slot },
      });
    }
    return parameter;
  }

  /**
   * Binds the host context. Calling it again re-binds layer parameters and
   * services; hosts are expected to call it once per tool instance.
   */
  initialize(context?: ToolContext): void {
    if (!context) {
      throw new ToolError("CONFIGURATION", `Tool ${this.name} requires an application context`, {
        details: { tool: this.name },
      });
    }
    this.context = context;

    for (const parameter of this.parameters) {
      if (isLayerParameter(parameter)) {
        bindLayers(parameter, context.layers);
      }
    }

    this.messages = context.messageService;
    this.dispatcher = new OutputDispatcher({
      layers: context.layers,
      layerService: context.layerService,
      store: context.store ?? new NodeFsDatasourceStore({ logger: this.logger }),
      logger: this.logger,
    });
  }

  /** Stops at the first invalid parameter and reports its message. */
  validate(): boolean {
    for (const parameter of this.parameters) {
      if (!isOutputParameter(parameter) && !isValueParameter(parameter)) {
        continue;
      }
      const result = validateParameter(parameter);
      if (!result.ok) {
        this.messageService.info(result.message);
        return false;
      }
    }
    return true;
  }

  abstract run(): boolean;

  protected handleOutput(source: Datasource, outputInfo: OutputLayerInfo): boolean {
    if (!this.dispatcher) {
      throw this.notInitialized();
    }
    return this.dispatcher.handleOutput(source, outputInfo);
  }

  protected get logger(): Logger {
    return this.context?.logger ?? this.baseLogger;
  }

  protected get messageService(): MessageService {
    if (!this.messages) {
      throw this.notInitialized();
    }
    return this.messages;
  }

  private discover(): DiscoveredParameters {
    if (!this.discovered) {
      this.discovered = discoverParameters(this.declarations, {
        logger: this.logger,
        outputDefaults: this.outputDefaults,
      });
    }
    return this.discovered;
  }

  private notInitialized(): ToolError {
    return new ToolError("NOT_INITIALIZED", `Tool ${this.name} has not been initialized`, {
      details: { tool: this.name },
    });
  }
}
