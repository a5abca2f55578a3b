import { defaultLogger, type Logger } from "../core/logger.js";
import type { OutputLayerInfo } from "../parameters/output-layer.js";
import type { Datasource, DatasourceStore, LayerCollection, LayerService } from "../types.js";

export interface OutputDispatcherOptions {
  layers: LayerCollection;
  layerService: LayerService;
  store: DatasourceStore;
  logger?: Logger;
}

/**
 * Commits a produced datasource to disk or into the layer registry. The
 * dispatcher owns the handle it receives: it is disposed on every path except
 * a successful memory-layer registration.
 */
export class OutputDispatcher {
  private readonly layers: LayerCollection;
  private readonly layerService: LayerService;
  private readonly store: DatasourceStore;
  private readonly logger: Logger;

  constructor(options: OutputDispatcherOptions) {
    this.layers = options.layers;
    this.layerService = options.layerService;
    this.store = options.store;
    this.logger = options.logger ?? defaultLogger;
  }

  handleOutput(source: Datasource, outputInfo: OutputLayerInfo): boolean {
    const info: Readonly<OutputLayerInfo> = Object.freeze({ ...outputInfo });
    if (info.memoryLayer) {
      return this.handleMemoryOutput(source, info);
    }
    return this.handleDiskOutput(source, info);
  }

  private handleDiskOutput(source: Datasource, info: Readonly<OutputLayerInfo>): boolean {
    const filename = info.name;

    if (this.store.exists(filename)) {
      if (!info.overwrite) {
        return this.handleOverwriteFailure(source, filename, "target already exists");
      }
      if (!this.store.remove(filename)) {
        return this.handleOverwriteFailure(source, filename, "failed to remove existing target");
      }
    }

    let saved: boolean;
    try {
      saved = this.store.save(source, filename);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to save datasource: ${reason}`, { filename });
      source.dispose();
      return false;
    }

    if (!saved) {
      this.logger.error(`Failed to save datasource: ${source.lastError}`, { filename });
      source.dispose();
      return false;
    }

    this.logger.info(`Layer (${filename}) is created.`);
    source.dispose();

    if (info.addToMap) {
      return this.layerService.addLayersFromFilename(filename);
    }
    return true;
  }

  private handleMemoryOutput(source: Datasource, info: Readonly<OutputLayerInfo>): boolean {
    if (!info.addToMap) {
      source.dispose();
      this.logger.warn("Memory layer created by the tool wasn't added to the map.");
      return false;
    }

    if (!this.layerService.addDatasource(source)) {
      this.logger.error(`Failed to add memory layer to the map: ${info.name}`);
      source.dispose();
      return false;
    }

    const layer = this.layers.itemByHandle(this.layerService.lastLayerHandle);
    if (layer) {
      layer.name = info.name;
    }
    return true;
  }

  private handleOverwriteFailure(source: Datasource, filename: string, reason: string): boolean {
    this.logger.warn(`Output was not written (${reason}): ${filename}`);
    source.dispose();
    return false;
  }
}
