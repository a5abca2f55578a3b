import type { Logger } from "./core/logger.js";

export interface PluginIdentity {
  name: string;
  guid: string;
}

/**
 * Handle to a produced or consumed geographic dataset. Encoding is the
 * implementation's business; the runtime only saves and releases it.
 */
export interface Datasource {
  readonly lastError: string;
  saveAs(filename: string): boolean;
  dispose(): void;
}

export interface Layer {
  readonly handle: number;
  name: string;
  readonly datasource?: Datasource;
}

export interface LayerCollection extends Iterable<Layer> {
  itemByHandle(handle: number): Layer | undefined;
}

export interface LayerService {
  addLayersFromFilename(filename: string): boolean;
  addDatasource(source: Datasource): boolean;
  /** Handle of the most recently added layer. */
  readonly lastLayerHandle: number;
}

export interface MessageService {
  info(text: string): void;
}

/** Persistence layer used by the disk output path. */
export interface DatasourceStore {
  exists(filename: string): boolean;
  remove(filename: string): boolean;
  save(source: Datasource, filename: string): boolean;
}

export interface ToolContext {
  layers: LayerCollection;
  layerService: LayerService;
  messageService: MessageService;
  store?: DatasourceStore;
  logger?: Logger;
}
