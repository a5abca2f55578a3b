import fs from "node:fs";
import path from "node:path";
import { DEFAULT_SIDECAR_EXTENSIONS } from "../core/config.js";
import { defaultLogger, type Logger } from "../core/logger.js";
import type { Datasource, DatasourceStore } from "../types.js";

export interface NodeFsDatasourceStoreOptions {
  /** Companion files removed together with a shapefile target. */
  sidecarExtensions?: readonly string[];
  logger?: Logger;
}

export class NodeFsDatasourceStore implements DatasourceStore {
  private readonly sidecarExtensions: readonly string[];
  private readonly logger: Logger;

  constructor(options: NodeFsDatasourceStoreOptions = {}) {
    this.sidecarExtensions = options.sidecarExtensions ?? DEFAULT_SIDECAR_EXTENSIONS;
    this.logger = options.logger ?? defaultLogger;
  }

  exists(filename: string): boolean {
    return fs.existsSync(filename);
  }

  remove(filename: string): boolean {
    let removed = true;
    for (const candidate of this.relatedFiles(filename)) {
      if (!fs.existsSync(candidate)) continue;
      try {
        fs.rmSync(candidate);
      } catch (error) {
        this.logger.error(`Failed to remove ${candidate}`, { error: String(error) });
        removed = false;
      }
    }
    return removed;
  }

  save(source: Datasource, filename: string): boolean {
    return source.saveAs(filename);
  }

  relatedFiles(filename: string): string[] {
    const ext = path.extname(filename);
    if (ext.toLowerCase() !== ".shp") return [filename];
    const base = filename.slice(0, filename.length - ext.length);
    const files = [filename];
    for (const sidecar of this.sidecarExtensions) {
      // Sidecars follow the case of the target extension.
      files.push(`${base}${ext === ext.toUpperCase() ? sidecar.toUpperCase() : sidecar}`);
    }
    return files;
  }
}
