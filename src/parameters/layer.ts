import type { Layer, LayerCollection } from "../types.js";
import type { LayerParameter } from "./types.js";

export function bindLayers(parameter: LayerParameter, layers: LayerCollection): void {
  parameter.layers = layers;
}

export function selectedLayer(parameter: LayerParameter): Layer | undefined {
  if (parameter.value === undefined || !parameter.layers) {
    return undefined;
  }
  return parameter.layers.itemByHandle(parameter.value);
}

/** Layers the parameter can choose from, in collection order. */
export function selectableLayers(parameter: LayerParameter): Layer[] {
  return parameter.layers ? Array.from(parameter.layers) : [];
}
