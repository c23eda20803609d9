import type { LayerName } from './types';

// Highest priority first: events reach modal before content.
export const LAYER_ORDER: readonly LayerName[] = ['modal', 'overlay', 'content', 'background'];

export function layerIndex(layer: LayerName): number {
  return LAYER_ORDER.indexOf(layer);
}

/**
 * Layers hidden behind a modal pushed on `modalLayer`: every layer strictly
 * below it in LAYER_ORDER.
 */
export function computeBlockedLayers(modalLayer: LayerName): ReadonlySet<LayerName> {
  return new Set(LAYER_ORDER.slice(layerIndex(modalLayer) + 1));
}

export function mergeBlockedLayers(
  current: ReadonlySet<LayerName>,
  modalLayer: LayerName
): ReadonlySet<LayerName> {
  const next = new Set(current);
  for (const layer of computeBlockedLayers(modalLayer)) {
    next.add(layer);
  }
  return next;
}

export const NO_BLOCKED_LAYERS: ReadonlySet<LayerName> = new Set<LayerName>();
