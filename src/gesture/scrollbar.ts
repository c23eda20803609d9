import {
  hitTestTreeWithOffsets,
  pointInRect,
  type LayoutNode,
  type ScrollOffsetLookup,
} from './hitTest';
import type { ScrollbarMetrics } from './settings';
import type { Rect, ScrollAxis, Size, Point } from './types';

export interface ScrollbarGeometry {
  track: Rect;
  thumb: Rect;
  maxScroll: number;
  /** Scroll distance per pixel of thumb travel. */
  scrollPerPixel: number;
}

export interface ScrollbarSource {
  viewport: Size;
  content: Size;
  offset: Point;
}

export type ScrollbarSourceLookup = (containerId: string) => ScrollbarSource | null;

export interface ScrollbarHit {
  containerId: string;
  axis: ScrollAxis;
  geometry: ScrollbarGeometry;
}

export interface ScrollbarTrackHit extends ScrollbarHit {
  /** Target scroll progress in [0, 1] that centres the thumb on the click. */
  clickProgress: number;
}

interface AxisGeometry {
  trackStart: number;
  trackLength: number;
  thumbStart: number;
  thumbLength: number;
  maxScroll: number;
  scrollPerPixel: number;
}

function axisGeometry(
  containerStart: number,
  containerLength: number,
  viewportLength: number,
  contentLength: number,
  offset: number,
  metrics: ScrollbarMetrics
): AxisGeometry | null {
  if (viewportLength <= 0 || contentLength <= viewportLength) return null;

  const trackLength = containerLength - metrics.margin * 2;
  const thumbLength = Math.max(metrics.minThumb, trackLength * (viewportLength / contentLength));
  const maxScroll = contentLength - viewportLength;
  const travel = trackLength - thumbLength;
  const progress = maxScroll > 0 ? offset / maxScroll : 0;

  return {
    trackStart: containerStart + metrics.margin,
    trackLength,
    thumbStart: containerStart + metrics.margin + progress * travel,
    thumbLength,
    maxScroll,
    scrollPerPixel: travel > 0 ? maxScroll / travel : 0,
  };
}

export function getVerticalScrollbarGeometry(
  source: ScrollbarSource,
  bounds: Rect,
  metrics: ScrollbarMetrics
): ScrollbarGeometry | null {
  const axis = axisGeometry(
    bounds.y,
    bounds.h,
    source.viewport.h,
    source.content.h,
    source.offset.y,
    metrics
  );
  if (!axis) return null;

  const trackX = bounds.x + bounds.w - metrics.width - metrics.margin;
  return {
    track: { x: trackX, y: axis.trackStart, w: metrics.width, h: axis.trackLength },
    thumb: { x: trackX, y: axis.thumbStart, w: metrics.width, h: axis.thumbLength },
    maxScroll: axis.maxScroll,
    scrollPerPixel: axis.scrollPerPixel,
  };
}

export function getHorizontalScrollbarGeometry(
  source: ScrollbarSource,
  bounds: Rect,
  metrics: ScrollbarMetrics
): ScrollbarGeometry | null {
  const axis = axisGeometry(
    bounds.x,
    bounds.w,
    source.viewport.w,
    source.content.w,
    source.offset.x,
    metrics
  );
  if (!axis) return null;

  const trackY = bounds.y + bounds.h - metrics.width - metrics.margin;
  return {
    track: { x: axis.trackStart, y: trackY, w: axis.trackLength, h: metrics.width },
    thumb: { x: axis.thumbStart, y: trackY, w: axis.thumbLength, h: metrics.width },
    maxScroll: axis.maxScroll,
    scrollPerPixel: axis.scrollPerPixel,
  };
}

function scrollbarsOf(
  node: LayoutNode,
  lookup: ScrollbarSourceLookup,
  metrics: ScrollbarMetrics
): ScrollbarHit[] {
  if (node.id === undefined) return [];
  const source = lookup(node.id);
  if (!source) return [];

  const hits: ScrollbarHit[] = [];
  // Vertical first, matching paint order.
  const vertical = getVerticalScrollbarGeometry(source, node.bounds, metrics);
  if (vertical) hits.push({ containerId: node.id, axis: 'y', geometry: vertical });
  const horizontal = getHorizontalScrollbarGeometry(source, node.bounds, metrics);
  if (horizontal) hits.push({ containerId: node.id, axis: 'x', geometry: horizontal });
  return hits;
}

export function findScrollbarThumbAt(
  x: number,
  y: number,
  tree: LayoutNode,
  lookup: ScrollbarSourceLookup,
  metrics: ScrollbarMetrics,
  getScrollOffset?: ScrollOffsetLookup
): ScrollbarHit | null {
  for (const { node, offset } of hitTestTreeWithOffsets(x, y, tree, getScrollOffset)) {
    // Geometry lives in the node's parent space.
    const localX = x + offset.x;
    const localY = y + offset.y;
    for (const hit of scrollbarsOf(node, lookup, metrics)) {
      if (pointInRect(localX, localY, hit.geometry.thumb)) return hit;
    }
  }
  return null;
}

function clickProgress(pointer: number, trackStart: number, track: number, thumb: number): number {
  const range = track - thumb;
  if (range <= 0) return 0;
  const desiredThumbStart = pointer - trackStart - thumb / 2;
  return Math.max(0, Math.min(1, desiredThumbStart / range));
}

/** Track hit outside the thumb. */
export function findScrollbarTrackAt(
  x: number,
  y: number,
  tree: LayoutNode,
  lookup: ScrollbarSourceLookup,
  metrics: ScrollbarMetrics,
  getScrollOffset?: ScrollOffsetLookup
): ScrollbarTrackHit | null {
  for (const { node, offset } of hitTestTreeWithOffsets(x, y, tree, getScrollOffset)) {
    const localX = x + offset.x;
    const localY = y + offset.y;
    for (const hit of scrollbarsOf(node, lookup, metrics)) {
      const { track, thumb } = hit.geometry;
      if (!pointInRect(localX, localY, track) || pointInRect(localX, localY, thumb)) continue;

      const progress =
        hit.axis === 'y'
          ? clickProgress(localY, track.y, track.h, thumb.h)
          : clickProgress(localX, track.x, track.w, thumb.w);
      return { ...hit, clickProgress: progress };
    }
  }
  return null;
}
