import { layerIndex } from './layers';
import { DEFAULT_WINDOW_ID } from './settings';
import type { GestureContext, HitTarget, LayerName, Point, Rect, WindowId } from './types';

export interface HitTestEntry {
  target: HitTarget;
  /** 0 is topmost. */
  depth: number;
}

export type OverflowMode = 'visible' | 'scroll';

export type OverflowSpec = OverflowMode | { x?: OverflowMode; y?: OverflowMode };

export interface NormalizedOverflow {
  x: OverflowMode;
  y: OverflowMode;
}

/** A laid-out node. `bounds` are absolute, in the parent's scrolled space. */
export interface LayoutNode {
  id?: string;
  bounds: Rect;
  overflow?: OverflowSpec;
  children?: readonly LayoutNode[];
}

export type ScrollOffsetLookup = (containerId: string) => Point;

const ZERO_OFFSET: Point = { x: 0, y: 0 };

export const noScrollOffsets: ScrollOffsetLookup = () => ZERO_OFFSET;

export function pointInRect(px: number, py: number, rect: Rect): boolean {
  return px >= rect.x && px < rect.x + rect.w && py >= rect.y && py < rect.y + rect.h;
}

function resolveBounds(target: HitTarget, context: GestureContext): Rect | null {
  if (!target.bounds) return null;
  try {
    return target.bounds(context) ?? null;
  } catch {
    // A broken bounds function makes its target unhittable.
    return null;
  }
}

/**
 * All targets under the point, topmost first: by layer order, then z-index
 * descending. Ties keep registration order.
 */
export function hitTest(
  point: Point,
  context: GestureContext,
  targets: Iterable<HitTarget>,
  blockedLayers: ReadonlySet<LayerName>,
  defaultWindow: WindowId = DEFAULT_WINDOW_ID
): HitTestEntry[] {
  const activeWindow = context.window ?? defaultWindow;
  const hits: HitTarget[] = [];

  for (const target of targets) {
    if (blockedLayers.has(target.layer)) continue;
    if ((target.window ?? defaultWindow) !== activeWindow) continue;

    const bounds = resolveBounds(target, context);
    if (!bounds || !pointInRect(point.x, point.y, bounds)) continue;

    hits.push(target);
  }

  hits.sort((a, b) => {
    const byLayer = layerIndex(a.layer) - layerIndex(b.layer);
    if (byLayer !== 0) return byLayer;
    return (b.zIndex ?? 0) - (a.zIndex ?? 0);
  });

  return hits.map((target, depth) => ({ target, depth }));
}

export function topmostTarget(
  point: Point,
  context: GestureContext,
  targets: Iterable<HitTarget>,
  blockedLayers: ReadonlySet<LayerName>,
  defaultWindow: WindowId = DEFAULT_WINDOW_ID
): HitTestEntry | null {
  return hitTest(point, context, targets, blockedLayers, defaultWindow)[0] ?? null;
}

export function normalizeOverflow(overflow: OverflowSpec | undefined): NormalizedOverflow {
  if (overflow === undefined) return { x: 'visible', y: 'visible' };
  if (typeof overflow === 'string') return { x: overflow, y: overflow };
  return { x: overflow.x ?? 'visible', y: overflow.y ?? 'visible' };
}

export function isScrollContainer(node: LayoutNode): boolean {
  const overflow = normalizeOverflow(node.overflow);
  return overflow.x === 'scroll' || overflow.y === 'scroll';
}

function ownScrollOffset(node: LayoutNode, getScrollOffset: ScrollOffsetLookup): Point {
  if (node.id === undefined) return ZERO_OFFSET;
  const overflow = normalizeOverflow(node.overflow);
  if (overflow.x !== 'scroll' && overflow.y !== 'scroll') return ZERO_OFFSET;

  const offset = getScrollOffset(node.id);
  return {
    x: overflow.x === 'scroll' ? offset.x : 0,
    y: overflow.y === 'scroll' ? offset.y : 0,
  };
}

/** A node under the point and the scroll offset of the space its bounds live in. */
export interface TreeHit {
  node: LayoutNode;
  offset: Point;
}

function collectTreeHits(
  node: LayoutNode,
  x: number,
  y: number,
  accumulated: Point,
  getScrollOffset: ScrollOffsetLookup,
  out: TreeHit[]
): void {
  // The node's own bounds live in its parent's space; only its children
  // move with its scroll offset.
  if (!pointInRect(x + accumulated.x, y + accumulated.y, node.bounds)) return;

  const children = node.children ?? [];
  if (children.length > 0) {
    const own = ownScrollOffset(node, getScrollOffset);
    const childOffset = { x: accumulated.x + own.x, y: accumulated.y + own.y };
    // Later siblings paint on top, so they are tested first.
    for (let i = children.length - 1; i >= 0; i--) {
      collectTreeHits(children[i], x, y, childOffset, getScrollOffset, out);
    }
  }

  out.push({ node, offset: accumulated });
}

/**
 * Like `hitTestTree`, but keeps the accumulated ancestor scroll offset of
 * each node. Add it to a screen point to get the point in `node.bounds` space.
 */
export function hitTestTreeWithOffsets(
  x: number,
  y: number,
  tree: LayoutNode,
  getScrollOffset: ScrollOffsetLookup = noScrollOffsets
): TreeHit[] {
  const out: TreeHit[] = [];
  collectTreeHits(tree, x, y, ZERO_OFFSET, getScrollOffset, out);
  return out;
}

/**
 * Scroll-aware hit test over a laid-out tree. Returns every node under the
 * point, deepest first; the root, when hit, is last.
 */
export function hitTestTree(
  x: number,
  y: number,
  tree: LayoutNode,
  getScrollOffset: ScrollOffsetLookup = noScrollOffsets
): LayoutNode[] {
  return hitTestTreeWithOffsets(x, y, tree, getScrollOffset).map((hit) => hit.node);
}

export type ScrollContainerNode = LayoutNode & { id: string };

function hasId(node: LayoutNode): node is ScrollContainerNode {
  return typeof node.id === 'string';
}

/** Nearest scrollable node with an id under the point. */
export function findScrollableContainer(
  x: number,
  y: number,
  tree: LayoutNode,
  getScrollOffset: ScrollOffsetLookup = noScrollOffsets
): ScrollContainerNode | null {
  for (const node of hitTestTree(x, y, tree, getScrollOffset)) {
    if (hasId(node) && isScrollContainer(node)) return node;
  }
  return null;
}
