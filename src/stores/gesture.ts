import { createStore, type StoreApi } from 'zustand/vanilla';
import { createIdleArena, type ArenaState } from '@/gesture/arena';
import { mergeBlockedLayers, NO_BLOCKED_LAYERS } from '@/gesture/layers';
import type { HitTarget, LayerName, Point, ScrollAxis, TargetId } from '@/gesture/types';

export interface ScrollbarDragState {
  containerId: string;
  axis: ScrollAxis;
  startPointerPos: number;
  startScroll: number;
  scrollPerPixel: number;
}

/** Drag-to-scroll anchor: the container's offset when the drag started. */
export interface ScrollDragAnchor {
  containerId: string;
  targetId: TargetId;
  start: Point;
  startOffset: Point;
}

export interface GestureStoreState {
  targets: ReadonlyMap<TargetId, HitTarget>;
  arena: ArenaState;
  scrollbarDrag: ScrollbarDragState | null;
  scrollDrag: ScrollDragAnchor | null;

  registerTarget: (target: HitTarget) => void;
  unregisterTarget: (id: TargetId) => void;
  clearTargets: () => void;
  pushModal: (layer: LayerName) => void;
  popModal: () => void;
  commitArena: (arena: ArenaState) => void;
  setScrollbarDrag: (drag: ScrollbarDragState | null) => void;
  setScrollDrag: (anchor: ScrollDragAnchor | null) => void;
}

export type GestureStore = StoreApi<GestureStoreState>;

/**
 * Registry and arena cells for one gesture system. Every update swaps in a
 * whole new value, so readers never see a half-applied change.
 */
export function createGestureStore(): GestureStore {
  return createStore<GestureStoreState>()((set) => ({
    targets: new Map(),
    arena: createIdleArena(),
    scrollbarDrag: null,
    scrollDrag: null,

    registerTarget: (target) =>
      set((state) => {
        const targets = new Map(state.targets);
        targets.set(target.id, target);
        return { targets };
      }),

    unregisterTarget: (id) =>
      set((state) => {
        if (!state.targets.has(id)) return {};
        const targets = new Map(state.targets);
        targets.delete(id);
        return { targets };
      }),

    clearTargets: () => set({ targets: new Map() }),

    pushModal: (layer) =>
      set((state) => ({
        arena: {
          ...state.arena,
          blockedLayers: mergeBlockedLayers(state.arena.blockedLayers, layer),
        },
      })),

    popModal: () =>
      set((state) => ({
        arena: { ...state.arena, blockedLayers: NO_BLOCKED_LAYERS },
      })),

    commitArena: (arena) => set({ arena }),

    setScrollbarDrag: (drag) => set({ scrollbarDrag: drag }),

    setScrollDrag: (anchor) => set({ scrollDrag: anchor }),
  }));
}
