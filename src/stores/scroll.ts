import { createStore } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';
import type { Point, ScrollAxis, Size } from '@/gesture/types';

export interface ScrollContainerState {
  viewport: Size;
  content: Size;
  offset: Point;
}

export interface ScrollStoreState {
  containers: Record<string, ScrollContainerState>;

  init: (id: string) => void;
  destroy: (id: string) => void;
  setDimensions: (id: string, viewport: Size, content: Size) => void;
  setScroll: (id: string, position: Partial<Point>) => void;
  scrollBy: (id: string, delta: Partial<Point>) => void;
  scrollToTop: (id: string) => void;
  scrollToBottom: (id: string) => void;
  scrollToRight: (id: string) => void;

  getScroll: (id: string) => Point;
  getDimensions: (id: string) => ScrollContainerState | null;
  getScrollableSize: (id: string) => Point | null;
  isScrollable: (id: string, axis: ScrollAxis) => boolean;
  getScrollProgress: (id: string, axis: ScrollAxis) => number;
}

const EMPTY_SIZE: Size = { w: 0, h: 0 };

function maxScrollOf(container: ScrollContainerState): Point {
  return {
    x: Math.max(0, container.content.w - container.viewport.w),
    y: Math.max(0, container.content.h - container.viewport.h),
  };
}

function clampScrollValue(value: number, max: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(max, value));
}

/**
 * Scroll offsets of the layout's scroll containers, keyed by container id.
 * Offsets are always clamped to `[0, content - viewport]` per axis.
 */
export function createScrollStore() {
  return createStore<ScrollStoreState>()(
    immer((set, get) => ({
      containers: {},

      init: (id) =>
        set((state) => {
          if (state.containers[id]) return;
          state.containers[id] = {
            viewport: { ...EMPTY_SIZE },
            content: { ...EMPTY_SIZE },
            offset: { x: 0, y: 0 },
          };
        }),

      destroy: (id) =>
        set((state) => {
          delete state.containers[id];
        }),

      setDimensions: (id, viewport, content) =>
        set((state) => {
          const container = state.containers[id];
          if (!container) return;
          container.viewport = { ...viewport };
          container.content = { ...content };
          const max = maxScrollOf(container);
          container.offset = {
            x: clampScrollValue(container.offset.x, max.x),
            y: clampScrollValue(container.offset.y, max.y),
          };
        }),

      setScroll: (id, position) =>
        set((state) => {
          const container = state.containers[id];
          if (!container) return;
          const max = maxScrollOf(container);
          container.offset = {
            x: clampScrollValue(position.x ?? 0, max.x),
            y: clampScrollValue(position.y ?? 0, max.y),
          };
        }),

      scrollBy: (id, delta) => {
        const current = get().getScroll(id);
        get().setScroll(id, {
          x: current.x + (delta.x ?? 0),
          y: current.y + (delta.y ?? 0),
        });
      },

      scrollToTop: (id) => get().setScroll(id, { x: 0, y: 0 }),

      scrollToBottom: (id) => {
        const max = get().getScrollableSize(id);
        if (!max) return;
        get().setScroll(id, { x: 0, y: max.y });
      },

      scrollToRight: (id) => {
        const max = get().getScrollableSize(id);
        if (!max) return;
        get().setScroll(id, { x: max.x, y: 0 });
      },

      getScroll: (id) => {
        const container = get().containers[id];
        return container ? { ...container.offset } : { x: 0, y: 0 };
      },

      getDimensions: (id) => {
        const container = get().containers[id];
        if (!container) return null;
        return {
          viewport: { ...container.viewport },
          content: { ...container.content },
          offset: { ...container.offset },
        };
      },

      getScrollableSize: (id) => {
        const container = get().containers[id];
        return container ? maxScrollOf(container) : null;
      },

      isScrollable: (id, axis) => {
        const max = get().getScrollableSize(id);
        return max !== null && max[axis] > 0;
      },

      getScrollProgress: (id, axis) => {
        const max = get().getScrollableSize(id);
        if (!max || max[axis] <= 0) return 0;
        return get().getScroll(id)[axis] / max[axis];
      },
    }))
  );
}

export type ScrollStore = ReturnType<typeof createScrollStore>;

export type ScrollWatcher = (previous: Point, next: Point) => void;

/**
 * Calls `watcher` whenever container `id` changes offset. Returns the
 * unsubscribe function.
 */
export function watchScroll(store: ScrollStore, id: string, watcher: ScrollWatcher): () => void {
  return store.subscribe((state, previousState) => {
    const next = state.containers[id]?.offset;
    const previous = previousState.containers[id]?.offset;
    if (!next || !previous) return;
    if (next.x === previous.x && next.y === previous.y) return;
    try {
      watcher({ ...previous }, { ...next });
    } catch (error) {
      console.error(`[ScrollStore] Watcher for "${id}" failed:`, error);
    }
  });
}
