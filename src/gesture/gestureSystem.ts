import {
  arenaCheckTimeThresholds,
  arenaOnPointerDown,
  arenaOnPointerMove,
  arenaOnPointerUp,
  type ArenaState,
  type ArenaTransition,
} from './arena';
import { executeEffects } from './effects';
import {
  findScrollableContainer,
  normalizeOverflow,
  type LayoutNode,
  type ScrollOffsetLookup,
} from './hitTest';
import {
  findScrollbarThumbAt,
  findScrollbarTrackAt,
  type ScrollbarSourceLookup,
} from './scrollbar';
import { createGestureSettings, type GestureSettings, type GestureSettingsInput } from './settings';
import type { GestureContext, GestureEvent, HitTarget, LayerName, Point, TargetId } from './types';
import {
  createGestureStore,
  type GestureStore,
  type ScrollDragAnchor,
} from '@/stores/gesture';
import { createScrollStore, type ScrollStore } from '@/stores/scroll';

export interface PointerInput {
  x: number;
  y: number;
  context?: GestureContext;
  /** Milliseconds on the system clock; read from `now()` when omitted. */
  time?: number;
}

export type MouseButton = 'primary' | 'secondary' | 'middle';

export interface MouseButtonInput extends PointerInput {
  button: MouseButton;
  pressed: boolean;
}

export interface MouseWheelInput {
  x: number;
  y: number;
  dx: number;
  dy: number;
  shiftKey?: boolean;
}

export interface GestureSystemOptions {
  settings?: GestureSettingsInput;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
  /** Shared scroll state; a private store is created when omitted. */
  scrollStore?: ScrollStore;
}

const EMPTY_CONTEXT: GestureContext = {};

function defaultNow(): number {
  return performance.now();
}

/**
 * Owns one registry and one arena, and drives them from host input.
 *
 * Each input is one transition: read the committed state, compute the next
 * arena and its effects, commit, then run the effects. Handlers may register
 * targets or push modals while they run.
 */
export class GestureSystem {
  readonly settings: GestureSettings;
  readonly store: GestureStore;
  readonly scroll: ScrollStore;
  private readonly now: () => number;

  constructor(options: GestureSystemOptions = {}) {
    this.settings = createGestureSettings(options.settings);
    this.store = createGestureStore();
    this.scroll = options.scrollStore ?? createScrollStore();
    this.now = options.now ?? defaultNow;
  }

  registerTarget(target: HitTarget): void {
    this.store.getState().registerTarget(target);
  }

  unregisterTarget(id: TargetId): void {
    this.store.getState().unregisterTarget(id);
  }

  clearTargets(): void {
    this.store.getState().clearTargets();
  }

  pushModal(layer: LayerName): void {
    this.store.getState().pushModal(layer);
  }

  popModal(): void {
    this.store.getState().popModal();
  }

  getArena(): ArenaState {
    return this.store.getState().arena;
  }

  getTargets(): HitTarget[] {
    return [...this.store.getState().targets.values()];
  }

  getBlockedLayers(): ReadonlySet<LayerName> {
    return this.store.getState().arena.blockedLayers;
  }

  handlePointerDown(input: PointerInput): void {
    const { arena, targets, scrollDrag } = this.store.getState();
    if (scrollDrag) this.store.getState().setScrollDrag(null);
    this.apply(
      arena,
      arenaOnPointerDown(arena, {
        position: { x: input.x, y: input.y },
        context: input.context ?? EMPTY_CONTEXT,
        targets: targets.values(),
        time: input.time ?? this.now(),
        settings: this.settings,
      })
    );
  }

  handlePointerMove(input: PointerInput): void {
    const { arena } = this.store.getState();
    if (arena.state !== 'tracking') return;
    const time = input.time ?? this.now();
    this.apply(arena, arenaOnPointerMove(arena, { x: input.x, y: input.y }, time));
  }

  handlePointerUp(input: PointerInput): void {
    const { arena } = this.store.getState();
    if (arena.state !== 'tracking') return;
    const time = input.time ?? this.now();
    this.apply(arena, arenaOnPointerUp(arena, { x: input.x, y: input.y }, time));
  }

  // Touch runs through the same single-pointer session as the mouse.
  handleFingerDown(input: PointerInput): void {
    this.handlePointerDown(input);
  }

  handleFingerMove(input: PointerInput): void {
    this.handlePointerMove(input);
  }

  handleFingerUp(input: PointerInput): void {
    this.handlePointerUp(input);
  }

  /** Only the primary button drives gestures. */
  handleMouseButton(input: MouseButtonInput): void {
    if (input.button !== 'primary') return;
    if (input.pressed) {
      this.handlePointerDown(input);
    } else {
      this.handlePointerUp(input);
    }
  }

  handleMouseMove(input: PointerInput): void {
    this.handlePointerMove(input);
  }

  /** Call once per frame so long-press can fire while the pointer rests. */
  tick(time: number = this.now()): void {
    const { arena } = this.store.getState();
    this.apply(arena, arenaCheckTimeThresholds(arena, time));
  }

  /**
   * Scrolls the nearest scroll container under the pointer. Shift swaps the
   * axes. Returns true when an offset change was requested.
   */
  handleMouseWheel(input: MouseWheelInput, tree: LayoutNode | null | undefined): boolean {
    if (!tree) return false;
    const container = findScrollableContainer(input.x, input.y, tree, this.scrollOffsetLookup);
    if (!container) return false;

    const overflow = normalizeOverflow(container.overflow);
    const [dx, dy] = input.shiftKey ? [input.dy, input.dx] : [input.dx, input.dy];
    const step = this.settings.wheelStepPx;
    // Wheel down (negative dy) reveals content below.
    const delta: Point = {
      x: overflow.x === 'scroll' ? -dx * step : 0,
      y: overflow.y === 'scroll' ? -dy * step : 0,
    };
    if (delta.x === 0 && delta.y === 0) return false;

    this.scroll.getState().scrollBy(container.id, delta);
    return true;
  }

  /**
   * `onDrag` helper: keeps the content under the pointer moving with the
   * finger. The container under the drag start is anchored at its offset on
   * the first event of the session; later events set the offset from the
   * total delta.
   */
  handleScrollDrag(event: GestureEvent, tree: LayoutNode | null | undefined): boolean {
    const anchor = this.scrollDragAnchorFor(event, tree);
    if (!anchor) return false;

    const { startOffset } = anchor;
    this.scroll.getState().setScroll(anchor.containerId, {
      x: startOffset.x - event.delta.x,
      y: startOffset.y - event.delta.y,
    });
    if (event.type === 'ended') {
      this.store.getState().setScrollDrag(null);
    }
    return true;
  }

  private scrollDragAnchorFor(
    event: GestureEvent,
    tree: LayoutNode | null | undefined
  ): ScrollDragAnchor | null {
    const current = this.store.getState().scrollDrag;
    const sameSession =
      current !== null &&
      event.type !== 'began' &&
      current.targetId === event.targetId &&
      current.start.x === event.start.x &&
      current.start.y === event.start.y;
    if (sameSession) return current;

    if (!tree) return null;
    const { start } = event;
    const container = findScrollableContainer(start.x, start.y, tree, this.scrollOffsetLookup);
    if (!container) return null;

    const anchor: ScrollDragAnchor = {
      containerId: container.id,
      targetId: event.targetId,
      start: { x: start.x, y: start.y },
      startOffset: this.scroll.getState().getScroll(container.id),
    };
    this.store.getState().setScrollDrag(anchor);
    return anchor;
  }

  /**
   * Thumb press starts a drag; track press jumps so the thumb centres on the
   * pointer and then drags from there.
   */
  handleScrollbarMouseDown(input: PointerInput, tree: LayoutNode | null | undefined): boolean {
    if (!tree) return false;
    const { x, y } = input;
    const metrics = this.settings.scrollbar;
    const scroll = this.scroll.getState();

    const thumb = findScrollbarThumbAt(
      x,
      y,
      tree,
      this.scrollbarSourceLookup,
      metrics,
      this.scrollOffsetLookup
    );
    if (thumb) {
      this.store.getState().setScrollbarDrag({
        containerId: thumb.containerId,
        axis: thumb.axis,
        startPointerPos: thumb.axis === 'y' ? y : x,
        startScroll: scroll.getScroll(thumb.containerId)[thumb.axis],
        scrollPerPixel: thumb.geometry.scrollPerPixel,
      });
      return true;
    }

    const track = findScrollbarTrackAt(
      x,
      y,
      tree,
      this.scrollbarSourceLookup,
      metrics,
      this.scrollOffsetLookup
    );
    if (!track) return false;

    const nextScroll = track.clickProgress * track.geometry.maxScroll;
    const current = scroll.getScroll(track.containerId);
    scroll.setScroll(
      track.containerId,
      track.axis === 'y' ? { x: current.x, y: nextScroll } : { x: nextScroll, y: current.y }
    );
    this.store.getState().setScrollbarDrag({
      containerId: track.containerId,
      axis: track.axis,
      startPointerPos: track.axis === 'y' ? y : x,
      startScroll: nextScroll,
      scrollPerPixel: track.geometry.scrollPerPixel,
    });
    return true;
  }

  handleScrollbarMouseMove(input: PointerInput): boolean {
    const drag = this.store.getState().scrollbarDrag;
    if (!drag) return false;

    const pointerPos = drag.axis === 'y' ? input.y : input.x;
    const nextScroll = drag.startScroll + (pointerPos - drag.startPointerPos) * drag.scrollPerPixel;
    const scroll = this.scroll.getState();
    const current = scroll.getScroll(drag.containerId);
    scroll.setScroll(
      drag.containerId,
      drag.axis === 'y' ? { x: current.x, y: nextScroll } : { x: nextScroll, y: current.y }
    );
    return true;
  }

  handleScrollbarMouseUp(): boolean {
    if (!this.store.getState().scrollbarDrag) return false;
    this.store.getState().setScrollbarDrag(null);
    return true;
  }

  isScrollbarDragging(): boolean {
    return this.store.getState().scrollbarDrag !== null;
  }

  private readonly scrollOffsetLookup: ScrollOffsetLookup = (containerId) =>
    this.scroll.getState().getScroll(containerId);

  private readonly scrollbarSourceLookup: ScrollbarSourceLookup = (containerId) =>
    this.scroll.getState().getDimensions(containerId);

  private apply(previous: ArenaState, transition: ArenaTransition): void {
    if (transition.arena !== previous) {
      this.store.getState().commitArena(transition.arena);
    }
    executeEffects(transition.effects, { trace: this.settings.trace });
  }
}

export function createGestureSystem(options: GestureSystemOptions = {}): GestureSystem {
  return new GestureSystem(options);
}
