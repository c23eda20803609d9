import { describe, expect, it, vi } from 'vitest';
import { createGestureSystem, type GestureSystem } from '../gestureSystem';
import type { LayoutNode } from '../hitTest';
import type { GestureEvent, HitTarget, TargetHandlers } from '../types';

function card(handlers: TargetHandlers, overrides: Partial<HitTarget> = {}): HitTarget {
  return {
    id: 'card',
    layer: 'content',
    bounds: () => ({ x: 0, y: 0, w: 100, h: 100 }),
    recognizers: ['drag'],
    handlers,
    ...overrides,
  };
}

function firstEvent(handler: ReturnType<typeof vi.fn>): GestureEvent {
  return handler.mock.calls[0][0];
}

describe('GestureSystem pointer sessions', () => {
  it('delivers drag start, move and end to the winning target', () => {
    const onDragStart = vi.fn();
    const onDrag = vi.fn();
    const onDragEnd = vi.fn();
    const system = createGestureSystem();
    system.registerTarget(
      card({ onDragStart, onDrag, onDragEnd }, { recognizerConfig: { drag: { minDistance: 5 } } })
    );

    system.handlePointerDown({ x: 10, y: 10, time: 0 });
    system.handlePointerMove({ x: 20, y: 10, time: 16 });
    expect(onDragStart).toHaveBeenCalledTimes(1);
    expect(firstEvent(onDragStart).delta).toEqual({ x: 10, y: 0 });

    system.handlePointerMove({ x: 30, y: 10, time: 32 });
    expect(onDrag).toHaveBeenCalledTimes(1);
    expect(firstEvent(onDrag).delta).toEqual({ x: 20, y: 0 });

    system.handlePointerUp({ x: 30, y: 10, time: 48 });
    expect(onDragEnd).toHaveBeenCalledTimes(1);
    expect(firstEvent(onDragEnd).elapsedMs).toBe(48);
    expect(system.getArena().state).toBe('idle');
    expect(system.getArena().recognizers).toEqual([]);
  });

  it('taps on a quick release only', () => {
    const onTap = vi.fn();
    const system = createGestureSystem();
    system.registerTarget(card({ onTap }, { recognizers: ['tap'] }));

    system.handlePointerDown({ x: 5, y: 5, time: 0 });
    system.handlePointerUp({ x: 5, y: 5, time: 100 });
    expect(onTap).toHaveBeenCalledTimes(1);

    system.handlePointerDown({ x: 5, y: 5, time: 1000 });
    system.handlePointerUp({ x: 5, y: 5, time: 1400 });
    expect(onTap).toHaveBeenCalledTimes(1);
  });

  it('fires long-press from tick using the injected clock', () => {
    let clock = 0;
    const onLongPress = vi.fn();
    const system = createGestureSystem({ now: () => clock });
    system.registerTarget(card({ onLongPress }, { recognizers: ['long-press'] }));

    system.handlePointerDown({ x: 5, y: 5 });
    clock = 499;
    system.tick();
    expect(onLongPress).not.toHaveBeenCalled();

    clock = 500;
    system.tick();
    expect(onLongPress).toHaveBeenCalledTimes(1);
    expect(firstEvent(onLongPress).elapsedMs).toBe(500);
  });

  it('ignores targets behind a modal until it is popped', () => {
    const onPointerDown = vi.fn();
    const system = createGestureSystem();
    system.registerTarget(card({ onPointerDown }));

    system.pushModal('overlay');
    expect([...system.getBlockedLayers()]).toEqual(['content', 'background']);
    system.handlePointerDown({ x: 5, y: 5, time: 0 });
    expect(onPointerDown).not.toHaveBeenCalled();
    expect(system.getArena().state).toBe('idle');

    system.popModal();
    system.handlePointerDown({ x: 5, y: 5, time: 10 });
    expect(onPointerDown).toHaveBeenCalledTimes(1);
  });

  it('commits the arena before handlers run', () => {
    const seen: string[] = [];
    let system: GestureSystem | null = null;
    const onTap = vi.fn(() => {
      seen.push(system?.getArena().state ?? 'none');
      system?.registerTarget(card({}, { id: 'spawned' }));
    });
    system = createGestureSystem();
    system.registerTarget(card({ onTap }, { recognizers: ['tap'] }));

    system.handlePointerDown({ x: 5, y: 5, time: 0 });
    system.handlePointerUp({ x: 5, y: 5, time: 50 });

    expect(seen).toEqual(['idle']);
    expect(system.getTargets().map((target) => target.id)).toEqual(['card', 'spawned']);
  });

  it('delivers to the descriptor registered at pointer-down', () => {
    const original = vi.fn();
    const replacement = vi.fn();
    const system = createGestureSystem();
    system.registerTarget(card({ onTap: original }, { recognizers: ['tap'] }));

    system.handlePointerDown({ x: 5, y: 5, time: 0 });
    system.registerTarget(card({ onTap: replacement }, { recognizers: ['tap'] }));
    system.handlePointerUp({ x: 5, y: 5, time: 50 });

    expect(original).toHaveBeenCalledTimes(1);
    expect(replacement).not.toHaveBeenCalled();
  });

  it('routes only the primary mouse button', () => {
    const onPointerDown = vi.fn();
    const system = createGestureSystem();
    system.registerTarget(card({ onPointerDown }));

    system.handleMouseButton({ x: 5, y: 5, time: 0, button: 'secondary', pressed: true });
    expect(system.getArena().state).toBe('idle');

    system.handleMouseButton({ x: 5, y: 5, time: 0, button: 'primary', pressed: true });
    expect(system.getArena().state).toBe('tracking');
    system.handleMouseButton({ x: 5, y: 5, time: 10, button: 'primary', pressed: false });
    expect(system.getArena().state).toBe('idle');
    expect(onPointerDown).toHaveBeenCalledTimes(1);
  });

  it('treats finger input as a pointer', () => {
    const onTap = vi.fn();
    const system = createGestureSystem();
    system.registerTarget(card({ onTap }, { recognizers: ['tap'] }));

    system.handleFingerDown({ x: 5, y: 5, time: 0 });
    system.handleFingerMove({ x: 6, y: 5, time: 20 });
    system.handleFingerUp({ x: 6, y: 5, time: 40 });

    expect(onTap).toHaveBeenCalledTimes(1);
  });

  it('drops registrations on unregister and clear', () => {
    const system = createGestureSystem();
    system.registerTarget(card({}));
    system.registerTarget(card({}, { id: 'other' }));

    system.unregisterTarget('card');
    expect(system.getTargets().map((target) => target.id)).toEqual(['other']);
    system.clearTargets();
    expect(system.getTargets()).toEqual([]);
  });
});

describe('GestureSystem scrolling', () => {
  const tree: LayoutNode = {
    bounds: { x: 0, y: 0, w: 200, h: 200 },
    children: [{ id: 'list', bounds: { x: 0, y: 0, w: 100, h: 100 }, overflow: { y: 'scroll' } }],
  };

  function scrollableSystem(): GestureSystem {
    const system = createGestureSystem();
    const scroll = system.scroll.getState();
    scroll.init('list');
    scroll.setDimensions('list', { w: 100, h: 100 }, { w: 100, h: 400 });
    return system;
  }

  it('scrolls the container under the wheel', () => {
    const system = scrollableSystem();

    expect(system.handleMouseWheel({ x: 10, y: 10, dx: 0, dy: -1 }, tree)).toBe(true);
    expect(system.scroll.getState().getScroll('list')).toEqual({ x: 0, y: 20 });
  });

  it('swaps wheel axes with shift', () => {
    const system = scrollableSystem();

    expect(system.handleMouseWheel({ x: 10, y: 10, dx: 0, dy: -1, shiftKey: true }, tree)).toBe(
      false
    );
    expect(system.scroll.getState().getScroll('list')).toEqual({ x: 0, y: 0 });
  });

  it('ignores the wheel outside scroll containers or without a layout', () => {
    const system = scrollableSystem();

    expect(system.handleMouseWheel({ x: 150, y: 150, dx: 0, dy: -1 }, tree)).toBe(false);
    expect(system.handleMouseWheel({ x: 10, y: 10, dx: 0, dy: -1 }, null)).toBe(false);
  });

  it('moves content with a drag', () => {
    const system = scrollableSystem();
    const event: GestureEvent = {
      type: 'changed',
      targetId: 'list',
      pointer: { x: 10, y: 40 },
      start: { x: 10, y: 70 },
      delta: { x: 0, y: -30 },
      elapsedMs: 100,
      target: card({}),
    };

    expect(system.handleScrollDrag(event, tree)).toBe(true);
    expect(system.scroll.getState().getScroll('list')).toEqual({ x: 0, y: 30 });
  });

  it('keeps content under the finger across a whole drag', () => {
    const system = scrollableSystem();
    system.registerTarget(
      card(
        { onDrag: (event) => system.handleScrollDrag(event, tree) },
        { recognizerConfig: { drag: { minDistance: 5 } } }
      )
    );

    system.handlePointerDown({ x: 10, y: 90, time: 0 });
    system.handlePointerMove({ x: 10, y: 80, time: 16 });
    system.handlePointerMove({ x: 10, y: 70, time: 32 });
    expect(system.scroll.getState().getScroll('list')).toEqual({ x: 0, y: 20 });

    system.handlePointerMove({ x: 10, y: 60, time: 48 });
    system.handlePointerMove({ x: 10, y: 50, time: 64 });
    system.handlePointerMove({ x: 10, y: 40, time: 80 });
    system.handlePointerUp({ x: 10, y: 40, time: 96 });
    expect(system.scroll.getState().getScroll('list')).toEqual({ x: 0, y: 50 });

    system.handlePointerDown({ x: 10, y: 90, time: 1000 });
    system.handlePointerMove({ x: 10, y: 80, time: 1016 });
    system.handlePointerMove({ x: 10, y: 60, time: 1032 });
    expect(system.scroll.getState().getScroll('list')).toEqual({ x: 0, y: 80 });
  });

  it('reaches the scrollbar of a container nested in a scrolled parent', () => {
    const system = createGestureSystem();
    const scroll = system.scroll.getState();
    scroll.init('outer');
    scroll.setDimensions('outer', { w: 100, h: 200 }, { w: 100, h: 400 });
    scroll.setScroll('outer', { x: 0, y: 100 });
    scroll.init('inner');
    scroll.setDimensions('inner', { w: 100, h: 100 }, { w: 100, h: 400 });
    const nested: LayoutNode = {
      id: 'outer',
      bounds: { x: 0, y: 0, w: 100, h: 200 },
      overflow: 'scroll',
      children: [{ id: 'inner', bounds: { x: 0, y: 150, w: 100, h: 100 }, overflow: 'scroll' }],
    };

    expect(system.handleScrollbarMouseDown({ x: 94, y: 60 }, nested)).toBe(true);
    expect(system.store.getState().scrollbarDrag?.containerId).toBe('inner');

    system.handleScrollbarMouseMove({ x: 94, y: 96 });
    expect(system.scroll.getState().getScroll('inner').y).toBeCloseTo(150);
    expect(system.scroll.getState().getScroll('outer').y).toBe(100);
  });

  it('drags the scrollbar thumb', () => {
    const system = scrollableSystem();

    expect(system.handleScrollbarMouseDown({ x: 94, y: 10 }, tree)).toBe(true);
    expect(system.isScrollbarDragging()).toBe(true);

    expect(system.handleScrollbarMouseMove({ x: 94, y: 46 })).toBe(true);
    expect(system.scroll.getState().getScroll('list').y).toBeCloseTo(150);

    expect(system.handleScrollbarMouseUp()).toBe(true);
    expect(system.isScrollbarDragging()).toBe(false);
    expect(system.handleScrollbarMouseMove({ x: 94, y: 90 })).toBe(false);
  });

  it('jumps to a track click and keeps dragging from there', () => {
    const system = scrollableSystem();

    expect(system.handleScrollbarMouseDown({ x: 94, y: 80 }, tree)).toBe(true);
    expect(system.scroll.getState().getScroll('list').y).toBeCloseTo(275);
    expect(system.store.getState().scrollbarDrag?.startScroll).toBeCloseTo(275);
  });

  it('misses the scrollbar elsewhere', () => {
    const system = scrollableSystem();

    expect(system.handleScrollbarMouseDown({ x: 50, y: 50 }, tree)).toBe(false);
    expect(system.handleScrollbarMouseUp()).toBe(false);
  });
});
