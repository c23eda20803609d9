import type { ArenaEffect } from './arena';
import type { Recognizer } from './recognizers';
import type {
  GestureEvent,
  GestureHandlerKey,
  GesturePhase,
  HitTarget,
  Point,
  PointerNotice,
  RecognizerKind,
} from './types';

type PhaseHandlerKeys = Partial<Record<GesturePhase, GestureHandlerKey>>;

const HANDLER_KEYS: Readonly<Record<RecognizerKind, PhaseHandlerKeys>> = {
  drag: { began: 'onDragStart', changed: 'onDrag', ended: 'onDragEnd' },
  tap: { ended: 'onTap' },
  'long-press': { began: 'onLongPress', ended: 'onLongPressEnd' },
};

export function gestureHandlerKey(
  kind: RecognizerKind,
  phase: GesturePhase
): GestureHandlerKey | null {
  return HANDLER_KEYS[kind][phase] ?? null;
}

export function createGestureEvent(
  recognizer: Recognizer,
  phase: GesturePhase,
  time: number
): GestureEvent {
  const { startPos, currentPos } = recognizer;
  return {
    type: phase,
    targetId: recognizer.targetId,
    pointer: { x: currentPos.x, y: currentPos.y },
    start: { x: startPos.x, y: startPos.y },
    delta: { x: currentPos.x - startPos.x, y: currentPos.y - startPos.y },
    elapsedMs: time - recognizer.startTime,
    target: recognizer.target,
  };
}

export function createPointerNotice(
  target: HitTarget,
  position: Point,
  time: number
): PointerNotice {
  return {
    type: 'pointer',
    targetId: target.id,
    pointer: { x: position.x, y: position.y },
    time,
    target,
  };
}

export interface EffectExecutionOptions {
  trace?: boolean;
}

function invokeHandler<E>(
  handler: ((event: E) => void) | undefined,
  event: E,
  label: string
): void {
  if (!handler) return;
  try {
    handler(event);
  } catch (error) {
    console.error(`[GestureSystem] Handler ${label} failed:`, error);
  }
}

function describeEffect(effect: ArenaEffect): string {
  switch (effect.type) {
    case 'deliver-gesture':
      return `${effect.recognizer.kind}/${effect.phase} -> ${effect.recognizer.targetId}`;
    case 'deliver-pointer-down':
      return `pointer-down -> ${effect.target.id}`;
    case 'deliver-pointer-up':
      return `pointer-up -> ${effect.target.id}`;
  }
}

/**
 * Runs one effect against the handlers captured on the target snapshot.
 * Handler exceptions are logged and do not stop later effects.
 */
export function executeEffect(effect: ArenaEffect, options: EffectExecutionOptions = {}): void {
  if (options.trace) {
    console.debug(`[GestureArena] ${describeEffect(effect)}`);
  }

  switch (effect.type) {
    case 'deliver-gesture': {
      const { recognizer, phase, time } = effect;
      const key = gestureHandlerKey(recognizer.kind, phase);
      if (!key) return;
      const handler = recognizer.target.handlers?.[key];
      if (!handler) return;
      invokeHandler(handler, createGestureEvent(recognizer, phase, time), key);
      return;
    }
    case 'deliver-pointer-down': {
      const { target, position, time } = effect;
      const notice = createPointerNotice(target, position, time);
      invokeHandler(target.handlers?.onPointerDown, notice, 'onPointerDown');
      return;
    }
    case 'deliver-pointer-up': {
      const { target, position, time } = effect;
      const notice = createPointerNotice(target, position, time);
      invokeHandler(target.handlers?.onPointerUp, notice, 'onPointerUp');
      return;
    }
  }
}

export function executeEffects(
  effects: readonly ArenaEffect[],
  options: EffectExecutionOptions = {}
): void {
  for (const effect of effects) {
    executeEffect(effect, options);
  }
}
