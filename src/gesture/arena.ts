import { hitTest } from './hitTest';
import { NO_BLOCKED_LAYERS } from './layers';
import {
  cancelRecognizer,
  checkTimeThreshold,
  createRecognizersForTarget,
  updateRecognizerMove,
  updateRecognizerUp,
  type Recognizer,
} from './recognizers';
import { mergeRecognizerConfigs, type GestureSettings } from './settings';
import type { GestureContext, GesturePhase, HitTarget, LayerName, Point } from './types';

export type ArenaPhase = 'idle' | 'tracking';

export interface ArenaState {
  pointerId: number | null;
  /** Topmost target hit by the current session's pointer-down. */
  sessionTarget: HitTarget | null;
  recognizers: readonly Recognizer[];
  winner: Recognizer | null;
  state: ArenaPhase;
  /** Survives session resets. */
  blockedLayers: ReadonlySet<LayerName>;
}

export type ArenaEffect =
  | { type: 'deliver-gesture'; recognizer: Recognizer; phase: GesturePhase; time: number }
  | { type: 'deliver-pointer-down'; target: HitTarget; position: Point; time: number }
  | { type: 'deliver-pointer-up'; target: HitTarget; position: Point; time: number };

export interface ArenaTransition {
  arena: ArenaState;
  effects: ArenaEffect[];
}

export interface PointerDownInput {
  position: Point;
  context: GestureContext;
  targets: Iterable<HitTarget>;
  time: number;
  settings: GestureSettings;
}

// The arena tracks a single logical pointer.
const SESSION_POINTER_ID = 0;

export function createIdleArena(
  blockedLayers: ReadonlySet<LayerName> = NO_BLOCKED_LAYERS
): ArenaState {
  return {
    pointerId: null,
    sessionTarget: null,
    recognizers: [],
    winner: null,
    state: 'idle',
    blockedLayers,
  };
}

export function activeRecognizers(recognizers: readonly Recognizer[]): Recognizer[] {
  return recognizers.filter((recognizer) => recognizer.canWin);
}

export function declaredRecognizers(recognizers: readonly Recognizer[]): Recognizer[] {
  return recognizers.filter((recognizer) => recognizer.wantsToWin);
}

function highestPriority(recognizers: readonly Recognizer[]): Recognizer | null {
  let best: Recognizer | null = null;
  for (const recognizer of recognizers) {
    if (!best || recognizer.priority > best.priority) {
      best = recognizer;
    }
  }
  return best;
}

/**
 * Winner among recognizers that are still eligible and have declared.
 * Simultaneous declarations go to the kind with the highest priority.
 * Null while nobody has declared.
 */
export function resolveArena(recognizers: readonly Recognizer[]): Recognizer | null {
  return highestPriority(declaredRecognizers(activeRecognizers(recognizers)));
}

/** Forced decision on pointer-up: the highest priority recognizer still eligible. */
export function sweepArena(recognizers: readonly Recognizer[]): Recognizer | null {
  return highestPriority(activeRecognizers(recognizers));
}

export function cancelLosers(recognizers: readonly Recognizer[], winner: Recognizer): Recognizer[] {
  return recognizers.map((recognizer) =>
    recognizer.kind === winner.kind ? winner : cancelRecognizer(recognizer)
  );
}

function deliverablePhase(recognizer: Recognizer): GesturePhase | null {
  const { state } = recognizer;
  if (state === 'began' || state === 'changed' || state === 'ended') return state;
  return null;
}

function deliverGesture(recognizer: Recognizer, time: number): ArenaEffect[] {
  const phase = deliverablePhase(recognizer);
  return phase ? [{ type: 'deliver-gesture', recognizer, phase, time }] : [];
}

function maybeResolve(arena: ArenaState, time: number): ArenaTransition {
  if (arena.winner) return { arena, effects: [] };

  const winner = resolveArena(arena.recognizers);
  if (!winner) return { arena, effects: [] };

  return {
    arena: {
      ...arena,
      winner,
      recognizers: cancelLosers(arena.recognizers, winner),
    },
    effects: deliverGesture(winner, time),
  };
}

function replaceRecognizer(recognizers: readonly Recognizer[], next: Recognizer): Recognizer[] {
  return recognizers.map((recognizer) => (recognizer.kind === next.kind ? next : recognizer));
}

/**
 * Starts a session on the topmost target under the pointer. A miss leaves
 * the arena untouched. A pointer-down during a session replaces it.
 */
export function arenaOnPointerDown(arena: ArenaState, input: PointerDownInput): ArenaTransition {
  const { position, context, targets, time, settings } = input;
  const hits = hitTest(position, context, targets, arena.blockedLayers, settings.defaultWindow);
  const topmost = hits[0];
  if (!topmost) return { arena, effects: [] };

  const target = topmost.target;
  const configs = mergeRecognizerConfigs(settings.recognizers, target.recognizerConfig);
  const tracking: ArenaState = {
    ...arena,
    pointerId: SESSION_POINTER_ID,
    sessionTarget: target,
    recognizers: createRecognizersForTarget(target, position, time, configs),
    winner: null,
    state: 'tracking',
  };

  const resolved = maybeResolve(tracking, time);
  return {
    arena: resolved.arena,
    effects: [{ type: 'deliver-pointer-down', target, position, time }, ...resolved.effects],
  };
}

export function arenaOnPointerMove(
  arena: ArenaState,
  position: Point,
  time: number
): ArenaTransition {
  if (arena.state !== 'tracking') return { arena, effects: [] };

  const { winner } = arena;
  if (winner) {
    const updated = updateRecognizerMove(winner, position, time);
    const effects: ArenaEffect[] = [];
    if (winner.state === 'possible' && updated.state === 'began') {
      effects.push({ type: 'deliver-gesture', recognizer: updated, phase: 'began', time });
    } else if (updated.state === 'changed') {
      effects.push({ type: 'deliver-gesture', recognizer: updated, phase: 'changed', time });
    }
    return {
      arena: {
        ...arena,
        winner: updated,
        recognizers: replaceRecognizer(arena.recognizers, updated),
      },
      effects,
    };
  }

  const recognizers = arena.recognizers.map((recognizer) =>
    updateRecognizerMove(recognizer, position, time)
  );
  return maybeResolve({ ...arena, recognizers }, time);
}

/** Ends the session; the arena is idle afterwards whatever happened. */
export function arenaOnPointerUp(
  arena: ArenaState,
  position: Point,
  time: number
): ArenaTransition {
  if (arena.state !== 'tracking') return { arena, effects: [] };

  const effects: ArenaEffect[] = [];
  const { winner } = arena;

  if (winner) {
    const updated = updateRecognizerUp(winner, position, time);
    if (updated.state === 'ended') {
      effects.push({ type: 'deliver-gesture', recognizer: updated, phase: 'ended', time });
    }
  } else {
    const recognizers = arena.recognizers.map((recognizer) =>
      updateRecognizerUp(recognizer, position, time)
    );
    const selected = resolveArena(recognizers) ?? sweepArena(recognizers);
    if (selected) {
      effects.push(...deliverGesture(selected, time));
    }
  }

  if (arena.sessionTarget) {
    effects.push({ type: 'deliver-pointer-up', target: arena.sessionTarget, position, time });
  }

  return { arena: createIdleArena(arena.blockedLayers), effects };
}

/** Frame tick: lets long-press fire without pointer motion. */
export function arenaCheckTimeThresholds(arena: ArenaState, time: number): ArenaTransition {
  if (arena.state !== 'tracking' || arena.winner) return { arena, effects: [] };

  const recognizers = arena.recognizers.map((recognizer) => checkTimeThreshold(recognizer, time));
  return maybeResolve({ ...arena, recognizers }, time);
}
