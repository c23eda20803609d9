import type {
  DragConfig,
  HitTarget,
  LongPressConfig,
  Point,
  RecognizerConfigs,
  RecognizerKind,
  RecognizerState,
  TapConfig,
  TargetId,
} from './types';

// Higher wins when several recognizers declare on the same event.
export const RECOGNIZER_PRIORITIES: Readonly<Record<RecognizerKind, number>> = {
  drag: 50,
  'long-press': 40,
  tap: 30,
};

interface RecognizerBase {
  targetId: TargetId;
  /** Descriptor as registered when the pointer went down. */
  target: HitTarget;
  startPos: Point;
  currentPos: Point;
  startTime: number;
  state: RecognizerState;
  canWin: boolean;
  wantsToWin: boolean;
  priority: number;
}

export interface DragRecognizer extends RecognizerBase {
  kind: 'drag';
  config: DragConfig;
}

export interface TapRecognizer extends RecognizerBase {
  kind: 'tap';
  config: TapConfig;
}

export interface LongPressRecognizer extends RecognizerBase {
  kind: 'long-press';
  config: LongPressConfig;
}

export type Recognizer = DragRecognizer | TapRecognizer | LongPressRecognizer;

export function distance(a: Point, b: Point): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

function fail<R extends Recognizer>(recognizer: R): R {
  return { ...recognizer, state: 'failed', canWin: false };
}

export function createRecognizer(
  kind: RecognizerKind,
  target: HitTarget,
  position: Point,
  time: number,
  configs: RecognizerConfigs
): Recognizer {
  const base: RecognizerBase = {
    targetId: target.id,
    target,
    startPos: position,
    currentPos: position,
    startTime: time,
    state: 'possible',
    canWin: true,
    wantsToWin: false,
    priority: RECOGNIZER_PRIORITIES[kind],
  };

  switch (kind) {
    case 'drag': {
      const config = configs.drag;
      // A zero threshold drag starts on contact.
      const immediate = config.minDistance === 0;
      return {
        ...base,
        kind,
        config,
        state: immediate ? 'began' : 'possible',
        wantsToWin: immediate,
      };
    }
    case 'tap':
      return { ...base, kind, config: configs.tap };
    case 'long-press':
      return { ...base, kind, config: configs.longPress };
  }
}

/** One recognizer per distinct kind, in the target's declared order. */
export function createRecognizersForTarget(
  target: HitTarget,
  position: Point,
  time: number,
  configs: RecognizerConfigs
): Recognizer[] {
  const kinds = [...new Set(target.recognizers)];
  return kinds.map((kind) => createRecognizer(kind, target, position, time, configs));
}

function moveDrag(recognizer: DragRecognizer, position: Point): DragRecognizer {
  const moved = { ...recognizer, currentPos: position };
  if (recognizer.state === 'possible') {
    if (distance(recognizer.startPos, position) >= recognizer.config.minDistance) {
      return { ...moved, state: 'began', wantsToWin: true };
    }
    return moved;
  }
  if (recognizer.state === 'began' || recognizer.state === 'changed') {
    return { ...moved, state: 'changed' };
  }
  return moved;
}

function moveTap(recognizer: TapRecognizer, position: Point, time: number): TapRecognizer {
  const moved = { ...recognizer, currentPos: position };
  if (recognizer.state !== 'possible') return moved;

  const tooFar = distance(recognizer.startPos, position) > recognizer.config.maxDistance;
  const tooLong = time - recognizer.startTime > recognizer.config.maxDurationMs;
  return tooFar || tooLong ? fail(moved) : moved;
}

function moveLongPress(recognizer: LongPressRecognizer, position: Point): LongPressRecognizer {
  const moved = { ...recognizer, currentPos: position };
  const waitingOrHeld = recognizer.state === 'possible' || recognizer.state === 'began';
  if (waitingOrHeld && distance(recognizer.startPos, position) > recognizer.config.maxDistance) {
    return fail(moved);
  }
  return moved;
}

export function updateRecognizerMove(
  recognizer: Recognizer,
  position: Point,
  time: number
): Recognizer {
  if (recognizer.state === 'cancelled') return recognizer;
  switch (recognizer.kind) {
    case 'drag':
      return moveDrag(recognizer, position);
    case 'tap':
      return moveTap(recognizer, position, time);
    case 'long-press':
      return moveLongPress(recognizer, position);
  }
}

function releaseDrag(recognizer: DragRecognizer, position: Point): DragRecognizer {
  const released = { ...recognizer, currentPos: position };
  if (recognizer.state === 'began' || recognizer.state === 'changed') {
    return { ...released, state: 'ended' };
  }
  if (recognizer.state === 'possible') return fail(released);
  return released;
}

function releaseTap(recognizer: TapRecognizer, position: Point, time: number): TapRecognizer {
  const released = { ...recognizer, currentPos: position };
  if (recognizer.state !== 'possible') return released;

  const withinDistance = distance(recognizer.startPos, position) <= recognizer.config.maxDistance;
  const withinDuration = time - recognizer.startTime <= recognizer.config.maxDurationMs;
  if (withinDistance && withinDuration) {
    return { ...released, state: 'ended', wantsToWin: true };
  }
  return fail(released);
}

function releaseLongPress(
  recognizer: LongPressRecognizer,
  position: Point,
  time: number
): LongPressRecognizer {
  const released = { ...recognizer, currentPos: position };
  const elapsed = time - recognizer.startTime;
  if (recognizer.state === 'began' || recognizer.state === 'changed') {
    return { ...released, state: 'ended' };
  }
  if (recognizer.state === 'possible' && elapsed < recognizer.config.minDurationMs) {
    return fail(released);
  }
  return released;
}

export function updateRecognizerUp(
  recognizer: Recognizer,
  position: Point,
  time: number
): Recognizer {
  if (recognizer.state === 'cancelled') return recognizer;
  switch (recognizer.kind) {
    case 'drag':
      return releaseDrag(recognizer, position);
    case 'tap':
      return releaseTap(recognizer, position, time);
    case 'long-press':
      return releaseLongPress(recognizer, position, time);
  }
}

/** Evaluates time-based thresholds; called from the host's frame tick. */
export function checkTimeThreshold(recognizer: Recognizer, time: number): Recognizer {
  if (recognizer.state !== 'possible') return recognizer;
  const elapsed = time - recognizer.startTime;

  switch (recognizer.kind) {
    case 'drag':
      return recognizer;
    case 'tap':
      return elapsed > recognizer.config.maxDurationMs ? fail(recognizer) : recognizer;
    case 'long-press':
      if (elapsed >= recognizer.config.minDurationMs) {
        return { ...recognizer, state: 'began', wantsToWin: true };
      }
      return recognizer;
  }
}

export function cancelRecognizer(recognizer: Recognizer): Recognizer {
  return { ...recognizer, state: 'cancelled', canWin: false };
}
