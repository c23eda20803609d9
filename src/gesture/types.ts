export type LayerName = 'modal' | 'overlay' | 'content' | 'background';

export type TargetId = string;
export type WindowId = string;

export type RecognizerKind = 'drag' | 'tap' | 'long-press';

export type RecognizerState = 'possible' | 'began' | 'changed' | 'ended' | 'failed' | 'cancelled';

/** Phases a winner can be delivered with. */
export type GesturePhase = 'began' | 'changed' | 'ended';

export interface Point {
  x: number;
  y: number;
}

/** Axis-aligned rectangle; contains `[x, x + w) x [y, y + h)`. */
export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

export type ScrollAxis = 'x' | 'y';

export interface Size {
  w: number;
  h: number;
}

/**
 * Per-event context handed to bounds functions. `window` selects which
 * registered targets are eligible; everything else is application data
 * (e.g. current window width for right-aligned controls).
 */
export interface GestureContext {
  window?: WindowId;
  [key: string]: unknown;
}

export type BoundsFn = (context: GestureContext) => Rect | null | undefined;

export interface DragConfig {
  minDistance: number;
}

export interface TapConfig {
  maxDistance: number;
  maxDurationMs: number;
}

export interface LongPressConfig {
  minDurationMs: number;
  maxDistance: number;
}

export interface RecognizerConfigs {
  drag: DragConfig;
  tap: TapConfig;
  longPress: LongPressConfig;
}

export interface RecognizerConfigOverrides {
  drag?: Partial<DragConfig>;
  tap?: Partial<TapConfig>;
  longPress?: Partial<LongPressConfig>;
}

export interface GestureEvent {
  type: GesturePhase;
  targetId: TargetId;
  pointer: Point;
  start: Point;
  delta: Point;
  /** Milliseconds since the pointer went down. */
  elapsedMs: number;
  target: HitTarget;
}

export interface PointerNotice {
  type: 'pointer';
  targetId: TargetId;
  pointer: Point;
  time: number;
  target: HitTarget;
}

export type GestureHandler = (event: GestureEvent) => void;
export type PointerHandler = (event: PointerNotice) => void;

export interface TargetHandlers {
  onDragStart?: GestureHandler;
  onDrag?: GestureHandler;
  onDragEnd?: GestureHandler;
  onTap?: GestureHandler;
  onLongPress?: GestureHandler;
  onLongPressEnd?: GestureHandler;
  onPointerDown?: PointerHandler;
  onPointerUp?: PointerHandler;
}

export type GestureHandlerKey = Exclude<keyof TargetHandlers, 'onPointerDown' | 'onPointerUp'>;

export interface HitTarget {
  id: TargetId;
  layer: LayerName;
  /** Higher is on top within a layer. Defaults to 0. */
  zIndex?: number;
  /** Defaults to the system's primary window. */
  window?: WindowId;
  /** Absent bounds never hit. */
  bounds?: BoundsFn;
  recognizers: readonly RecognizerKind[];
  recognizerConfig?: RecognizerConfigOverrides;
  handlers?: TargetHandlers;
}
