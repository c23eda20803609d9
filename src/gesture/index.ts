export { GestureSystem, createGestureSystem } from './gestureSystem';
export type {
  GestureSystemOptions,
  MouseButton,
  MouseButtonInput,
  MouseWheelInput,
  PointerInput,
} from './gestureSystem';
export {
  activeRecognizers,
  arenaCheckTimeThresholds,
  arenaOnPointerDown,
  arenaOnPointerMove,
  arenaOnPointerUp,
  cancelLosers,
  createIdleArena,
  declaredRecognizers,
  resolveArena,
  sweepArena,
} from './arena';
export type {
  ArenaEffect,
  ArenaPhase,
  ArenaState,
  ArenaTransition,
  PointerDownInput,
} from './arena';
export {
  cancelRecognizer,
  checkTimeThreshold,
  createRecognizer,
  createRecognizersForTarget,
  distance,
  RECOGNIZER_PRIORITIES,
  updateRecognizerMove,
  updateRecognizerUp,
} from './recognizers';
export type {
  DragRecognizer,
  LongPressRecognizer,
  Recognizer,
  TapRecognizer,
} from './recognizers';
export {
  findScrollableContainer,
  hitTest,
  hitTestTree,
  hitTestTreeWithOffsets,
  isScrollContainer,
  noScrollOffsets,
  normalizeOverflow,
  pointInRect,
  topmostTarget,
} from './hitTest';
export type {
  HitTestEntry,
  LayoutNode,
  NormalizedOverflow,
  OverflowMode,
  OverflowSpec,
  ScrollContainerNode,
  ScrollOffsetLookup,
  TreeHit,
} from './hitTest';
export {
  computeBlockedLayers,
  LAYER_ORDER,
  layerIndex,
  mergeBlockedLayers,
  NO_BLOCKED_LAYERS,
} from './layers';
export {
  createGestureEvent,
  createPointerNotice,
  executeEffect,
  executeEffects,
  gestureHandlerKey,
} from './effects';
export type { EffectExecutionOptions } from './effects';
export {
  findScrollbarThumbAt,
  findScrollbarTrackAt,
  getHorizontalScrollbarGeometry,
  getVerticalScrollbarGeometry,
} from './scrollbar';
export type {
  ScrollbarGeometry,
  ScrollbarHit,
  ScrollbarSource,
  ScrollbarSourceLookup,
  ScrollbarTrackHit,
} from './scrollbar';
export {
  createGestureSettings,
  DEFAULT_GESTURE_SETTINGS,
  DEFAULT_RECOGNIZER_CONFIGS,
  DEFAULT_SCROLLBAR_METRICS,
  DEFAULT_WINDOW_ID,
  mergeRecognizerConfigs,
} from './settings';
export type { GestureSettings, GestureSettingsInput, ScrollbarMetrics } from './settings';
export type * from './types';
