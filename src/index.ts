export * from './gesture';
export { createGestureStore } from './stores/gesture';
export type {
  GestureStore,
  GestureStoreState,
  ScrollbarDragState,
  ScrollDragAnchor,
} from './stores/gesture';
export { createScrollStore, watchScroll } from './stores/scroll';
export type {
  ScrollContainerState,
  ScrollStore,
  ScrollStoreState,
  ScrollWatcher,
} from './stores/scroll';
