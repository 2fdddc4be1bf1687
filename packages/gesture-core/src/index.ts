export * from "./types";
export { PointerGestureEngine, defaultPointerGestureOptions } from "./PointerGestureEngine";
