export { CardCanvas } from "./CardCanvas";
export type { CardCanvasProps } from "./CardCanvas";
export { ThreeCardRenderer } from "./ThreeCardRenderer";
export type { CardSceneHandle, ThreeCardRendererOptions } from "./ThreeCardRenderer";
export {
  DEFAULT_CARD_DIMENSIONS,
  createBodyGeometry,
  createFaceGeometry,
  roundedRectShape,
} from "./internal/cardGeometry";
export type { CardDimensions } from "./internal/cardGeometry";
export { createCardMaterials } from "./internal/cardMaterials";
export type { CardMaterials } from "./internal/cardMaterials";
