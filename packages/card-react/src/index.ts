export { useCardController } from "./useCardController";
export type { UseCardControllerOptions } from "./useCardController";
