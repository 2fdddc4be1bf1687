import React from "react";
import { Canvas } from "@react-three/fiber";
import type { ThreeCardRenderer } from "./ThreeCardRenderer";
import { CardScene } from "./internal/CardScene";

export type CardCanvasProps = {
  renderer: ThreeCardRenderer;
  cameraDistance?: number;
  style?: React.CSSProperties;
};

export function CardCanvas({ renderer, cameraDistance = 14, style }: CardCanvasProps): JSX.Element {
  return (
    <Canvas
      camera={{ position: [0, 0, cameraDistance], fov: 50 }}
      style={{ width: "100%", height: "100%", ...style }}
    >
      <ambientLight intensity={0.7} />
      <directionalLight position={[4, 6, 8]} intensity={0.9} />
      <CardScene renderer={renderer} />
    </Canvas>
  );
}
