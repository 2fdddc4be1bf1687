import React from "react";
import { useFrame } from "@react-three/fiber";
import type { ThreeCardRenderer } from "../ThreeCardRenderer";

interface CardSceneProps {
  renderer: ThreeCardRenderer;
}

export function CardScene({ renderer }: CardSceneProps) {
  useFrame((_state, delta) => {
    renderer.step(delta);
  });

  return <primitive object={renderer.root} />;
}
