import { cardTextureNames, type CardStyle } from "@tiltcard/card-core";
import * as THREE from "three";

export interface CardMaterials {
  body: THREE.MeshStandardMaterial;
  front: THREE.MeshStandardMaterial;
  back: THREE.MeshStandardMaterial;
}

const EDGE_COLOR = "#d9d9de";

function faceMaterial(style: CardStyle, name: string, roughnessName: string): THREE.MeshStandardMaterial {
  const material = new THREE.MeshStandardMaterial({
    name,
    roughness: 0.45,
    metalness: 0.1,
    side: THREE.FrontSide,
  });
  // Textures are resolved by name elsewhere; only the binding is recorded here.
  material.userData.roughnessMap = roughnessName;
  if (style.kind === "alphaTextured") {
    material.transparent = true;
    material.color.set(style.backgroundColor);
  }
  return material;
}

export function createCardMaterials(style: CardStyle): CardMaterials {
  const names = cardTextureNames(style);
  return {
    body: new THREE.MeshStandardMaterial({ name: "edge", color: EDGE_COLOR, roughness: 0.6 }),
    front: faceMaterial(style, names.front, names.frontRoughness),
    back: faceMaterial(style, names.back, names.backRoughness),
  };
}
