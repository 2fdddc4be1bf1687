import * as THREE from "three";

export interface CardDimensions {
  width: number;
  height: number;
  thickness: number;
  cornerRadius: number;
}

/** Proportions of a payment card in scene units. */
export const DEFAULT_CARD_DIMENSIONS: Readonly<CardDimensions> = Object.freeze({
  width: 5,
  height: 8,
  thickness: 0.056,
  cornerRadius: 0.6,
});

const CURVE_SEGMENTS = 8;

/** Keeps faces from z-fighting with the body. */
export const FACE_OFFSET = 0.001;

export function roundedRectShape(width: number, height: number, radius: number): THREE.Shape {
  const r = Math.max(0, Math.min(radius, width / 2, height / 2));
  const x = -width / 2;
  const y = -height / 2;

  const shape = new THREE.Shape();
  shape.moveTo(x + r, y);
  shape.lineTo(x + width - r, y);
  shape.quadraticCurveTo(x + width, y, x + width, y + r);
  shape.lineTo(x + width, y + height - r);
  shape.quadraticCurveTo(x + width, y + height, x + width - r, y + height);
  shape.lineTo(x + r, y + height);
  shape.quadraticCurveTo(x, y + height, x, y + height - r);
  shape.lineTo(x, y + r);
  shape.quadraticCurveTo(x, y, x + r, y);
  return shape;
}

/** Extruded body centred on the origin, thickness along Z. */
export function createBodyGeometry(dimensions: CardDimensions): THREE.ExtrudeGeometry {
  const shape = roundedRectShape(dimensions.width, dimensions.height, dimensions.cornerRadius);
  const geometry = new THREE.ExtrudeGeometry(shape, {
    depth: dimensions.thickness,
    bevelEnabled: false,
    curveSegments: CURVE_SEGMENTS,
  });
  geometry.translate(0, 0, -dimensions.thickness / 2);
  return geometry;
}

export function createFaceGeometry(dimensions: CardDimensions): THREE.ShapeGeometry {
  const shape = roundedRectShape(dimensions.width, dimensions.height, dimensions.cornerRadius);
  return new THREE.ShapeGeometry(shape, CURVE_SEGMENTS);
}
