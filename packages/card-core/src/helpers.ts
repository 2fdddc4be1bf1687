import type {
  CardData,
  CardField,
  CardStyle,
  CardTextureNames,
  TextVisibility,
} from "./types";

const MIN_DESIGN = 1;
const MAX_DESIGN = 5;

export const defaultTextVisibility: Readonly<TextVisibility> = Object.freeze({
  cardNumber: true,
  cardholderName: true,
  expiryDate: true,
  cvv: true,
});

export const defaultCardStyle: Readonly<CardStyle> = Object.freeze({ kind: "opaqueTextured", design: 1 });

export function designNumber(style: CardStyle): number {
  if (Number.isNaN(style.design)) return MIN_DESIGN;
  return Math.min(Math.max(Math.round(style.design), MIN_DESIGN), MAX_DESIGN);
}

export function cardTextureNames(style: CardStyle): CardTextureNames {
  const n = designNumber(style);
  const suffix = style.kind === "alphaTextured" ? "_alpha-min" : "-min";
  return {
    front: `${n}_front${suffix}`,
    back: `${n}_back${suffix}`,
    frontRoughness: `${n}_front_roughness-min`,
    backRoughness: `${n}_back_roughness-min`,
  };
}

export function cardDataEquals(a: CardData, b: CardData): boolean {
  return (
    a.cardholderName === b.cardholderName &&
    a.cardNumber === b.cardNumber &&
    a.expiryDate === b.expiryDate &&
    a.cvv === b.cvv
  );
}

export function styleEquals(a: CardStyle, b: CardStyle): boolean {
  if (a.kind !== b.kind || a.design !== b.design) return false;
  if (a.kind === "alphaTextured" && b.kind === "alphaTextured") {
    return a.backgroundColor === b.backgroundColor;
  }
  return true;
}

export function visibilityEquals(a: TextVisibility, b: TextVisibility): boolean {
  return (
    a.cardNumber === b.cardNumber &&
    a.cardholderName === b.cardholderName &&
    a.expiryDate === b.expiryDate &&
    a.cvv === b.cvv
  );
}

/**
 * Printed fields in layout order. The number is split over two lines: the first
 * two groups, then whatever remains.
 */
export function cardFields(data: CardData, visibility: TextVisibility): CardField[] {
  const fields: CardField[] = [];
  if (visibility.cardNumber) {
    const groups = data.cardNumber.split(" ").filter((g) => g.length > 0);
    fields.push({ key: "cardNumberLine1", text: groups.slice(0, 2).join("  ") });
    fields.push({ key: "cardNumberLine2", text: groups.slice(2).join("  ") });
  }
  if (visibility.cardholderName) {
    fields.push({ key: "cardholderName", text: data.cardholderName });
  }
  if (visibility.expiryDate) {
    fields.push({ key: "expiryDate", text: data.expiryDate });
  }
  if (visibility.cvv) {
    fields.push({ key: "cvv", text: data.cvv });
  }
  return fields;
}

/**
 * Rotation (radians) for a card sitting in a horizontal carousel: cards left of
 * centre turn one way, cards right of centre the other, in whole degrees.
 */
export function carouselRotation(cardMidX: number, viewportWidth: number, maxDegrees = 50): number {
  if (!(viewportWidth > 0) || !Number.isFinite(cardMidX)) return 0;
  const half = viewportWidth / 2;
  const normalized = (cardMidX - half) / half;
  const degrees = -roundHalfEven(normalized * maxDegrees);
  return degrees === 0 ? 0 : (degrees * Math.PI) / 180;
}

export function shouldPushRotation(next: number, previous: number, threshold = 0.001): boolean {
  return Math.abs(next - previous) > threshold;
}

export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}
