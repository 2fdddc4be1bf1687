export interface CardData {
  cardholderName: string;
  /** Space-separated groups, e.g. "4000 1234 5678 9010". */
  cardNumber: string;
  expiryDate: string;
  cvv: string;
}

export type CardStyle =
  | { kind: "opaqueTextured"; design: number }
  | { kind: "alphaTextured"; design: number; backgroundColor: string };

export interface TextVisibility {
  cardNumber: boolean;
  cardholderName: boolean;
  expiryDate: boolean;
  cvv: boolean;
}

export type CardFieldKey =
  | "cardNumberLine1"
  | "cardNumberLine2"
  | "cardholderName"
  | "expiryDate"
  | "cvv";

export interface CardField {
  key: CardFieldKey;
  text: string;
}

export interface CardTextureNames {
  front: string;
  back: string;
  frontRoughness: string;
  backRoughness: string;
}

/** Everything that forces the visual representation to be rebuilt. */
export interface CardSceneSpec {
  data: CardData;
  style: CardStyle;
  visibility: TextVisibility;
}
