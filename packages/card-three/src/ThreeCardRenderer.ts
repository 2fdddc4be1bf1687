import { cardFields, cardTextureNames, type CardSceneSpec } from "@tiltcard/card-core";
import { resolveEasing, type CardPose, type CardRenderer, type EasingFn, type RenderHint } from "@tiltcard/control-core";
import * as THREE from "three";
import { DEFAULT_CARD_DIMENSIONS, FACE_OFFSET, createBodyGeometry, createFaceGeometry, type CardDimensions } from "./internal/cardGeometry";
import { createCardMaterials } from "./internal/cardMaterials";

export interface CardSceneHandle {
  object: THREE.Group;
  revision: number;
}

export interface ThreeCardRendererOptions {
  dimensions?: Partial<CardDimensions>;
}

type Tween = {
  from: CardPose;
  to: CardPose;
  elapsedMs: number;
  durationMs: number;
  easing: EasingFn;
};

const REST_POSE: CardPose = Object.freeze({ yaw: 0, pitch: 0, scale: 1, isShowingBack: false });

function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

/**
 * three.js side of the card. Owns a stable `root` group for the scene graph;
 * each rebuild swaps the card object inside it.
 */
export class ThreeCardRenderer implements CardRenderer<CardSceneHandle> {
  readonly root = new THREE.Group();
  private readonly dimensions: CardDimensions;
  private card: THREE.Group | null = null;
  private revision = 0;
  private displayed: CardPose = REST_POSE;
  private tween: Tween | null = null;

  constructor(opts?: ThreeCardRendererOptions) {
    this.dimensions = { ...DEFAULT_CARD_DIMENSIONS, ...(opts?.dimensions ?? {}) };
    this.root.name = "card-root";
  }

  rebuild(scene: CardSceneSpec): CardSceneHandle {
    this.disposeCard();

    const { thickness } = this.dimensions;
    const materials = createCardMaterials(scene.style);
    const faceGeometry = createFaceGeometry(this.dimensions);

    const body = new THREE.Mesh(createBodyGeometry(this.dimensions), materials.body);
    body.name = "body";

    const front = new THREE.Mesh(faceGeometry, materials.front);
    front.name = "front";
    front.position.z = thickness / 2 + FACE_OFFSET;

    const back = new THREE.Mesh(faceGeometry.clone(), materials.back);
    back.name = "back";
    back.position.z = -(thickness / 2 + FACE_OFFSET);
    back.rotation.y = Math.PI;

    const card = new THREE.Group();
    card.name = "card";
    card.add(body, front, back);
    card.userData.fields = cardFields(scene.data, scene.visibility);
    card.userData.textures = cardTextureNames(scene.style);

    this.card = card;
    this.root.add(card);
    this.applyPose(this.displayed);
    this.revision += 1;
    return { object: card, revision: this.revision };
  }

  commit(pose: CardPose, hint?: RenderHint): void {
    if (!hint || hint.durationMs <= 0) {
      this.tween = null;
      this.displayed = pose;
      this.applyPose(pose);
      return;
    }
    this.tween = {
      from: this.displayed,
      to: pose,
      elapsedMs: 0,
      durationMs: hint.durationMs,
      easing: resolveEasing(hint.easing),
    };
  }

  /** Advances the running tween; returns whether one is still in flight. */
  step(dtSeconds: number): boolean {
    const tween = this.tween;
    if (!tween) return false;

    tween.elapsedMs += Math.max(0, dtSeconds) * 1000;
    const t = Math.min(tween.elapsedMs / tween.durationMs, 1);
    const k = tween.easing(t);
    this.displayed = {
      yaw: lerp(tween.from.yaw, tween.to.yaw, k),
      pitch: lerp(tween.from.pitch, tween.to.pitch, k),
      scale: lerp(tween.from.scale, tween.to.scale, k),
      isShowingBack: tween.to.isShowingBack,
    };
    if (t >= 1) {
      this.displayed = tween.to;
      this.tween = null;
    }
    this.applyPose(this.displayed);
    return this.tween !== null;
  }

  getDisplayedPose(): CardPose {
    return this.displayed;
  }

  getCard(): THREE.Group | null {
    return this.card;
  }

  dispose(): void {
    this.tween = null;
    this.disposeCard();
  }

  private applyPose(pose: CardPose): void {
    const card = this.card;
    if (!card) return;
    card.rotation.set(pose.pitch, pose.yaw, 0, "YXZ");
    card.scale.setScalar(pose.scale);
  }

  private disposeCard(): void {
    const card = this.card;
    if (!card) return;
    this.root.remove(card);
    card.traverse((child) => {
      if (child instanceof THREE.Mesh) {
        child.geometry.dispose();
        const material: THREE.Material | THREE.Material[] = child.material;
        (Array.isArray(material) ? material : [material]).forEach((m) => m.dispose());
      }
    });
    this.card = null;
  }
}
