import React, { useCallback, useEffect, useMemo, useRef, useState } from "react";
import { createRoot } from "react-dom/client";
import {
  carouselRotation,
  defaultTextVisibility,
  shouldPushRotation,
  type CardData,
  type CardStyle,
} from "@tiltcard/card-core";
import type { CardControllerError, CardHostConfig, InteractionMode, OrientationChange } from "@tiltcard/control-core";
import { useCardController } from "@tiltcard/card-react";
import { CardCanvas, ThreeCardRenderer } from "@tiltcard/card-three";

import "./style.css";

type ModeKind = "freeRotation" | "tapOnly" | "disabled";
type LogEntry = { id: number; at: number; text: string };

const LOG_LIMIT = 20;

const sampleCards: { data: CardData; style: CardStyle }[] = [
  {
    data: { cardholderName: "Sample Holder", cardNumber: "4000 0000 0000 0002", expiryDate: "01/30", cvv: "123" },
    style: { kind: "opaqueTextured", design: 1 },
  },
  {
    data: { cardholderName: "Demo Person", cardNumber: "5500 0000 0000 0004", expiryDate: "06/29", cvv: "456" },
    style: { kind: "alphaTextured", design: 3, backgroundColor: "#1f2a44" },
  },
  {
    data: { cardholderName: "Test Account", cardNumber: "3400 000000 00009", expiryDate: "11/31", cvv: "7890" },
    style: { kind: "opaqueTextured", design: 5 },
  },
];

type CarouselCardProps = {
  data: CardData;
  style: CardStyle;
  interaction: InteractionMode;
  viewportRef: React.RefObject<HTMLDivElement>;
  onEvent: (text: string) => void;
};

function CarouselCard({ data, style, interaction, viewportRef, onEvent }: CarouselCardProps) {
  const renderer = useMemo(() => new ThreeCardRenderer(), []);
  const [rotation, setRotation] = useState(0);
  const rotationRef = useRef(0);

  const host: CardHostConfig = useMemo(
    () => ({ data, style, visibility: defaultTextVisibility, rotation, interaction }),
    [data, style, rotation, interaction]
  );

  const onPoseChange = useCallback(
    (change: OrientationChange) => {
      if (change.source === "flip") {
        onEvent(`${data.cardholderName}: ${change.pose.isShowingBack ? "back" : "front"}`);
      }
    },
    [data.cardholderName, onEvent]
  );

  const onError = useCallback(
    (error: CardControllerError) => onEvent(`${data.cardholderName}: ${error.type}`),
    [data.cardholderName, onEvent]
  );

  const { targetRef } = useCardController({ host, renderer, onPoseChange, onError });

  useEffect(() => {
    const viewport = viewportRef.current;
    const el = targetRef.current;
    if (!viewport || !el) return;

    const measure = () => {
      const box = el.getBoundingClientRect();
      const frame = viewport.getBoundingClientRect();
      const next = carouselRotation(box.left + box.width / 2 - frame.left, frame.width);
      if (shouldPushRotation(next, rotationRef.current)) {
        rotationRef.current = next;
        setRotation(next);
      }
    };

    measure();
    viewport.addEventListener("scroll", measure, { passive: true });
    window.addEventListener("resize", measure);
    return () => {
      viewport.removeEventListener("scroll", measure);
      window.removeEventListener("resize", measure);
    };
  }, [targetRef, viewportRef]);

  useEffect(() => () => renderer.dispose(), [renderer]);

  return (
    <div className="card-slot" ref={targetRef}>
      <CardCanvas renderer={renderer} />
    </div>
  );
}

function App() {
  const viewportRef = useRef<HTMLDivElement>(null);
  const [modeKind, setModeKind] = useState<ModeKind>("freeRotation");
  const [log, setLog] = useState<LogEntry[]>([]);
  const logIdRef = useRef(0);

  const interaction = useMemo<InteractionMode>(() => ({ kind: modeKind }), [modeKind]);

  const onEvent = useCallback((text: string) => {
    const entry = { id: ++logIdRef.current, at: Date.now(), text };
    setLog((prev) => [entry, ...prev].slice(0, LOG_LIMIT));
  }, []);

  return (
    <div className="app">
      <header className="hud">
        <div>
          <strong>Card Sandbox</strong>
          <div className="sub">Drag to rotate, tap to flip, scroll the carousel to tilt.</div>
        </div>
        <div className="controls">
          <label className="badge select-badge">
            Interaction
            <select value={modeKind} onChange={(e) => setModeKind(parseMode(e.target.value))}>
              <option value="freeRotation">Free rotation</option>
              <option value="tapOnly">Tap only</option>
              <option value="disabled">Disabled</option>
            </select>
          </label>
        </div>
      </header>

      <div className="carousel" ref={viewportRef}>
        {sampleCards.map((card) => (
          <CarouselCard
            key={card.data.cardNumber}
            data={card.data}
            style={card.style}
            interaction={interaction}
            viewportRef={viewportRef}
            onEvent={onEvent}
          />
        ))}
      </div>

      <div className="log-list">
        {log.length === 0 && <div className="log-empty">No events yet.</div>}
        {log.map((entry) => (
          <div key={entry.id} className="log-row">
            <span className="log-time">{formatTime(entry.at)}</span>
            <span className="log-cmd">{entry.text}</span>
          </div>
        ))}
      </div>
    </div>
  );
}

function parseMode(value: string): ModeKind {
  return value === "tapOnly" || value === "disabled" ? value : "freeRotation";
}

function formatTime(at: number) {
  return new Date(at).toLocaleTimeString([], { hour12: false });
}

const root = document.getElementById("root");
if (root) {
  createRoot(root).render(<App />);
}
