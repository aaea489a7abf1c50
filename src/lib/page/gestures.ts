/**
 * W3C Actions API types and the fixed pointer sequences page gestures perform
 */
export interface W3CPointerStep {
  type: "pointerMove" | "pointerDown" | "pointerUp" | "pause";
  duration?: number;
  x?: number;
  y?: number;
  button?: number;
  origin?: "viewport" | "pointer";
}

export interface W3CPointerAction {
  type: "pointer";
  id: string;
  parameters: {
    pointerType: "touch" | "pen" | "mouse";
  };
  actions: W3CPointerStep[];
}

export type W3CAction = W3CPointerAction;

// Hold time between pointerDown and pointerUp for a tap
export const TAP_PRESS_MS = 100;
export const DEFAULT_SWIPE_MS = 250;
const LEFT_BUTTON = 0;

export function tapActions(x: number, y: number): W3CPointerAction[] {
  return [
    {
      type: "pointer",
      id: "finger1",
      parameters: { pointerType: "touch" },
      actions: [
        {
          type: "pointerMove",
          duration: 0,
          x: Math.round(x),
          y: Math.round(y),
          origin: "viewport",
        },
        { type: "pointerDown", button: LEFT_BUTTON },
        { type: "pause", duration: TAP_PRESS_MS },
        { type: "pointerUp", button: LEFT_BUTTON },
      ],
    },
  ];
}

export function swipeActions(
  startX: number,
  startY: number,
  endX: number,
  endY: number,
  duration: number = DEFAULT_SWIPE_MS
): W3CPointerAction[] {
  return [
    {
      type: "pointer",
      id: "finger1",
      parameters: { pointerType: "touch" },
      actions: [
        {
          type: "pointerMove",
          duration: 0,
          x: Math.round(startX),
          y: Math.round(startY),
          origin: "viewport",
        },
        { type: "pointerDown", button: LEFT_BUTTON },
        {
          type: "pointerMove",
          duration: Math.max(0, Math.round(duration)),
          x: Math.round(endX),
          y: Math.round(endY),
          origin: "viewport",
        },
        { type: "pointerUp", button: LEFT_BUTTON },
      ],
    },
  ];
}

/**
 * Mouse move relative to the current pointer position, optionally clicking there
 */
export function moveByOffsetActions(
  x: number,
  y: number,
  click: boolean = false
): W3CPointerAction[] {
  const actions: W3CPointerStep[] = [
    {
      type: "pointerMove",
      duration: 0,
      x: Math.round(x),
      y: Math.round(y),
      origin: "pointer",
    },
  ];
  if (click) {
    actions.push(
      { type: "pointerDown", button: LEFT_BUTTON },
      { type: "pointerUp", button: LEFT_BUTTON }
    );
  }

  return [
    {
      type: "pointer",
      id: "mouse",
      parameters: { pointerType: "mouse" },
      actions,
    },
  ];
}

export function releaseActions(): W3CPointerAction[] {
  return [
    {
      type: "pointer",
      id: "mouse",
      parameters: { pointerType: "mouse" },
      actions: [{ type: "pointerUp", button: LEFT_BUTTON }],
    },
  ];
}
