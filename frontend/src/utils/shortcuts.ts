import type { SessionAction } from "../types";

/**
 * Maps a keypress to an action: digits rate (up to `numClasses`, at most
 * 9), X toggles the mark, arrows navigate, U undoes.
 */
export const actionForKey = (key: string, numClasses: number): SessionAction | null => {
  if (/^[1-9]$/.test(key)) {
    const rating = Number(key);
    return rating <= numClasses ? { type: "rate", rating } : null;
  }

  switch (key) {
    case "x":
    case "X":
      return { type: "mark" };
    case "ArrowLeft":
      return { type: "prev" };
    case "ArrowRight":
      return { type: "next" };
    case "u":
    case "U":
      return { type: "undo" };
    default:
      return null;
  }
};

/** Typing into a form field should never trigger a shortcut. */
export const isEditableTarget = (target: EventTarget | null): boolean => {
  if (!(target instanceof HTMLElement)) return false;
  return (
    target.isContentEditable ||
    ["INPUT", "TEXTAREA", "SELECT"].includes(target.tagName)
  );
};
