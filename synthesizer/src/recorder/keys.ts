import type { KeyEvent } from "@uimacro/shared";

export type KeyKind = "stop" | "enter" | "printable" | "special";

export function classifyKey(event: KeyEvent, stopKey: string): KeyKind {
  if (event.key === stopKey) {
    return "stop";
  }
  if (event.key === "Enter") {
    return "enter";
  }
  if (event.char !== undefined && event.char.length > 0 && event.char >= " ") {
    return "printable";
  }
  return "special";
}
