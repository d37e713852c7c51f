import type { Result } from "./result";

export interface Point {
  x: number;
  y: number;
}

export interface Rect {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface ControlAttributes {
  control_type?: string;
  name?: string;
  stable_id?: string;
  native_class?: string;
}

export interface ControlQuery {
  stable_id?: string;
  control_type?: string;
  name?: string;
}

export type QueryScope = "children" | "descendants";

/**
 * A live accessibility-tree element. References are only valid for the
 * duration of one step; the engine may reissue them at any time.
 */
export interface ControlRef {
  /** Engine runtime id; two refs to the same element share it. */
  readonly id: string;
  attributes(): Promise<Result<ControlAttributes>>;
  parent(): Promise<Result<ControlRef | null>>;
  children(): Promise<Result<ControlRef[]>>;
  /** Attribute-indexed lookup. Every match is returned, in tree order. */
  findAll(query: ControlQuery, scope: QueryScope): Promise<Result<ControlRef[]>>;
  rectangle(): Promise<Result<Rect>>;
  click(): Promise<void>;
  setText(text: string, options?: { enter?: boolean }): Promise<void>;
}

export interface WindowRef extends ControlRef {
  readonly handle: number;
  readonly title: string;
  readonly pid?: number;
}

export interface DragOptions {
  durationMs: number;
  steps: number;
}

export interface AutomationEngine {
  /** Top-level windows in OS enumeration order. */
  listWindows(): Promise<WindowRef[]>;
  focusWindow(window: WindowRef): Promise<void>;
  elementFromPoint(point: Point): Promise<Result<ControlRef>>;
  windowOf(control: ControlRef): Promise<Result<WindowRef>>;
  cursorPosition(): Promise<Point>;
  clickAt(point: Point): Promise<void>;
  drag(from: Point, to: Point, options: DragOptions): Promise<void>;
  launchApp(name: string, options: { delayMs: number }): Promise<void>;
}

export type PointerButton = "left" | "right" | "middle";

export interface PointerEvent {
  x: number;
  y: number;
  button: PointerButton;
  pressed: boolean;
}

/**
 * `key` is a key name ("Enter", "Backspace", "F9", "a"); `char` is the
 * printable text the key produced, when it produced any.
 */
export interface KeyEvent {
  key: string;
  char?: string;
}

export interface InputEventSource<E> {
  start(listener: (event: E) => void): Promise<void>;
  stop(): Promise<void>;
}
