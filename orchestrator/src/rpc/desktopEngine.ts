import {
  AutomationEngine,
  ControlAttributes,
  ControlQuery,
  ControlRef,
  DragOptions,
  InjectionFailureError,
  InputEventSource,
  KeyEvent,
  NotFoundError,
  Point,
  PointerEvent,
  QueryScope,
  Rect,
  Result,
  WindowRef,
  attempt,
  describeError,
  err,
  ok,
} from "@uimacro/shared";
import { z } from "zod";
import {
  DesktopRpcMethods,
  DesktopRpcNotifications,
  InputChannel,
  WindowInfo,
  attributesResultSchema,
  elementListResultSchema,
  elementResultSchema,
  keyNotificationSchema,
  okResultSchema,
  pointSchema,
  pointerNotificationSchema,
  rectSchema,
  windowListResultSchema,
  windowOfResultSchema,
} from "./contracts";
import { DesktopClient } from "./desktopClient";

// Input injection failures are reported as InjectionFailure; lookups are not.
async function inject(what: string, task: () => Promise<unknown>): Promise<void> {
  try {
    await task();
  } catch (error) {
    throw new InjectionFailureError(`${what} failed: ${describeError(error)}`, {
      cause: error,
    });
  }
}

export class RpcControl implements ControlRef {
  readonly id: string;
  protected client: DesktopClient;

  constructor(client: DesktopClient, id: string) {
    this.client = client;
    this.id = id;
  }

  attributes(): Promise<Result<ControlAttributes>> {
    return attempt(() =>
      this.client.call(
        DesktopRpcMethods.elementAttributes,
        { element: this.id },
        attributesResultSchema,
      ),
    );
  }

  async parent(): Promise<Result<ControlRef | null>> {
    const result = await attempt(() =>
      this.client.call(DesktopRpcMethods.elementParent, { element: this.id }, elementResultSchema),
    );
    if (!result.ok) {
      return result;
    }
    const parent = result.value.element;
    return ok(parent === null ? null : new RpcControl(this.client, parent));
  }

  children(): Promise<Result<ControlRef[]>> {
    return this.elements(DesktopRpcMethods.elementChildren, { element: this.id });
  }

  findAll(query: ControlQuery, scope: QueryScope): Promise<Result<ControlRef[]>> {
    return this.elements(DesktopRpcMethods.elementFind, { element: this.id, query, scope });
  }

  rectangle(): Promise<Result<Rect>> {
    return attempt(() =>
      this.client.call(DesktopRpcMethods.elementRectangle, { element: this.id }, rectSchema),
    );
  }

  click(): Promise<void> {
    return inject(`click on ${this.id}`, () =>
      this.client.call(DesktopRpcMethods.elementClick, { element: this.id }, okResultSchema),
    );
  }

  setText(text: string, options: { enter?: boolean } = {}): Promise<void> {
    return inject(`setText on ${this.id}`, () =>
      this.client.call(
        DesktopRpcMethods.elementSetText,
        { element: this.id, text, enter: options.enter ?? false },
        okResultSchema,
      ),
    );
  }

  private async elements(
    method: typeof DesktopRpcMethods.elementChildren | typeof DesktopRpcMethods.elementFind,
    params: Record<string, unknown>,
  ): Promise<Result<ControlRef[]>> {
    const result = await attempt(() => this.client.call(method, params, elementListResultSchema));
    if (!result.ok) {
      return result;
    }
    return ok(result.value.elements.map((id) => new RpcControl(this.client, id)));
  }
}

export class RpcWindow extends RpcControl implements WindowRef {
  readonly handle: number;
  readonly title: string;
  readonly pid?: number;

  constructor(client: DesktopClient, info: WindowInfo) {
    super(client, info.element);
    this.handle = info.handle;
    this.title = info.title;
    this.pid = info.pid;
  }
}

/** AutomationEngine backed by the desktop runner process. */
export class RpcAutomationEngine implements AutomationEngine {
  private client: DesktopClient;

  constructor(client: DesktopClient) {
    this.client = client;
  }

  async listWindows(): Promise<WindowRef[]> {
    const result = await this.client.call(
      DesktopRpcMethods.windowList,
      {},
      windowListResultSchema,
    );
    return result.windows.map((info) => new RpcWindow(this.client, info));
  }

  async focusWindow(window: WindowRef): Promise<void> {
    await inject(`focus of window ${window.handle}`, () =>
      this.client.call(DesktopRpcMethods.windowFocus, { handle: window.handle }, okResultSchema),
    );
  }

  async elementFromPoint(point: Point): Promise<Result<ControlRef>> {
    const result = await attempt(() =>
      this.client.call(DesktopRpcMethods.elementFromPoint, { ...point }, elementResultSchema),
    );
    if (!result.ok) {
      return result;
    }
    if (result.value.element === null) {
      return err(new NotFoundError(`No element at (${point.x},${point.y})`));
    }
    return ok(new RpcControl(this.client, result.value.element));
  }

  async windowOf(control: ControlRef): Promise<Result<WindowRef>> {
    const result = await attempt(() =>
      this.client.call(
        DesktopRpcMethods.elementWindowOf,
        { element: control.id },
        windowOfResultSchema,
      ),
    );
    if (!result.ok) {
      return result;
    }
    if (result.value.window === null) {
      return err(new NotFoundError(`Element ${control.id} has no top-level window`));
    }
    return ok(new RpcWindow(this.client, result.value.window));
  }

  cursorPosition(): Promise<Point> {
    return this.client.call(DesktopRpcMethods.inputCursorPos, {}, pointSchema);
  }

  clickAt(point: Point): Promise<void> {
    return inject(`click at (${point.x},${point.y})`, () =>
      this.client.call(
        DesktopRpcMethods.inputClick,
        { x: point.x, y: point.y, button: "left" },
        okResultSchema,
      ),
    );
  }

  drag(from: Point, to: Point, options: DragOptions): Promise<void> {
    return inject(`drag from (${from.x},${from.y})`, () =>
      this.client.call(
        DesktopRpcMethods.inputDrag,
        { from, to, duration_ms: options.durationMs, steps: options.steps },
        okResultSchema,
      ),
    );
  }

  launchApp(name: string, options: { delayMs: number }): Promise<void> {
    return inject(`launch of ${name}`, () =>
      this.client.call(
        DesktopRpcMethods.inputLaunchApp,
        { app: name, delay_ms: options.delayMs },
        okResultSchema,
      ),
    );
  }
}

/**
 * System-wide input events forwarded by the desktop runner as
 * notifications. The runner only emits a channel while subscribed.
 */
export class RpcInputSource<E> implements InputEventSource<E> {
  private client: DesktopClient;
  private channel: InputChannel;
  private schema: z.ZodType<E, z.ZodTypeDef, unknown>;
  private detach: (() => void) | null = null;

  constructor(
    client: DesktopClient,
    channel: InputChannel,
    schema: z.ZodType<E, z.ZodTypeDef, unknown>,
  ) {
    this.client = client;
    this.channel = channel;
    this.schema = schema;
  }

  async start(listener: (event: E) => void): Promise<void> {
    if (this.detach) {
      return;
    }
    this.detach = this.client.onNotification(DesktopRpcNotifications[this.channel], (params) => {
      const parsed = this.schema.safeParse(params);
      if (parsed.success) {
        listener(parsed.data);
      }
    });
    await this.client.call(
      DesktopRpcMethods.inputSubscribe,
      { channel: this.channel },
      okResultSchema,
    );
  }

  async stop(): Promise<void> {
    if (!this.detach) {
      return;
    }
    this.detach();
    this.detach = null;
    if (this.client.running) {
      await this.client.call(
        DesktopRpcMethods.inputUnsubscribe,
        { channel: this.channel },
        okResultSchema,
      );
    }
  }
}

export function pointerEvents(client: DesktopClient): RpcInputSource<PointerEvent> {
  return new RpcInputSource<PointerEvent>(client, "pointer", pointerNotificationSchema);
}

export function keyEvents(client: DesktopClient): RpcInputSource<KeyEvent> {
  return new RpcInputSource<KeyEvent>(client, "key", keyNotificationSchema);
}
