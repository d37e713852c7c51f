import { z } from "zod";

export const DesktopRpcMethods = {
  systemPing: "system.ping",
  windowList: "window.list",
  windowFocus: "window.focus",
  elementFromPoint: "element.fromPoint",
  elementWindowOf: "element.windowOf",
  elementAttributes: "element.attributes",
  elementParent: "element.parent",
  elementChildren: "element.children",
  elementFind: "element.find",
  elementClick: "element.click",
  elementSetText: "element.setText",
  elementRectangle: "element.rectangle",
  inputClick: "input.click",
  inputDrag: "input.drag",
  inputLaunchApp: "input.launchApp",
  inputCursorPos: "input.cursorPos",
  inputSubscribe: "input.subscribe",
  inputUnsubscribe: "input.unsubscribe",
} as const;

export type DesktopRpcMethod =
  (typeof DesktopRpcMethods)[keyof typeof DesktopRpcMethods];

export const DesktopRpcNotifications = {
  pointer: "input.pointer",
  key: "input.key",
} as const;

export type DesktopRpcNotification =
  (typeof DesktopRpcNotifications)[keyof typeof DesktopRpcNotifications];

export type InputChannel = keyof typeof DesktopRpcNotifications;

// Runners written in other languages send null for absent attributes.
const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

export const pingResultSchema = z.object({
  ok: z.boolean(),
  service: z.string(),
  version: z.string(),
});

export const okResultSchema = z.object({ ok: z.boolean() });

export const windowInfoSchema = z.object({
  element: z.string(),
  handle: z.number().int(),
  title: z.string().nullish().transform((value) => value ?? ""),
  pid: z
    .number()
    .int()
    .nullish()
    .transform((value) => value ?? undefined),
});

export type WindowInfo = z.infer<typeof windowInfoSchema>;

export const windowListResultSchema = z.object({ windows: z.array(windowInfoSchema) });

export const windowOfResultSchema = z.object({ window: windowInfoSchema.nullable() });

export const elementResultSchema = z.object({ element: z.string().nullable() });

export const elementListResultSchema = z.object({ elements: z.array(z.string()) });

export const attributesResultSchema = z.object({
  control_type: optionalText,
  name: optionalText,
  stable_id: optionalText,
  native_class: optionalText,
});

export const rectSchema = z.object({
  left: z.number(),
  top: z.number(),
  right: z.number(),
  bottom: z.number(),
});

export const pointSchema = z.object({ x: z.number(), y: z.number() });

export const pointerNotificationSchema = z.object({
  x: z.number(),
  y: z.number(),
  button: z.enum(["left", "right", "middle"]),
  pressed: z.boolean(),
});

export const keyNotificationSchema = z.object({
  key: z.string(),
  char: optionalText,
});

export const rpcErrorPayloadSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

export type JsonRpcErrorPayload = z.infer<typeof rpcErrorPayloadSchema>;

export const rpcMessageSchema = z.object({
  jsonrpc: z.literal("2.0").optional(),
  id: z.number().int().nullish(),
  result: z.unknown().optional(),
  error: rpcErrorPayloadSchema.optional(),
  method: z.string().optional(),
  params: z.unknown().optional(),
});
