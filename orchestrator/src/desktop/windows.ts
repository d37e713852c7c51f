import {
  AutomationEngine,
  MacroSyntaxError,
  NotFoundError,
  WindowDescriptor,
  WindowRef,
  describeWindow,
} from "@uimacro/shared";

export function compilePattern(source: string, what: string): RegExp {
  try {
    return new RegExp(source);
  } catch (error) {
    throw new MacroSyntaxError(`Invalid ${what} regex: ${source}`, { cause: error });
  }
}

/**
 * Finds top-level windows. The first match in the engine's window order
 * wins; `pid` on a descriptor is informational and never matched.
 */
export class WindowLocator {
  private engine: AutomationEngine;

  constructor(engine: AutomationEngine) {
    this.engine = engine;
  }

  async locate(descriptor: WindowDescriptor): Promise<WindowRef> {
    const matches = this.matcher(descriptor);
    const windows = await this.engine.listWindows();
    const window = windows.find(matches);
    if (!window) {
      throw new NotFoundError(`No window matches ${describeWindow(descriptor)}`);
    }
    return window;
  }

  async focus(window: WindowRef): Promise<WindowRef> {
    await this.engine.focusWindow(window);
    return window;
  }

  async locateAndFocus(descriptor: WindowDescriptor): Promise<WindowRef> {
    return this.focus(await this.locate(descriptor));
  }

  private matcher(descriptor: WindowDescriptor): (window: WindowRef) => boolean {
    if (descriptor.handle !== undefined) {
      const handle = descriptor.handle;
      return (window) => window.handle === handle;
    }
    if (descriptor.title !== undefined) {
      const title = descriptor.title;
      return (window) => window.title === title;
    }
    if (descriptor.title_regex !== undefined) {
      const pattern = compilePattern(descriptor.title_regex, "window title");
      return (window) => pattern.test(window.title);
    }
    throw new MacroSyntaxError("Window descriptor needs one of title, title_regex or handle");
  }
}
