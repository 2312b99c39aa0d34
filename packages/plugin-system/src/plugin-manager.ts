import type {
  BlockDefinition,
  FormBlocksPlugin,
  PluginContext,
  SubmissionHook,
  SubmissionHookHandler,
  SubmissionPayload
} from "./types";

export class PluginRegistrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PluginRegistrationError";
  }
}

export class BlockPluginManager {
  private plugins = new Set<string>();
  private blocks = new Map<string, BlockDefinition>();
  private hooks = new Map<SubmissionHook, SubmissionHookHandler[]>();

  use(plugin: FormBlocksPlugin): this {
    if (this.plugins.has(plugin.name)) {
      throw new PluginRegistrationError(`Plugin "${plugin.name}" is already registered`);
    }

    // A plugin's registrations take effect only once its register call returns.
    const blocks = new Map<string, BlockDefinition>();
    const hooks: Array<[SubmissionHook, SubmissionHookHandler]> = [];
    const ctx: PluginContext = {
      registerBlock: (definition) => {
        if (this.blocks.has(definition.type) || blocks.has(definition.type)) {
          throw new PluginRegistrationError(`Block type "${definition.type}" is already registered`);
        }
        blocks.set(definition.type, definition);
      },
      addHook: (hook, handler) => {
        hooks.push([hook, handler]);
      }
    };
    plugin.register(ctx);

    for (const [type, definition] of blocks) {
      this.blocks.set(type, definition);
    }
    for (const [hook, handler] of hooks) {
      const list = this.hooks.get(hook) ?? [];
      list.push(handler);
      this.hooks.set(hook, list);
    }
    this.plugins.add(plugin.name);
    return this;
  }

  has(pluginName: string): boolean {
    return this.plugins.has(pluginName);
  }

  resolve(type: string): BlockDefinition | undefined {
    return this.blocks.get(type);
  }

  list(): BlockDefinition[] {
    return [...this.blocks.values()];
  }

  // Handlers run in registration order; one returning nothing passes the payload through unchanged.
  async runHook(hook: SubmissionHook, payload: SubmissionPayload): Promise<SubmissionPayload> {
    const handlers = this.hooks.get(hook) ?? [];
    let current = payload;
    for (const handler of handlers) {
      current = (await handler(current)) ?? current;
    }
    return current;
  }
}
