import { BUILTIN_TEMPLATES, LOG_PREFIX } from "./constants.js";
import type { TagRegistryOptions } from "./types.js";

/**
 * Registry mapping error tags to message templates
 *
 * A template is a printf-style string rendered by `formatTemplate`.
 * Registrations insert or overwrite; nothing is ever removed except by
 * {@link TagRegistry.reset}.
 *
 * @example
 * ```typescript
 * const registry = new TagRegistry();
 *
 * registry.register('WARNING', 'Some files could not be opened');
 * registry.register('WFILE', '\t%s');
 *
 * registry.lookup('ESTAT'); // 'Cannot stat file:[%s]'
 * ```
 */
export class TagRegistry {
  private readonly templates = new Map<string, string>();
  private readonly includeBuiltins: boolean;
  private readonly warnOnOverride: boolean;

  constructor(options: TagRegistryOptions = {}) {
    this.includeBuiltins = options.includeBuiltins ?? true;
    this.warnOnOverride = options.warnOnOverride ?? false;
    this.loadBuiltins();
  }

  /**
   * Register a tag with its message template, replacing any previous one.
   *
   * @returns the tag, so a registration can be used inline
   */
  register(tag: string, template: string): string {
    const previous = this.templates.get(tag);
    if (this.warnOnOverride && previous !== undefined && previous !== template) {
      console.warn(`${LOG_PREFIX} Overriding template for tag '${tag}'`);
    }
    this.templates.set(tag, template);
    return tag;
  }

  lookup(tag: string): string | undefined {
    return this.templates.get(tag);
  }

  has(tag: string): boolean {
    return this.templates.has(tag);
  }

  /**
   * Get all registered tags, in registration order
   */
  tags(): string[] {
    return Array.from(this.templates.keys());
  }

  get size(): number {
    return this.templates.size;
  }

  /**
   * Drop every registration and reload the built-in table
   * (when the registry was created with it).
   */
  reset(): void {
    this.templates.clear();
    this.loadBuiltins();
  }

  private loadBuiltins(): void {
    if (!this.includeBuiltins) {
      return;
    }
    for (const [tag, template] of Object.entries(BUILTIN_TEMPLATES)) {
      this.templates.set(tag, template);
    }
  }
}
