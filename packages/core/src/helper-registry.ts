import type { HelperDelegate } from "handlebars";

/**
 * Named template helpers shared by every artifact of a project.
 *
 * The control file runs on every sync and re-registers its helpers each time,
 * so registration overwrites in place. The registry object itself is never
 * replaced: renderers holding a reference see the latest definitions.
 */
export class HelperRegistry {
  private readonly helpers = new Map<string, HelperDelegate>();

  register(name: string, helper: HelperDelegate): void {
    if (name.length === 0) {
      throw new Error("Helper name must not be empty");
    }
    this.helpers.set(name, helper);
  }

  get(name: string): HelperDelegate | undefined {
    return this.helpers.get(name);
  }

  has(name: string): boolean {
    return this.helpers.has(name);
  }

  names(): string[] {
    return Array.from(this.helpers.keys());
  }

  get size(): number {
    return this.helpers.size;
  }

  entries(): IterableIterator<[string, HelperDelegate]> {
    return this.helpers.entries();
  }
}
