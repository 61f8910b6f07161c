/**
 * Style Stack Tracker
 *
 * Counts pushes and pops per category so an unbalanced scope is caught at
 * the pop that underflows, or at frame end, instead of corrupting the
 * backend for every following frame.
 */

import { UIInvariantError } from "./errors";

export type StackCategory = "color" | "styleVar" | "font" | "disabled" | "itemWidth" | "overlay";

const CATEGORIES: readonly StackCategory[] = ["color", "styleVar", "font", "disabled", "itemWidth", "overlay"];

export class StyleStack {
  private depths: Record<StackCategory, number> = {
    color: 0,
    styleVar: 0,
    font: 0,
    disabled: 0,
    itemWidth: 0,
    overlay: 0,
  };

  push(category: StackCategory): void {
    this.depths[category]++;
  }

  pop(category: StackCategory, count: number = 1): void {
    if (count < 0 || !Number.isInteger(count)) {
      throw new UIInvariantError("StyleStack.pop", `invalid ${category} pop count ${count}`);
    }
    if (count > this.depths[category]) {
      throw new UIInvariantError(
        "StyleStack.pop",
        `popping ${count} ${category} entries with only ${this.depths[category]} pushed`
      );
    }
    this.depths[category] -= count;
  }

  depth(category: StackCategory): number {
    return this.depths[category];
  }

  /**
   * Throw if any category still has entries pushed.
   */
  assertBalanced(scope: string): void {
    const open = CATEGORIES.filter((category) => this.depths[category] !== 0);
    if (open.length > 0) {
      const detail = open.map((category) => `${category}=${this.depths[category]}`).join(", ");
      throw new UIInvariantError(scope, `unbalanced style stack at frame end (${detail})`);
    }
  }

  reset(): void {
    for (const category of CATEGORIES) {
      this.depths[category] = 0;
    }
  }
}
