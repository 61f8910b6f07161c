/**
 * Identity Allocator
 *
 * Generated identifiers are `${prefix}##${n}` where `n` counts calls since
 * the start of the frame. The same call order produces the same identifiers
 * every frame; inserting, removing or reordering a call shifts the
 * identifiers of every widget generated after it.
 */

import type { WidgetId } from "./StateStore";

export class IdAllocator {
  private counter: number = 0;

  /**
   * Reset the sequence. Called at the start of each frame.
   */
  beginFrame(): void {
    this.counter = 0;
  }

  generateID(prefix: string): WidgetId {
    this.counter++;
    return `${prefix}##${this.counter}`;
  }

  /** Number of identifiers generated so far this frame */
  getCount(): number {
    return this.counter;
  }
}
