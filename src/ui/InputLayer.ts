/**
 * Input Layer
 *
 * Keyboard state for widgets that react to keys themselves (autocomplete
 * confirmation). The host forwards key events between frames; per-frame
 * state is visible during the next build pass and cleared when it ends.
 */

export class InputLayer {
  private keysDownThisFrame: Set<string> = new Set();
  private keysHeld: Set<string> = new Set();
  private inputBuffer: string = "";

  /**
   * Forward a key press.
   */
  keyDown(key: string): void {
    this.keysDownThisFrame.add(key);
    this.keysHeld.add(key);
  }

  /**
   * Forward a key release.
   */
  keyUp(key: string): void {
    this.keysHeld.delete(key);
  }

  /**
   * Forward typed text (after keyboard layout and IME processing).
   */
  typeText(text: string): void {
    this.inputBuffer += text;
  }

  /**
   * Called at the end of each frame.
   */
  endFrame(): void {
    this.keysDownThisFrame.clear();
    this.inputBuffer = "";
  }

  /**
   * Check if a key was pressed since the last frame ended.
   */
  isKeyPressed(key: string): boolean {
    return this.keysDownThisFrame.has(key);
  }

  isKeyHeld(key: string): boolean {
    return this.keysHeld.has(key);
  }

  /** Text typed since the last frame ended */
  getInputBuffer(): string {
    return this.inputBuffer;
  }

  /**
   * Drop all key state, e.g. when the host window loses focus.
   */
  reset(): void {
    this.keysDownThisFrame.clear();
    this.keysHeld.clear();
    this.inputBuffer = "";
  }
}
