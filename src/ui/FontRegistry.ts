/**
 * Font Registry
 *
 * Tracks which fonts the backend has loaded. Loading itself happens outside
 * the layer: fonts requested during a frame are queued and the host drains
 * the queue, loads the atlases, and registers the results.
 */

/** Font face identified by name and pixel size */
export class FontInfo {
  readonly name: string;
  readonly size: number;

  constructor(name: string, size: number) {
    this.name = name;
    this.size = size;
  }

  /** Registry key, e.g. "Inter:14" */
  get key(): string {
    return `${this.name}:${this.size}`;
  }

  withSize(size: number): FontInfo {
    return new FontInfo(this.name, size);
  }

  toString(): string {
    return this.key;
  }
}

export class FontRegistry {
  private loaded = new Map<string, FontInfo>();
  private pending = new Map<string, FontInfo>();
  private warned = new Set<string>();
  private defaultFont: FontInfo;

  constructor(defaultFont: FontInfo) {
    this.defaultFont = defaultFont;
    this.loaded.set(defaultFont.key, defaultFont);
  }

  getDefault(): FontInfo {
    return this.defaultFont;
  }

  /**
   * Mark a font as loaded by the backend.
   */
  register(font: FontInfo): void {
    this.loaded.set(font.key, font);
    this.pending.delete(font.key);
  }

  isLoaded(font: FontInfo): boolean {
    return this.loaded.has(font.key);
  }

  /**
   * Queue a font for loading. No-op when it's already loaded or queued.
   */
  request(font: FontInfo): void {
    if (this.loaded.has(font.key)) return;
    this.pending.set(font.key, font);
  }

  /**
   * Drain the queue of requested fonts.
   */
  takePending(): FontInfo[] {
    const fonts = [...this.pending.values()];
    this.pending.clear();
    return fonts;
  }

  /**
   * Returns true the first time it's called for a given font.
   * Used to warn about unresolved fonts once instead of every frame.
   */
  shouldWarn(font: FontInfo): boolean {
    if (this.warned.has(font.key)) return false;
    this.warned.add(font.key);
    return true;
  }
}
