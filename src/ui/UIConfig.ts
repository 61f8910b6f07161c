/**
 * UI Config
 *
 * Options for the composition layer. Partial configs are merged over
 * DEFAULT_CONFIG section by section.
 */

import { FontInfo } from "./FontRegistry";

export interface AlignmentConfig {
  /**
   * Widget kinds built without measurement inside an alignment scope.
   * Dry-run measurement is unreliable for these on some backends.
   */
  bypassKinds: string[];
}

export interface AutoCompleteConfig {
  /** Maximum number of suggestions kept per input */
  maxMatches: number;
  /** Key that accepts the top suggestion */
  confirmKey: string;
}

export interface FontConfig {
  /** Font the backend loads at startup; base for size-only overrides */
  default: FontInfo;
}

export interface UIConfig {
  alignment: AlignmentConfig;
  autoComplete: AutoCompleteConfig;
  fonts: FontConfig;
  /** Log best-effort conditions (unresolved fonts) to the console */
  warnings: boolean;
}

export type PartialUIConfig = {
  [K in keyof UIConfig]?: UIConfig[K] extends object ? Partial<UIConfig[K]> : UIConfig[K];
};

export const DEFAULT_CONFIG: UIConfig = {
  alignment: {
    bypassKinds: ["selectable", "combo"],
  },
  autoComplete: {
    maxMatches: 5,
    confirmKey: "Enter",
  },
  fonts: {
    default: new FontInfo("default", 13),
  },
  warnings: true,
};

/** Deep merge a partial config with the default config */
export function mergeConfig(partial: PartialUIConfig): UIConfig {
  return {
    alignment: { ...DEFAULT_CONFIG.alignment, ...partial.alignment },
    autoComplete: { ...DEFAULT_CONFIG.autoComplete, ...partial.autoComplete },
    fonts: { ...DEFAULT_CONFIG.fonts, ...partial.fonts },
    warnings: partial.warnings ?? DEFAULT_CONFIG.warnings,
  };
}
