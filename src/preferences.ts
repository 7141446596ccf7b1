export const THEMES = ['light', 'dark'] as const;

export type Theme = (typeof THEMES)[number];

export const TEXT_SIZE_MIN = 6;
export const TEXT_SIZE_MAX = 32;
export const DEFAULT_TEXT_SIZE = 14;

export interface Preferences {
  textSize: number;
  theme: Theme;
}

export function defaultPreferences(overrides: Partial<Preferences> = {}): Preferences {
  return {
    textSize: clampTextSize(overrides.textSize ?? DEFAULT_TEXT_SIZE),
    theme: overrides.theme ?? 'light',
  };
}

export function clampTextSize(size: number): number {
  if (!Number.isFinite(size)) return DEFAULT_TEXT_SIZE;
  return Math.min(TEXT_SIZE_MAX, Math.max(TEXT_SIZE_MIN, size));
}

export function withTextSize(prefs: Preferences, size: number): Preferences {
  return { ...prefs, textSize: clampTextSize(size) };
}

export function toggleTheme(prefs: Preferences): Preferences {
  return { ...prefs, theme: prefs.theme === 'dark' ? 'light' : 'dark' };
}

