export const COLOR_ROLES = [
  "primary",
  "secondary",
  "accent",
  "background",
  "neutral_dark",
  "neutral_medium",
  "neutral_light",
  "success",
  "warning",
  "error",
  "info",
] as const;

export type ColorRole = (typeof COLOR_ROLES)[number];

export interface FontSpec {
  name: string;
  fallback: string[];
}

export interface BrandTypography {
  /** Font roles such as primary, secondary, heading, body, mono. */
  fonts: Record<string, FontSpec>;
  scale: number;
}

export interface StylePreferences {
  /** Most preferred first. */
  preferred: string[];
  avoided: string[];
  philosophy: string | null;
}

export interface BrandProfile {
  name: string | null;
  colors: Record<ColorRole, string>;
  /** Roles the brand file set itself; only these are substituted into results. */
  declared_colors: ColorRole[];
  /** Font roles the brand file set itself. */
  declared_fonts: string[];
  typography: BrandTypography;
  style_preferences: StylePreferences;
}

export const DEFAULT_BRAND_COLORS: Record<ColorRole, string> = {
  primary: "#2563EB",
  secondary: "#64748B",
  accent: "#F59E0B",
  background: "#FFFFFF",
  neutral_dark: "#333333",
  neutral_medium: "#666666",
  neutral_light: "#F5F5F5",
  success: "#10B981",
  warning: "#F59E0B",
  error: "#EF4444",
  info: "#3B82F6",
};

export const DEFAULT_TYPOGRAPHY: BrandTypography = {
  fonts: {
    primary: { name: "Inter", fallback: ["system-ui", "sans-serif"] },
    secondary: { name: "JetBrains Mono", fallback: ["ui-monospace", "monospace"] },
  },
  scale: 1.25,
};

export const DEFAULT_STYLE_PREFERENCES: StylePreferences = {
  preferred: [],
  avoided: [],
  philosophy: null,
};

export function defaultBrandProfile(): BrandProfile {
  return {
    name: null,
    colors: { ...DEFAULT_BRAND_COLORS },
    declared_colors: [],
    declared_fonts: [],
    typography: {
      fonts: Object.fromEntries(
        Object.entries(DEFAULT_TYPOGRAPHY.fonts).map(([role, font]) => [
          role,
          { name: font.name, fallback: [...font.fallback] },
        ]),
      ),
      scale: DEFAULT_TYPOGRAPHY.scale,
    },
    style_preferences: {
      preferred: [...DEFAULT_STYLE_PREFERENCES.preferred],
      avoided: [...DEFAULT_STYLE_PREFERENCES.avoided],
      philosophy: DEFAULT_STYLE_PREFERENCES.philosophy,
    },
  };
}
