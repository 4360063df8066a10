import _Ajv from "ajv";
const Ajv = _Ajv.default ?? _Ajv;
import type { BrandProfile, ColorRole, FontSpec, StylePreferences } from "../schemas/brand.js";
import { COLOR_ROLES, defaultBrandProfile } from "../schemas/brand.js";
import { fontSchema, stylePreferencesSchema, typeScaleSchema } from "../schemas/brand-schema.js";
import type { ValidationIssue } from "../schemas/record.js";
import type {
  AccessibilityWarning,
  BrandAnnotation,
  ColorSubstitution,
  FontSubstitution,
  SearchResult,
  StyleAdjustment,
} from "../schemas/search.js";
import { containsPhrase, tokenize } from "./bm25.js";
import { WCAG_AA_NORMAL, checkContrast, isHexColor, shiftLightness } from "./color.js";
import { isObject } from "./records.js";
import { sortResults } from "./results.js";

export const PREFERRED_STYLE_MULTIPLIER = 1.5;
export const AVOIDED_STYLE_MULTIPLIER = 0.5;

const PHILOSOPHY_KEYWORDS: Record<string, { keywords: string[]; boost: number }> = {
  minimalism: { keywords: ["minimal", "minimalism", "clean", "simple", "whitespace"], boost: 1.3 },
  modern: { keywords: ["modern", "contemporary", "sleek"], boost: 1.2 },
  playful: { keywords: ["playful", "fun", "colorful", "vibrant"], boost: 1.2 },
  professional: { keywords: ["professional", "corporate", "formal"], boost: 1.2 },
  elegant: { keywords: ["elegant", "refined", "sophisticated"], boost: 1.2 },
};

const ROLE_ALIASES: Record<string, ColorRole> = {
  cta: "accent",
  text: "neutral_dark",
  border: "neutral_light",
  danger: "error",
};

const FONT_DECLARATION = /font-family:\s*([^;]+);/g;
const MONO_FONT = /mono/i;

/** Stock colors that code examples ship with, and the brand role each one stands for. */
const STOCK_CODE_COLORS: { hex: string; role: ColorRole; lighten?: number }[] = [
  { hex: "#3b82f6", role: "primary" },
  { hex: "#1d4ed8", role: "primary" },
  { hex: "#60a5fa", role: "primary", lighten: 0.2 },
  { hex: "#f59e0b", role: "accent" },
  { hex: "#10b981", role: "success" },
  { hex: "#ef4444", role: "error" },
];
const STOCK_CODE_COLOR = new RegExp(`(?:${STOCK_CODE_COLORS.map((c) => c.hex).join("|")})(?![0-9a-f])`, "gi");

// --- Loading ---

interface RawFont {
  name: string;
  fallback?: string | string[];
}

interface RawStylePreferences {
  preferred_styles?: string[];
  avoided_styles?: string[];
  design_philosophy?: string;
}

export interface ParsedBrand {
  profile: BrandProfile | null;
  issues: ValidationIssue[];
}

/**
 * Build a profile from parsed brand JSON. Invalid values fall back to the
 * defaults with a warning; only a non-object document yields no profile.
 */
export function parseBrandProfile(raw: unknown, file: string): ParsedBrand {
  const issues: ValidationIssue[] = [];
  const warn = (field: string, message: string) => issues.push({ file, field, message, severity: "warning" });

  if (!isObject(raw)) {
    return { profile: null, issues: [{ file, message: "Brand file must contain a JSON object", severity: "error" }] };
  }

  const ajv = new Ajv({ allErrors: true });
  const validateFont = ajv.compile<RawFont>(fontSchema);
  const validateScale = ajv.compile<number | string>(typeScaleSchema);
  const validateStyle = ajv.compile<RawStylePreferences>(stylePreferencesSchema);

  const profile = defaultBrandProfile();
  if (typeof raw.name === "string" && raw.name.trim()) {
    profile.name = raw.name.trim();
  }

  if (raw.colors !== undefined) {
    if (isObject(raw.colors)) {
      for (const [path, role, value] of colorEntries(raw.colors)) {
        if (isHexColor(value)) {
          profile.colors[role] = value;
          if (!profile.declared_colors.includes(role)) profile.declared_colors.push(role);
        } else {
          warn(`colors.${path}`, `Invalid color ${JSON.stringify(value)}; using default ${profile.colors[role]}`);
        }
      }
    } else {
      warn("colors", "colors must be an object; using default colors");
    }
  }

  if (raw.typography !== undefined) {
    if (isObject(raw.typography)) {
      for (const [key, value] of Object.entries(raw.typography)) {
        if (key === "scale") {
          if (validateScale(value)) {
            profile.typography.scale = Number(value);
          } else {
            warn("typography.scale", `Invalid type scale; using default ${profile.typography.scale}`);
          }
          continue;
        }
        if (!isObject(value) || !(key.endsWith("_font") || "name" in value)) continue;
        const role = key.replace(/_font$/, "");
        if (!validateFont(value)) {
          warn(`typography.${key}`, "Font needs a name; using default");
          continue;
        }
        profile.typography.fonts[role] = {
          name: value.name.trim(),
          fallback: fontFallback(value.fallback, profile.typography.fonts[role]),
        };
        if (!profile.declared_fonts.includes(role)) profile.declared_fonts.push(role);
      }
    } else {
      warn("typography", "typography must be an object; using default typography");
    }
  }

  if (raw.style_preferences !== undefined) {
    if (validateStyle(raw.style_preferences)) {
      profile.style_preferences = stylePreferences(raw.style_preferences);
    } else {
      warn("style_preferences", "Invalid style preferences; ignored");
    }
  }

  return { profile, issues };
}

function colorEntries(colors: Record<string, unknown>): [string, ColorRole, unknown][] {
  const entries: [string, ColorRole, unknown][] = [];
  for (const [key, value] of Object.entries(colors)) {
    if ((key === "neutral" || key === "semantic") && isObject(value)) {
      for (const [shade, nested] of Object.entries(value)) {
        const role = asColorRole(key === "neutral" ? `neutral_${shade}` : shade);
        if (role) entries.push([`${key}.${shade}`, role, nested]);
      }
      continue;
    }
    const role = asColorRole(key);
    if (role) entries.push([key, role, value]);
  }
  return entries;
}

function fontFallback(fallback: RawFont["fallback"], current: FontSpec | undefined): string[] {
  if (typeof fallback === "string") {
    return fallback.split(",").map((f) => f.trim()).filter((f) => f.length > 0);
  }
  if (Array.isArray(fallback)) return [...fallback];
  return current ? [...current.fallback] : ["sans-serif"];
}

function stylePreferences(raw: RawStylePreferences): StylePreferences {
  const philosophy = raw.design_philosophy?.trim();
  return {
    preferred: raw.preferred_styles ?? [],
    avoided: raw.avoided_styles ?? [],
    philosophy: philosophy ? philosophy : null,
  };
}

// --- Field recognition ---

/** `Primary (Hex)` → `primary`, `primary-color` → `primary_color`. */
export function normalizeFieldName(field: string): string {
  return field
    .toLowerCase()
    .replace(/\(hex\)/g, "")
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

function asColorRole(name: string): ColorRole | null {
  const role = COLOR_ROLES.find((candidate) => candidate === name);
  if (role) return role;
  return Object.hasOwn(ROLE_ALIASES, name) ? ROLE_ALIASES[name] : null;
}

export function colorRoleForField(field: string): ColorRole | null {
  const name = normalizeFieldName(field).replace(/_(colou?r|hex)$/, "");
  return asColorRole(name);
}

export function isFontField(field: string): boolean {
  const name = normalizeFieldName(field);
  return /(^|_)font$/.test(name) || name === "font_family" || name === "fonts";
}

/** `Heading Font` → the brand's heading font, else mono-ish fields → secondary, else primary. */
export function fontRoleForField(field: string, profile: BrandProfile): string {
  const prefix = normalizeFieldName(field).replace(/_?font(_family)?$|^fonts$/, "");
  if (prefix && Object.hasOwn(profile.typography.fonts, prefix)) return prefix;
  if (/mono|code/.test(prefix) && profile.typography.fonts.secondary) return "secondary";
  return "primary";
}

export function fontStack(font: FontSpec): string {
  return [font.name, ...font.fallback].join(", ");
}

/** Font stack as a CSS value; names with spaces are quoted. */
export function cssFontStack(font: FontSpec): string {
  return [font.name, ...font.fallback].map((name) => (/\s/.test(name) ? `'${name}'` : name)).join(", ");
}

/** The declared role serving as background: `background`, else `neutral_light`. */
export function backgroundRole(profile: BrandProfile): ColorRole | null {
  if (profile.declared_colors.includes("background")) return "background";
  if (profile.declared_colors.includes("neutral_light")) return "neutral_light";
  return null;
}

/** Background used for contrast checks; white when the brand declares none. */
export function brandBackground(profile: BrandProfile): string {
  const role = backgroundRole(profile);
  return role ? profile.colors[role] : "#FFFFFF";
}

export function isCodeField(field: string): boolean {
  return /(^|_)(code|css)(_|$)/.test(normalizeFieldName(field));
}

// --- Applying ---

export interface ApplyBrandOptions {
  /** Styles the query names are not penalised even when avoided. */
  queryText?: string;
}

/**
 * Substitute brand colors and fonts into results and re-weight them by style
 * preference. Never drops a result; exact matches stay in front.
 */
export function applyBrand(
  results: readonly SearchResult[],
  profile: BrandProfile,
  options: ApplyBrandOptions = {},
): SearchResult[] {
  const queryTokens = tokenize(options.queryText ?? "");
  return sortResults(results.map((result) => brandResult(result, profile, queryTokens)));
}

function brandResult(result: SearchResult, profile: BrandProfile, queryTokens: string[]): SearchResult {
  const outputFields = { ...result.output_fields };
  const colors: ColorSubstitution[] = [];
  const fonts: FontSubstitution[] = [];
  const accessibility: AccessibilityWarning[] = [];
  const background = brandBackground(profile);
  const bgRole = backgroundRole(profile);
  const hasFonts = profile.declared_fonts.length > 0;

  for (const [field, value] of Object.entries(result.output_fields)) {
    const role = colorRoleForField(field);
    if (role && profile.declared_colors.includes(role)) {
      const color = profile.colors[role];
      outputFields[field] = color;
      if (value !== color) colors.push({ field, role, value: color, original: value });
      if (role !== "background" && role !== bgRole) {
        const warning = contrastWarning(field, role, color, background);
        if (warning) accessibility.push(warning);
      }
      continue;
    }

    if (typeof value !== "string") continue;
    let text = value;
    if (isCodeField(field)) {
      text = replaceCodeColors(text, profile, (role, color, original) => {
        colors.push({ field, role, value: color, original });
      });
      outputFields[field] = text;
    }

    if (!hasFonts) continue;
    if (isFontField(field)) {
      const fontRole = fontRoleForField(field, profile);
      const font = profile.typography.fonts[fontRole];
      if (font) {
        const stack = fontStack(font);
        outputFields[field] = stack;
        if (stack !== value) fonts.push({ field, role: fontRole, value: stack, generic: value });
      }
    } else if (text.includes("font-family:")) {
      const roles: string[] = [];
      const rewritten = text.replace(FONT_DECLARATION, (declaration: string, family: string) => {
        const target = codeFontRole(family, profile);
        const font = target ? profile.typography.fonts[target] : undefined;
        if (!target || !font) return declaration;
        if (!roles.includes(target)) roles.push(target);
        return `font-family: ${cssFontStack(font)};`;
      });
      outputFields[field] = rewritten;
      if (rewritten !== text) {
        for (const role of roles) fonts.push({ field, role, value: rewritten, generic: value });
      }
    }
  }

  const style = styleAdjustment(result, profile.style_preferences, queryTokens);
  const annotation: BrandAnnotation = { colors, fonts, style, accessibility };
  return {
    ...result,
    output_fields: outputFields,
    score: style ? result.score * style.multiplier : result.score,
    brand: annotation,
  };
}

/** Monospace declarations take the brand's mono or secondary font; the rest take the primary. */
function codeFontRole(family: string, profile: BrandProfile): string | null {
  const fonts = profile.typography.fonts;
  if (MONO_FONT.test(family)) {
    if (fonts.mono) return "mono";
    if (fonts.secondary) return "secondary";
    return null;
  }
  return fonts.primary ? "primary" : null;
}

function replaceCodeColors(
  text: string,
  profile: BrandProfile,
  onReplace: (role: ColorRole, color: string, original: string) => void,
): string {
  return text.replace(STOCK_CODE_COLOR, (match: string) => {
    const stock = STOCK_CODE_COLORS.find((entry) => entry.hex === match.toLowerCase());
    if (!stock || !profile.declared_colors.includes(stock.role)) return match;
    const base = profile.colors[stock.role];
    const color = stock.lighten ? shiftLightness(base, stock.lighten) : base;
    if (color.toLowerCase() !== match.toLowerCase()) onReplace(stock.role, color, match);
    return color;
  });
}

function contrastWarning(field: string, role: ColorRole, color: string, background: string): AccessibilityWarning | null {
  const check = checkContrast(color, background);
  if (check.passes_normal_text) return null;
  const suffix = check.passes_large_text ? "; passes for large text only" : "";
  return {
    field,
    role,
    color,
    background,
    ratio: check.ratio,
    required: WCAG_AA_NORMAL,
    passes_large_text: check.passes_large_text,
    message: `${color} on ${background} has contrast ${check.ratio}:1, below ${WCAG_AA_NORMAL}:1${suffix}`,
  };
}

function styleAdjustment(
  result: SearchResult,
  preferences: StylePreferences,
  queryTokens: string[],
): StyleAdjustment | null {
  const textTokens = tokenize(resultText(result));
  const named = (style: string) => containsPhrase(textTokens, tokenize(style));

  let multiplier = 1;
  const preferred = preferences.preferred.filter(named);
  for (let i = 0; i < preferred.length; i++) multiplier *= PREFERRED_STYLE_MULTIPLIER;

  const avoided = preferences.avoided.filter(
    (style) => named(style) && !containsPhrase(queryTokens, tokenize(style)),
  );
  for (let i = 0; i < avoided.length; i++) multiplier *= AVOIDED_STYLE_MULTIPLIER;

  let philosophy: string | null = null;
  const tag = preferences.philosophy?.toLowerCase();
  const entry = tag && Object.hasOwn(PHILOSOPHY_KEYWORDS, tag) ? PHILOSOPHY_KEYWORDS[tag] : undefined;
  if (tag && entry && entry.keywords.some((keyword) => textTokens.includes(keyword))) {
    multiplier *= entry.boost;
    philosophy = tag;
  }

  if (preferred.length === 0 && avoided.length === 0 && philosophy === null) return null;
  return { multiplier, preferred, avoided, philosophy };
}

function resultText(result: SearchResult): string {
  const parts = [result.id];
  for (const value of Object.values(result.output_fields)) {
    parts.push(Array.isArray(value) ? value.join(" ") : value);
  }
  return parts.join(" ");
}

// --- CSS ---

/** Render the profile as CSS custom properties on `:root`. */
export function generateCssVariables(profile: BrandProfile): string {
  const lines = [":root {"];
  for (const role of COLOR_ROLES) {
    const name = role.replace(/_/g, "-");
    const value = profile.colors[role];
    lines.push(`  --color-${name}: ${value};`);
    if (role === "primary" || role === "secondary") {
      lines.push(`  --color-${name}-light: ${shiftLightness(value, 0.2)};`);
      lines.push(`  --color-${name}-dark: ${shiftLightness(value, -0.2)};`);
    }
  }
  for (const [role, font] of Object.entries(profile.typography.fonts)) {
    lines.push(`  --font-${role.replace(/_/g, "-")}: ${cssFontStack(font)};`);
  }
  lines.push(`  --type-scale: ${profile.typography.scale};`);
  lines.push("}");
  return lines.join("\n");
}
