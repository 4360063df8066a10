import { converter, formatHex, wcagContrast } from "culori";
import { HEX_COLOR_PATTERN } from "../schemas/brand-schema.js";

export const WCAG_AA_NORMAL = 4.5;
export const WCAG_AA_LARGE = 3;

const HEX_COLOR = new RegExp(HEX_COLOR_PATTERN);
const toHsl = converter("hsl");

/** Six-digit `#RRGGBB` only; shorthand and alpha forms are rejected. */
export function isHexColor(value: unknown): value is string {
  return typeof value === "string" && HEX_COLOR.test(value);
}

export interface ContrastCheck {
  /** Rounded to two decimals. */
  ratio: number;
  passes_normal_text: boolean;
  passes_large_text: boolean;
}

export function checkContrast(foreground: string, background: string): ContrastCheck {
  const ratio = wcagContrast(foreground, background);
  return {
    ratio: Math.round(ratio * 100) / 100,
    passes_normal_text: ratio >= WCAG_AA_NORMAL,
    passes_large_text: ratio >= WCAG_AA_LARGE,
  };
}

/** Shift HSL lightness by `amount` (-1..1), clamped. Returns lower-case hex. */
export function shiftLightness(hex: string, amount: number): string {
  const hsl = toHsl(hex);
  if (!hsl) return hex;
  const l = Math.min(1, Math.max(0, hsl.l + amount));
  return formatHex({ ...hsl, l });
}
