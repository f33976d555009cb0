import chalk, { Chalk } from "chalk";

const hasForceColor =
  typeof process.env.FORCE_COLOR === "string" &&
  process.env.FORCE_COLOR.trim().length > 0 &&
  process.env.FORCE_COLOR.trim() !== "0";

const baseChalk = process.env.NO_COLOR && !hasForceColor ? new Chalk({ level: 0 }) : chalk;

const hex = (value: string) => baseChalk.hex(value);

const PALETTE = {
  accent: "#4F9DDE",
  accentBright: "#7CC4FF",
  success: "#2FBF71",
  warn: "#FFB020",
  error: "#E5484D",
  muted: "#8B8F98",
} as const;

export const theme = {
  accent: hex(PALETTE.accent),
  accentBright: hex(PALETTE.accentBright),
  success: hex(PALETTE.success),
  warn: hex(PALETTE.warn),
  error: hex(PALETTE.error),
  muted: hex(PALETTE.muted),
  heading: baseChalk.bold.hex(PALETTE.accent),
} as const;
