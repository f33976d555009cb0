import { theme } from "./terminal/theme.js";

let globalVerbose = false;

export function setVerbose(v: boolean) {
  globalVerbose = v;
}

export function isVerbose() {
  return globalVerbose;
}

export function logVerbose(message: string) {
  if (globalVerbose) {
    console.error(theme.muted(message));
  }
}

export const success = theme.success;
export const warn = theme.warn;
export const info = theme.accent;
export const danger = theme.error;
