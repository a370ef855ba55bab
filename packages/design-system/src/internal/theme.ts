import { dark, light, type ThemeName, type ThemePalette } from "../tokens/colors.js";

export interface ThemeEnv {
  HOSTFORM_THEME?: string;
  COLORFGBG?: string;
}

/** `HOSTFORM_THEME` wins; otherwise the background slot of `COLORFGBG` decides. */
export function resolveThemeName(env: ThemeEnv = process.env): ThemeName {
  const raw = env.HOSTFORM_THEME?.toLowerCase();
  if (raw === "light" || raw === "dark") {
    return raw;
  }
  const background = Number.parseInt(env.COLORFGBG?.split(";").at(-1) ?? "", 10);
  if (Number.isFinite(background) && background >= 8) {
    return "light";
  }
  return "dark";
}

export function getTheme(env?: ThemeEnv): ThemePalette {
  return resolveThemeName(env) === "light" ? light : dark;
}
