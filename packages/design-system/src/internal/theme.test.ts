import { describe, it, expect } from "vitest";
import { getTheme, resolveThemeName } from "./theme.js";
import { dark, light } from "../tokens/colors.js";

describe("theme", () => {
  it("returns dark by default", () => {
    expect(resolveThemeName({})).toBe("dark");
  });

  it("honours HOSTFORM_THEME regardless of case", () => {
    expect(resolveThemeName({ HOSTFORM_THEME: "LIGHT" })).toBe("light");
    expect(resolveThemeName({ HOSTFORM_THEME: "dark", COLORFGBG: "0;15" })).toBe("dark");
  });

  it("reads the background slot of COLORFGBG", () => {
    expect(resolveThemeName({ COLORFGBG: "15;0" })).toBe("dark");
    expect(resolveThemeName({ COLORFGBG: "0;15" })).toBe("light");
    expect(resolveThemeName({ COLORFGBG: "default" })).toBe("dark");
  });

  it("maps the name to a palette", () => {
    expect(getTheme({ HOSTFORM_THEME: "light" })).toBe(light);
    expect(getTheme({})).toBe(dark);
  });
});
