import { describe, expect, it } from "vitest";
import { marqueeWindow, textWidth } from "./marquee";

describe("marquee", () => {
  it("should count CJK characters as two cells", () => {
    expect(textWidth("M5.0")).toBe(4);
    expect(textWidth("地震M5")).toBe(6);
    expect(textWidth("【】，")).toBe(6);
  });

  it("should slide text in from the right edge", () => {
    expect(marqueeWindow("abc", 0, 4)).toBe("    ");
    expect(marqueeWindow("abc", 2, 4)).toBe("  ab");
    expect(marqueeWindow("abc", 4, 4)).toBe("abc ");
    expect(marqueeWindow("abc", 6, 4)).toBe("c   ");
    expect(marqueeWindow("abc", 7, 4)).toBe("    ");
  });

  it("should blank half-visible wide characters at either edge", () => {
    expect(marqueeWindow("地震", 3, 4)).toBe(" 地 ");
    expect(marqueeWindow("地震", 4, 4)).toBe("地震");
    expect(marqueeWindow("地震", 5, 4)).toBe(" 震 ");
  });
});
