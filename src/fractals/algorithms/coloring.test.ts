// ABOUTME: Tests for palette and continuous-hue coloring
// ABOUTME: Pins each palette formula and the HSV sector conversion

import { describe, expect, it } from "vitest";
import { hsvToRgb, PaletteParams, paletteColor, psychedelicColor, PsychedelicParams } from "./coloring";

const palette: PaletteParams = [15, 5, 2];
const psychedelic: PsychedelicParams = [2, 3, 1, 0, 0, 0];

describe("Color Scheme Tests", () => {
  describe("interior points", () => {
    it.each([0, 1, 2, 3])("should return black in palette %i", (paletteId) => {
      expect(paletteColor(100, 100, paletteId, palette)).toEqual([0, 0, 0]);
    });

    it("should return black in continuous-hue mode at any phase", () => {
      expect(psychedelicColor(100, 100, 0, psychedelic)).toEqual([0, 0, 0]);
      expect(psychedelicColor(100, 100, 0.37, [3.1, 1.2, 0.7, 0.4, 0.9, 0.2])).toEqual([0, 0, 0]);
    });
  });

  describe("paletteColor", () => {
    it("should ramp red and green in palette 0", () => {
      expect(paletteColor(0, 100, 0, palette)).toEqual([0, 0, 50]);
      expect(paletteColor(3, 100, 0, palette)).toEqual([45, 24, 44]);
      expect(paletteColor(20, 100, 0, palette)).toEqual([255, 100, 10]);
    });

    it("should fade red and lift blue in palette 1", () => {
      expect(paletteColor(0, 100, 1, palette)).toEqual([100, 0, 100]);
      expect(paletteColor(7, 100, 1, palette)).toEqual([0, 35, 114]);
      expect(paletteColor(99, 100, 1, palette)).toEqual([0, 255, 255]);
    });

    it("should wrap channels in palette 2", () => {
      expect(paletteColor(0, 100, 2, palette)).toEqual([60, 120, 0]);
      expect(paletteColor(20, 100, 2, palette)).toEqual([104, 220, 40]);
      expect(paletteColor(99, 100, 2, palette)).toEqual([9, 103, 98]);
    });

    it("should render grayscale in palette 3", () => {
      expect(paletteColor(20, 100, 3, palette)).toEqual([51, 51, 51]);
      expect(paletteColor(99, 100, 3, palette)).toEqual([252, 252, 252]);
    });

    it("should select the palette by id modulo 4", () => {
      expect(paletteColor(7, 100, 5, palette)).toEqual(paletteColor(7, 100, 1, palette));
      expect(paletteColor(7, 100, 10, palette)).toEqual(paletteColor(7, 100, 2, palette));
    });

    it("should keep negative filter values inside the byte range", () => {
      expect(paletteColor(-5.5, 100, 0, palette)).toEqual([0, 0, 61]);
      expect(paletteColor(-5.5, 100, 1, palette)).toEqual([182, 0, 89]);
      expect(paletteColor(-5.5, 100, 2, palette)).toEqual([234, 92, 89]);
    });
  });

  describe("psychedelicColor", () => {
    it("should start at hue 0 with saturation 0.6 and value 0.8", () => {
      expect(psychedelicColor(0, 100, 0, psychedelic)).toEqual([204, 81, 81]);
    });

    it("should advance the hue with the iteration count", () => {
      expect(psychedelicColor(10, 100, 0, psychedelic)).toEqual([98, 246, 158]);
    });

    it("should wrap negative hues into [0, 1)", () => {
      expect(psychedelicColor(-3, 100, 0, psychedelic)).toEqual([188, 75, 157]);
    });
  });

  describe("hsvToRgb", () => {
    it("should hit the primary and secondary colors at sector boundaries", () => {
      expect(hsvToRgb(0, 1, 1)).toEqual([255, 0, 0]);
      expect(hsvToRgb(1 / 3, 1, 1)).toEqual([0, 255, 0]);
      expect(hsvToRgb(0.5, 1, 1)).toEqual([0, 255, 255]);
    });

    it("should return gray when saturation is zero", () => {
      expect(hsvToRgb(0.7, 0, 0.5)).toEqual([127, 127, 127]);
    });
  });
});
