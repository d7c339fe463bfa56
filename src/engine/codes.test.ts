import { describe, it, expect } from "vitest";
import { isRestrained, parseFixityCode, parseRestraintCode } from "./codes";

describe("parseRestraintCode", () => {
  it("restrains every DOF for TTTTTT", () => {
    expect(parseRestraintCode("TTTTTT")).toEqual({ DX: true, DY: true, DZ: true, RX: true, RY: true, RZ: true });
  });

  it("frees every DOF for FFFFFF", () => {
    expect(parseRestraintCode("FFFFFF")).toEqual({
      DX: false, DY: false, DZ: false, RX: false, RY: false, RZ: false
    });
  });

  it("is case-insensitive and position-indexed", () => {
    expect(parseRestraintCode("tTtfFf")).toEqual({ DX: true, DY: true, DZ: true, RX: false, RY: false, RZ: false });
    expect(parseRestraintCode("FFTFFF")).toEqual({ DX: false, DY: false, DZ: true, RX: false, RY: false, RZ: false });
  });

  it("treats missing positions as free", () => {
    expect(parseRestraintCode("TT")).toEqual({ DX: true, DY: true, DZ: false, RX: false, RY: false, RZ: false });
  });
});

describe("parseFixityCode", () => {
  it("releases only the R positions, suffixed with the end", () => {
    expect(parseFixityCode("FFFFFR", "i")).toEqual({
      Dxi: false, Dyi: false, Dzi: false, Rxi: false, Ryi: false, Rzi: true
    });
    expect(parseFixityCode("fffrrr", "j")).toEqual({
      Dxj: false, Dyj: false, Dzj: false, Rxj: true, Ryj: true, Rzj: true
    });
  });

  it("returns no releases for a code shorter than six characters", () => {
    expect(parseFixityCode("FFR", "i")).toEqual({});
    expect(parseFixityCode("", "j")).toEqual({});
  });
});

describe("isRestrained", () => {
  it("is true when any flag is set", () => {
    expect(isRestrained(parseRestraintCode("FFFFFT"))).toBe(true);
    expect(isRestrained(parseRestraintCode("FFFFFF"))).toBe(false);
  });
});
