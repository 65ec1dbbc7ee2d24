import { describe, it, expect } from "vitest";
import { defaultTaxFor, isSameState, splitTax } from "../engine/gst";
import { round2 } from "../engine/normalize";

describe("splitTax", () => {
  it("splits intra-state tax into equal CGST and SGST", () => {
    expect(splitTax(180, "Maharashtra", "Maharashtra")).toEqual({ cgst: 90, sgst: 90, igst: 0 });
  });

  it("compares states case-insensitively after trimming", () => {
    expect(splitTax(180, "  maharashtra ", "MAHARASHTRA")).toEqual({ cgst: 90, sgst: 90, igst: 0 });
  });

  it("charges IGST for inter-state sales", () => {
    expect(splitTax(180, "Maharashtra", "Delhi")).toEqual({ cgst: 0, sgst: 0, igst: 180 });
  });

  it("takes the IGST branch when either state is empty", () => {
    expect(splitTax(50, "Maharashtra", "")).toEqual({ cgst: 0, sgst: 0, igst: 50 });
    expect(splitTax(50, "", "")).toEqual({ cgst: 0, sgst: 0, igst: 50 });
    expect(splitTax(50, " ", " ")).toEqual({ cgst: 0, sgst: 0, igst: 50 });
  });

  it("treats missing tax as zero", () => {
    expect(splitTax(undefined, "Goa", "Goa")).toEqual({ cgst: 0, sgst: 0, igst: 0 });
    expect(splitTax(null, "Goa", "Kerala")).toEqual({ cgst: 0, sgst: 0, igst: 0 });
    expect(splitTax(Number.NaN, "Goa", "Kerala")).toEqual({ cgst: 0, sgst: 0, igst: 0 });
  });

  it("rounds each half to two decimals", () => {
    expect(splitTax(1234.567, "Goa", "Goa")).toEqual({ cgst: 617.28, sgst: 617.28, igst: 0 });
    expect(splitTax(1234.567, "Goa", "Kerala")).toEqual({ cgst: 0, sgst: 0, igst: 1234.57 });
  });

  it("splits a half-cent tie to the even cent", () => {
    expect(splitTax(180.25, "Goa", "Goa")).toEqual({ cgst: 90.12, sgst: 90.12, igst: 0 });
  });

  it("is exclusive and sums to the rounded tax", () => {
    const taxes = [1, 99.99, 180, 1234.567];
    const states: [string, string][] = [
      ["Goa", "Goa"],
      ["Goa", " goa"],
      ["Goa", "Kerala"],
      ["Goa", ""],
    ];
    for (const tax of taxes) {
      for (const [seller, buyer] of states) {
        const { cgst, sgst, igst } = splitTax(tax, seller, buyer);
        expect((cgst + sgst > 0) !== (igst > 0)).toBe(true);
        expect(Math.abs(cgst + sgst + igst - round2(tax))).toBeLessThanOrEqual(0.010001);
      }
    }
  });
});

describe("isSameState", () => {
  it("requires both sides to be non-empty", () => {
    expect(isSameState("", "")).toBe(false);
    expect(isSameState("Delhi", "delhi ")).toBe(true);
  });
});

describe("defaultTaxFor", () => {
  it("applies 18%", () => {
    expect(defaultTaxFor(1000)).toBe(180);
    expect(defaultTaxFor(0)).toBe(0);
  });
});
