import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import * as XLSX from "xlsx";
import { run } from "../cli";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "tally-cli-"));
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

describe("run", () => {
  it("converts files into a Tally workbook", async () => {
    const csvPath = path.join(dir, "Amazon_B2B.csv");
    await writeFile(csvPath, "invoice-id,ship-state,taxable-value,tax-amount\nAB123,Maharashtra,1000,180\n");
    const outPath = path.join(dir, "out.xlsx");

    const code = await run(["--state", "Maharashtra", "-q", "-o", outPath, csvPath], {});

    expect(code).toBe(0);
    const wb = XLSX.read(await readFile(outPath), { type: "buffer" });
    expect(wb.SheetNames).toEqual(["Sales", "Sales Return", "_metadata"]);
    const sales = wb.Sheets["Sales"];
    if (!sales) throw new Error("missing Sales sheet");
    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sales);
    expect(rows).toHaveLength(1);
    expect(rows[0]?.["Voucher No"]).toBe("AB123");
    expect(rows[0]?.["CGST Amount"]).toBe(90);
    expect(rows[0]?.["Total Amount"]).toBe(1180);
  });

  it("skips unsupported files but converts the rest", async () => {
    const notes = path.join(dir, "notes.txt");
    const csvPath = path.join(dir, "orders.csv");
    await writeFile(notes, "hello");
    await writeFile(csvPath, "invoice id,amount,state\nG1,100,Goa\n");
    const outPath = path.join(dir, "out.xlsx");

    const code = await run(["--state", "Goa", "-q", "-o", outPath, notes, csvPath], {});

    expect(code).toBe(0);
    const wb = XLSX.read(await readFile(outPath), { type: "buffer" });
    const meta = wb.Sheets["_metadata"];
    if (!meta) throw new Error("missing _metadata sheet");
    const [row] = XLSX.utils.sheet_to_json<Record<string, unknown>>(meta);
    expect(row?.["Source Files"]).toBe("orders.csv");
    expect(row?.["Seller State"]).toBe("Goa");
  });

  it("fails without a seller state", async () => {
    const csvPath = path.join(dir, "amazon.csv");
    await writeFile(csvPath, "invoice-id\nA1\n");

    expect(await run(["-q", csvPath], {})).toBe(1);
  });

  it("fails when no file yields rows", async () => {
    expect(await run(["--state", "Goa", "-q", path.join(dir, "missing.csv")], {})).toBe(1);
  });

  it("prints usage for bad arguments", async () => {
    expect(await run(["--parser", "ebay", "a.csv"], {})).toBe(1);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining("Unknown parser: ebay"));
  });

  it("prints usage on --help", async () => {
    expect(await run(["--help"], {})).toBe(0);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining("Usage: tally-convert"));
  });
});
