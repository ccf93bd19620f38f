import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runPlan, runRename } from "./run.js";

let dir: string;

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  const logger = {
    log: vi.fn((...args: unknown[]) => {
      out.push(args.map(String).join(" "));
    }),
    error: vi.fn((...args: unknown[]) => {
      err.push(args.map(String).join(" "));
    }),
  };
  return { logger, out, err };
}

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "date-renamer-cli-"));
  await fs.writeFile(path.join(dir, "invoice_12-03-2024.pdf"), "");
  await fs.writeFile(path.join(dir, "no_date_file.txt"), "");
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("runRename", () => {
  it("renames and prints the summary", async () => {
    const { logger, out } = capture();

    const code = await runRename([dir], { logger, env: {} });

    expect(code).toBe(0);
    expect((await fs.readdir(dir)).sort()).toEqual([
      "20240312_invoice.pdf",
      "no_date_file.txt",
    ]);
    expect(out).toContain("  invoice_12-03-2024.pdf → 20240312_invoice.pdf");
    expect(out).toContain("  no_date_file.txt (no valid date found)");
    expect(out).toContain("Total renamed: 1");
    expect(out).toContain("Total skipped: 1");
  });

  it("exits 1 for a missing directory", async () => {
    const { logger, err } = capture();
    const missing = path.join(dir, "missing");

    const code = await runRename([missing], { logger, env: {} });

    expect(code).toBe(1);
    expect(err).toEqual([`Error: ${missing} does not exist`]);
  });

  it("exits 1 on a bad flag", async () => {
    const { logger, err } = capture();
    const code = await runRename(["--nope"], { logger, env: {} });
    expect(code).toBe(1);
    expect(err[0]).toMatch(/^Error: /);
  });

  it("exits 1 on bad configuration", async () => {
    const { logger } = capture();
    const code = await runRename([dir], { logger, env: { DATE_RENAMER_PIVOT: "x" } });
    expect(code).toBe(1);
    expect(await fs.readdir(dir)).toContain("invoice_12-03-2024.pdf");
  });

  it("prints usage for --help", async () => {
    const { logger, out } = capture();
    expect(await runRename(["--help"], { logger, env: {} })).toBe(0);
    expect(out[0]).toMatch(/^Usage: date-renamer/);
  });

  it("uses the pivot from the environment", async () => {
    await fs.writeFile(path.join(dir, "trip_1Jan75.jpg"), "");
    const { logger } = capture();

    await runRename([dir], { logger, env: { DATE_RENAMER_PIVOT: "70" } });

    expect(await fs.readdir(dir)).toContain("19750101_trip.jpg");
  });
});

describe("runPlan", () => {
  it("prints old => new without renaming", async () => {
    const { logger, out } = capture();

    const code = await runPlan([dir, "--backup"], { logger, env: {} });

    expect(code).toBe(0);
    expect(out.at(-1)).toBe("invoice_12-03-2024.pdf => 20240312_invoice.pdf");
    expect((await fs.readdir(dir)).sort()).toEqual([
      "invoice_12-03-2024.pdf",
      "no_date_file.txt",
    ]);
  });
});
