import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import * as XLSX from "xlsx";
import { FsArtifactStore } from "./fsArtifactStore";

let workDir = "";

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), "filing-extractor-"));
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

describe("FsArtifactStore", () => {
  it("writes UTF-8 text and creates missing directories", async () => {
    const store = new FsArtifactStore();
    const path = join(workDir, "Example_Devices", "Example_Devices_10-K_2026-01-10_MDA.txt");

    const result = await store.writeText(path, "Revenue grew — modestly.\n\n");

    expect(result.isOk()).toBe(true);
    expect(await readFile(path, "utf8")).toBe("Revenue grew — modestly.\n\n");
    expect(await store.exists(path)).toBe(true);
  });

  it("writes one sheet per grid in order", async () => {
    const store = new FsArtifactStore();
    const path = join(workDir, "tables.xlsx");

    const result = await store.writeWorkbook(path, [
      { name: "Table_1", grid: [["Segment", "2025"], ["Devices", "1,200"]] },
      { name: "Table_2", grid: [["Item"], ["Leases"], ["Debt"]] },
    ]);

    expect(result.isOk()).toBe(true);
    const workbook = XLSX.read(await readFile(path), { type: "buffer" });
    expect(workbook.SheetNames).toEqual(["Table_1", "Table_2"]);

    const first = workbook.Sheets.Table_1;
    const second = workbook.Sheets.Table_2;
    if (!first || !second) {
      throw new Error("expected both sheets");
    }
    expect(XLSX.utils.sheet_to_json(first, { header: 1 })).toEqual([
      ["Segment", "2025"],
      ["Devices", "1,200"],
    ]);
    expect(XLSX.utils.sheet_to_json(second, { header: 1 })).toEqual([
      ["Item"],
      ["Leases"],
      ["Debt"],
    ]);
  });

  it("refuses to write an empty workbook", async () => {
    const store = new FsArtifactStore();
    const path = join(workDir, "empty.xlsx");

    const result = await store.writeWorkbook(path, []);

    expect(result.isErr()).toBe(true);
    expect(await store.exists(path)).toBe(false);
  });

  it("reports a write failure and leaves nothing behind", async () => {
    const store = new FsArtifactStore();
    const blocker = join(workDir, "not-a-directory");
    await writeFile(blocker, "occupied");
    const path = join(blocker, "report_MDA.txt");

    const result = await store.writeText(path, "text");

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected write failure");
    }
    expect(result.error.source).toBe("artifacts");
    expect(result.error.code).toBe("write_failed");
    expect(await store.exists(path)).toBe(false);
  });
});
