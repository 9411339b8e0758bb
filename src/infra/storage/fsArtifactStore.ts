import { access, mkdir, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { err, ok, type Result } from "neverthrow";
import * as XLSX from "xlsx";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { TableSheet } from "../../core/entities/extraction";
import type { ArtifactStorePort } from "../../core/ports/outboundPorts";

const PROVIDER = "filesystem";

/**
 * Serializes sheets into an .xlsx workbook; grids are written as-is, without an index column.
 */
export const buildWorkbook = (sheets: TableSheet[]): Buffer => {
  const workbook = XLSX.utils.book_new();
  for (const sheet of sheets) {
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet(sheet.grid),
      sheet.name,
    );
  }

  return XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
};

/**
 * Persists extraction artifacts on local disk. Every write lands in a temporary
 * sibling first and is renamed into place, so a failed write leaves no file behind.
 */
export class FsArtifactStore implements ArtifactStorePort {
  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  async writeText(
    path: string,
    text: string,
  ): Promise<Result<void, AppBoundaryError>> {
    return this.writeAtomically(path, () => Buffer.from(text, "utf8"));
  }

  async writeWorkbook(
    path: string,
    sheets: TableSheet[],
  ): Promise<Result<void, AppBoundaryError>> {
    if (sheets.length === 0) {
      return err({
        source: "artifacts",
        code: "validation_error",
        provider: PROVIDER,
        message: "A workbook needs at least one sheet.",
        retryable: false,
      });
    }

    return this.writeAtomically(path, () => buildWorkbook(sheets));
  }

  private async writeAtomically(
    path: string,
    render: () => Buffer,
  ): Promise<Result<void, AppBoundaryError>> {
    const tempPath = `${path}.${process.pid}.tmp`;
    let tempWritten = false;

    try {
      const payload = render();
      await mkdir(dirname(path), { recursive: true });
      tempWritten = true;
      await writeFile(tempPath, payload);
      await rename(tempPath, path);
      return ok(undefined);
    } catch (error) {
      if (tempWritten) {
        // The write failure is what gets reported; a failed cleanup must not replace it.
        await rm(tempPath, { force: true }).catch(() => undefined);
      }
      return err({
        source: "artifacts",
        code: "write_failed",
        provider: PROVIDER,
        message:
          error instanceof Error
            ? error.message
            : `Could not write artifact ${path}.`,
        retryable: false,
        cause: error,
      });
    }
  }
}
