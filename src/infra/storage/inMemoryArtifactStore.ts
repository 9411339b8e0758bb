import type { AppBoundaryError } from "../../core/entities/appError";
import type { TableSheet } from "../../core/entities/extraction";
import type { ArtifactStorePort } from "../../core/ports/outboundPorts";
import { err, ok, type Result } from "neverthrow";

/**
 * Keeps artifacts in maps so pipeline behavior can be exercised without touching disk.
 */
export class InMemoryArtifactStore implements ArtifactStorePort {
  readonly texts = new Map<string, string>();
  readonly workbooks = new Map<string, TableSheet[]>();

  constructor(private readonly failingPaths: ReadonlySet<string> = new Set()) {}

  async exists(path: string): Promise<boolean> {
    return this.texts.has(path) || this.workbooks.has(path);
  }

  async writeText(
    path: string,
    text: string,
  ): Promise<Result<void, AppBoundaryError>> {
    if (this.failingPaths.has(path)) {
      return err(this.failure(path));
    }

    this.texts.set(path, text);
    return ok(undefined);
  }

  async writeWorkbook(
    path: string,
    sheets: TableSheet[],
  ): Promise<Result<void, AppBoundaryError>> {
    if (this.failingPaths.has(path)) {
      return err(this.failure(path));
    }

    this.workbooks.set(path, sheets);
    return ok(undefined);
  }

  private failure(path: string): AppBoundaryError {
    return {
      source: "artifacts",
      code: "write_failed",
      provider: "memory",
      message: `Refused write to ${path}.`,
      retryable: false,
    };
  }
}
