import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { TableSheet } from "../entities/extraction";

export type ArtifactPaths = {
  narrativePath: string;
  tablesPath: string;
};

export interface ArtifactStorePort {
  exists(path: string): Promise<boolean>;
  writeText(path: string, text: string): Promise<Result<void, AppBoundaryError>>;
  writeWorkbook(
    path: string,
    sheets: TableSheet[],
  ): Promise<Result<void, AppBoundaryError>>;
}
