import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { CompanyEntity } from "../entities/company";
import type { FilingRef } from "../entities/filing";

export type CompanyResolveRequest = {
  query: string;
};

export type CompanyResolveResult =
  | { status: "resolved"; company: CompanyEntity }
  | { status: "ambiguous"; candidates: CompanyEntity[] }
  | { status: "not_found" };

export type FilingsRequest = {
  cik: string;
  formTypes: string[];
};

export type FilingTextRequest = {
  cik: string;
  accessionNo: string;
};

export interface CompanyDirectoryPort {
  resolveCompany(
    request: CompanyResolveRequest,
  ): Promise<Result<CompanyResolveResult, AppBoundaryError>>;
}

export interface FilingsProviderPort {
  listFilings(
    request: FilingsRequest,
  ): Promise<Result<FilingRef[], AppBoundaryError>>;
}

export interface FilingArchivePort {
  fetchFilingText(
    request: FilingTextRequest,
  ): Promise<Result<string, AppBoundaryError>>;
}
