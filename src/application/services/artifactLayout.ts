import { join, resolve } from "node:path";
import type { FilingRef } from "../../core/entities/filing";
import type { ArtifactPaths } from "../../core/ports/outboundPorts";

const UNSAFE_FILENAME_CHARS = /[\\/*?:"<>|]/g;

/**
 * Strips characters Windows and POSIX shells reject in file names and joins words with underscores.
 */
export const toSafeName = (value: string): string =>
  value.trim().replace(UNSAFE_FILENAME_CHARS, "").replace(/ /g, "_");

export const companyOutputDirectory = (
  outputRoot: string,
  companyTitle: string,
): string => resolve(outputRoot, toSafeName(companyTitle));

export const artifactPathsForPrefix = (prefix: string): ArtifactPaths => ({
  narrativePath: `${prefix}_MDA.txt`,
  tablesPath: `${prefix}_Tables.xlsx`,
});

/**
 * `<root>/<Company>/<Company>_<Form>_<FilingDate>_MDA.txt` and the matching `_Tables.xlsx`.
 */
export const artifactPathsFor = (
  outputRoot: string,
  companyTitle: string,
  filing: Pick<FilingRef, "formType" | "filingDate">,
): ArtifactPaths => {
  const safeCompany = toSafeName(companyTitle);
  const baseName = [
    safeCompany,
    toSafeName(filing.formType),
    toSafeName(filing.filingDate),
  ].join("_");

  return artifactPathsForPrefix(
    join(companyOutputDirectory(outputRoot, companyTitle), baseName),
  );
};
