/**
 * One periodic report listed in an issuer's submission index.
 */
export type FilingRef = {
  formType: string;
  accessionNo: string;
  filingDate: string;
  primaryDocument?: string;
};

/**
 * A `<DOCUMENT>` region of a full-submission text bundle. `start` and `end` index
 * the region body inside the bundle, excluding the markers themselves.
 */
export type EmbeddedDocument = {
  declaredType: string | null;
  start: number;
  end: number;
  content: string;
};
