export type CompanyEntity = {
  cik: string;
  title: string;
  ticker?: string;
};
