import type { LocationRaw } from './FieldRecord';

/**
 * Company Summary Entity
 * Layer: Domain
 *
 * The business-level digest of a list entry's fields. Built fresh per request
 * from a NormalizedFieldSet; absent scalars are null and absent lists are [].
 */
export interface CompanySummary {
  companyUrls: {
    dealroom: unknown;
    linkedin: unknown;
  };
  description: unknown;
  industries: unknown[];
  technologies: unknown[];
  businessModels: unknown[];
  clientFocus: unknown[];
  ownershipTypes: unknown[];
  employeesRange: unknown;
  yearFounded: unknown;
  funding: {
    lastEur: unknown;
    totalEur: unknown;
  };
  location: LocationRaw | null;
  locationStr: string | null;
}

/** Which remote field id feeds each summary entry. */
export interface SummaryFieldIds {
  dealroomUrl: string;
  linkedinUrl: string;
  description: string;
  industries: string;
  technologies: string;
  businessModels: string;
  clientFocus: string;
  ownershipTypes: string;
  employeesRange: string;
  yearFounded: string;
  lastFundingAmount: string;
  totalFundingAmount: string;
  location: string;
}
