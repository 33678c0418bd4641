/** One routing rule from policy-routes.yaml */
export interface PolicyRoute {
  id: string;
  keywords: string[];
  /** Heading of the policies.md section to return */
  section?: string;
  /** Fixed answer, used instead of a document section */
  answer?: string;
  /** Returned when the named section is missing or empty */
  fallback?: string;
}

/** Section heading (lowercased) → trimmed body */
export type PolicySectionTable = Map<string, string>;

export type PolicyLookupResult =
  | { found: true; routeId: string; text: string }
  | { found: false; message: string };
