/**
 * Path classifier - maps a dotted telemetry path to the record families it carries
 */

import type { RecordFamily } from "../../types/telemetry.js";

export interface FamilyMatcher {
  family: RecordFamily;
  /** Substrings of the path; any one of them selects the family */
  markers: readonly string[];
}

export const FAMILY_MATCHERS: readonly FamilyMatcher[] = [
  { family: "node", markers: [".node."] },
  { family: "interface-status", markers: [".interface.status"] },
  { family: "interface-statistics", markers: [".interface.statistics"] },
  {
    family: "address",
    markers: [".subinterface.ipv4.address", ".subinterface.ipv6.address"],
  },
];

/**
 * Classify a telemetry path. Matching is non-exclusive: every family whose
 * marker occurs in the path is returned, in FAMILY_MATCHERS order. A path with
 * no recognized marker yields an empty list.
 */
export function classifyPath(path: string): RecordFamily[] {
  return FAMILY_MATCHERS.filter(({ markers }) =>
    markers.some((marker) => path.includes(marker)),
  ).map(({ family }) => family);
}
