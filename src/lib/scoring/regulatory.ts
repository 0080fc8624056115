import type { Classification, RegulatoryTable } from "@/src/lib/types";

export const REGULATORY_SCORES: RegulatoryTable = {
  stable: 3,
  "blue-chip": 2,
  other: 4
};

export const scoreRegulatoryRisk = (classification: Classification) =>
  REGULATORY_SCORES[classification];
