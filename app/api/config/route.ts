import { DEFAULT_RISK_MODEL_CONFIG } from "@/src/lib/config/defaults";
import { REGULATORY_SCORES } from "@/src/lib/scoring/regulatory";

export async function GET() {
  return Response.json({
    config: DEFAULT_RISK_MODEL_CONFIG,
    regulatoryScores: REGULATORY_SCORES
  });
}
