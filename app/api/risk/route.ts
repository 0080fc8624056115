import { describeError, InvalidConfigError } from "@/src/lib/errors";
import { moduleLogger } from "@/src/lib/logger";
import { parseRiskQuery } from "@/src/lib/risk/request";
import { runRiskModel } from "@/src/lib/risk/run";

export const dynamic = "force-dynamic";

const log = moduleLogger("api.risk");

export async function GET(request: Request) {
  const query = parseRiskQuery(new URL(request.url).searchParams);
  if (!query.success) {
    return Response.json({ error: "Invalid query", issues: query.errors }, { status: 400 });
  }

  try {
    const report = await runRiskModel(query.settings);
    return Response.json(report);
  } catch (error) {
    log.error({ err: describeError(error) }, "risk run failed");
    const status = error instanceof InvalidConfigError ? 400 : 500;
    return Response.json({ error: describeError(error, "Risk run failed") }, { status });
  }
}
