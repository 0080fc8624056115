import { RiskDashboard } from "./risk-dashboard";

export const dynamic = "force-dynamic";

export default function RiskPage() {
  return <RiskDashboard />;
}
