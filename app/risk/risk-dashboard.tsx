"use client";

import { useCallback, useEffect, useMemo, useRef, useState } from "react";
import { HORIZONS, RISK_CATEGORIES } from "@/src/lib/types";
import type {
  HorizonEmphasis,
  HorizonScores,
  PortfolioEvaluation,
  RiskCategory,
  RiskReport,
  RiskRunSettings
} from "@/src/lib/types";

const DEFAULT_SETTINGS: RiskRunSettings = {
  emphasis: "balanced",
  historyDays: 90,
  volatilityWindow: 30,
  excludeStables: true
};

const EMPHASIS_OPTIONS: Array<{ value: HorizonEmphasis; label: string }> = [
  { value: "balanced", label: "Balanced" },
  { value: "short", label: "Short term" },
  { value: "medium", label: "Medium term" },
  { value: "long", label: "Long term" }
];

const HORIZON_LABELS: Record<keyof HorizonScores, string> = {
  short: "Short (0-3m)",
  medium: "Medium (3-18m)",
  long: "Long (18m+)"
};

const CATEGORY_LABELS: Record<RiskCategory, string> = {
  market: "Market",
  liquidity: "Liquidity",
  protocol: "Protocol",
  regulatory: "Regulatory"
};

type SortKey = "token" | "allocation" | "volatility" | keyof HorizonScores;

type SortState = { key: SortKey; direction: "asc" | "desc" };

export type RiskRow = {
  id: string;
  price: number | null;
  pricePinned: boolean;
  allocation: number;
  units: number | null;
  currentValue: number | null;
  volatility: number | null;
  corrBtc: number | null;
  corrEth: number | null;
  composite: HorizonScores | null;
};

const numberFormatter = new Intl.NumberFormat("en-US", {
  maximumFractionDigits: 2,
  minimumFractionDigits: 2
});

const navFormatter = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 0,
  maximumFractionDigits: 0
});

const priceFormatter = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  maximumFractionDigits: 4
});

const formatOrDash = (value: number | null, format: (value: number) => string) =>
  value === null ? "--" : format(value);

const formatScore = (value: number | null) => formatOrDash(value, (v) => numberFormatter.format(v));
const formatUsd = (value: number | null) => formatOrDash(value, (v) => navFormatter.format(v));
const formatPrice = (value: number | null) => formatOrDash(value, (v) => priceFormatter.format(v));
const formatFixed = (value: number | null, digits: number) =>
  formatOrDash(value, (v) => v.toFixed(digits));
const formatAllocation = (weight: number) => `${Math.round(weight * 100)}%`;

const formatDateTime = (value: string | null) => {
  if (!value) return "--";
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) return "--";
  return date.toLocaleString();
};

export const buildRiskRows = (report: RiskReport): RiskRow[] => {
  const scores = new Map(
    report.evaluation.holdings.map((item) => [item.holdingId, item.score.composite])
  );

  return report.valuation.holdings.map((valuation) => {
    const snapshot = report.snapshots[valuation.holdingId];
    return {
      id: valuation.holdingId,
      price: valuation.price,
      pricePinned: valuation.pricePinned,
      allocation: valuation.weight,
      units: valuation.units,
      currentValue: valuation.currentValue,
      volatility: snapshot?.volatility ?? null,
      corrBtc: snapshot?.correlation.btc ?? null,
      corrEth: snapshot?.correlation.eth ?? null,
      composite: scores.get(valuation.holdingId) ?? null
    };
  });
};

const sortValue = (row: RiskRow, key: SortKey): number | string | null => {
  switch (key) {
    case "token":
      return row.id;
    case "allocation":
      return row.allocation;
    case "volatility":
      return row.volatility;
    default:
      return row.composite ? row.composite[key] : null;
  }
};

/** Rows without a value for the sort key always sink to the bottom. */
export const sortRows = (rows: RiskRow[], sort: SortState): RiskRow[] => {
  const direction = sort.direction === "asc" ? 1 : -1;

  return [...rows].sort((a, b) => {
    const valueA = sortValue(a, sort.key);
    const valueB = sortValue(b, sort.key);
    if (valueA === null && valueB === null) return 0;
    if (valueA === null) return 1;
    if (valueB === null) return -1;
    if (valueA < valueB) return -1 * direction;
    if (valueA > valueB) return 1 * direction;
    return 0;
  });
};

const csvNumber = (value: number | null, digits: number) =>
  value === null ? "" : value.toFixed(digits);

export const buildRiskCsv = (rows: RiskRow[]) => {
  const headers = [
    "Token",
    "Price",
    "Alloc %",
    "Units",
    "Current Value",
    "30d Vol",
    "Corr BTC",
    "Corr ETH",
    "Short",
    "Medium",
    "Long"
  ];

  const lines = rows.map((row) => [
    row.id,
    csvNumber(row.price, 4),
    (row.allocation * 100).toFixed(0),
    csvNumber(row.units, 4),
    csvNumber(row.currentValue, 0),
    csvNumber(row.volatility, 4),
    csvNumber(row.corrBtc, 2),
    csvNumber(row.corrEth, 2),
    csvNumber(row.composite?.short ?? null, 2),
    csvNumber(row.composite?.medium ?? null, 2),
    csvNumber(row.composite?.long ?? null, 2)
  ]);

  return [headers, ...lines].map((line) => line.join(",")).join("\n");
};

export const buildRiskQuery = (settings: RiskRunSettings) =>
  new URLSearchParams({
    emphasis: settings.emphasis,
    historyDays: String(settings.historyDays),
    volatilityWindow: String(settings.volatilityWindow),
    excludeStables: String(settings.excludeStables)
  });

const downloadCsv = (content: string, filename: string) => {
  const blob = new Blob([content], { type: "text/csv;charset=utf-8;" });
  const url = URL.createObjectURL(blob);
  const link = document.createElement("a");
  link.href = url;
  link.download = filename;
  link.click();
  URL.revokeObjectURL(url);
};

const Toggle = ({
  checked,
  onChange,
  label
}: {
  checked: boolean;
  onChange: (value: boolean) => void;
  label: string;
}) => (
  <label className="inline-flex items-center gap-2 text-xs font-semibold text-black/70">
    <span className="relative inline-flex h-6 w-11 items-center rounded-full border border-black/10 bg-white">
      <input
        type="checkbox"
        className="peer sr-only"
        checked={checked}
        onChange={(event) => onChange(event.target.checked)}
      />
      <span className="h-5 w-5 translate-x-0.5 rounded-full bg-black/20 transition peer-checked:translate-x-5 peer-checked:bg-ember" />
    </span>
    {label}
  </label>
);

const RangeControl = ({
  label,
  value,
  min,
  max,
  step,
  onChange
}: {
  label: string;
  value: number;
  min: number;
  max: number;
  step: number;
  onChange: (value: number) => void;
}) => (
  <label className="block text-xs font-semibold uppercase tracking-[0.3em] text-black/50">
    {label}
    <div className="mt-2 flex items-center gap-3">
      <input
        type="range"
        className="w-full accent-ember"
        min={min}
        max={max}
        step={step}
        value={value}
        onChange={(event) => onChange(Number(event.target.value))}
      />
      <span className="w-10 text-right text-sm normal-case tracking-normal text-ink">{value}</span>
    </div>
  </label>
);

export const DegradedNotice = ({ evaluation }: { evaluation: PortfolioEvaluation }) => {
  if (!evaluation.portfolio.degraded) return null;

  const coverage = Math.round(evaluation.portfolio.coverage * 100);

  return (
    <div
      role="alert"
      className="rounded-2xl border border-ember/30 bg-ember/5 p-4 text-sm text-black/70"
    >
      <p className="font-semibold text-ember">Degraded data: scores cover {coverage}% of the book.</p>
      {evaluation.portfolio.excluded.length > 0 ? (
        <p className="mt-1">Excluded: {evaluation.portfolio.excluded.join(", ")}</p>
      ) : null}
      <ul className="mt-2 list-disc space-y-1 pl-5 text-xs">
        {evaluation.issues.map((issue) => (
          <li key={`${issue.code}-${issue.holdingId}-${issue.message}`}>{issue.message}</li>
        ))}
      </ul>
    </div>
  );
};

export const PortfolioSummary = ({ report }: { report: RiskReport }) => {
  const { portfolio } = report.evaluation;

  return (
    <div className="grid gap-4 md:grid-cols-[0.8fr_1.2fr]">
      <div className="rounded-2xl border border-black/10 bg-white/90 p-6">
        <p className="text-xs uppercase tracking-[0.3em] text-black/50">Current NAV</p>
        <p className="mt-3 text-3xl font-semibold text-ink">{formatUsd(report.valuation.nav)}</p>
        <p className="mt-2 text-xs text-black/50">
          Recomputed from live prices at load time. Starting NAV{" "}
          {formatUsd(report.valuation.startingNav)}.
        </p>
      </div>
      <div className="rounded-2xl border border-black/10 bg-white/90 p-6">
        <p className="text-xs uppercase tracking-[0.3em] text-black/50">Portfolio risk</p>
        <div className="mt-3 grid grid-cols-3 gap-3">
          {HORIZONS.map((horizon) => (
            <div key={horizon} className="rounded-xl bg-black/5 p-3">
              <p className="text-[11px] uppercase tracking-[0.2em] text-black/50">
                {HORIZON_LABELS[horizon]}
              </p>
              <p className="mt-1 text-xl font-semibold text-ink">
                {formatScore(portfolio.composite?.[horizon] ?? null)}
              </p>
            </div>
          ))}
        </div>
        <div className="mt-4 flex flex-wrap gap-2 text-xs text-black/70">
          {RISK_CATEGORIES.map((category) => (
            <span key={category} className="rounded-full bg-black/5 px-3 py-1">
              {CATEGORY_LABELS[category]} {formatScore(portfolio.categories?.[category] ?? null)}
            </span>
          ))}
        </div>
      </div>
    </div>
  );
};

export const RiskTable = ({
  rows,
  sort,
  onSortChange
}: {
  rows: RiskRow[];
  sort: SortState;
  onSortChange: (next: SortState) => void;
}) => {
  const handleSort = (key: SortKey) => {
    if (sort.key === key) {
      onSortChange({ key, direction: sort.direction === "asc" ? "desc" : "asc" });
      return;
    }
    onSortChange({ key, direction: "desc" });
  };

  const renderSortIndicator = (key: SortKey) => {
    if (sort.key !== key) return "";
    return sort.direction === "asc" ? "↑" : "↓";
  };

  return (
    <div className="overflow-hidden rounded-2xl border border-black/10 bg-white/90">
      <div className="max-h-[560px] overflow-auto">
        <table className="w-full text-left text-xs">
          <thead className="sticky top-0 bg-[#f8f5ef] text-[11px] uppercase tracking-[0.2em] text-black/50">
            <tr>
              <th className="px-4 py-3">
                <button type="button" onClick={() => handleSort("token")}>
                  Token {renderSortIndicator("token")}
                </button>
              </th>
              <th className="px-4 py-3">Price</th>
              <th className="px-4 py-3">
                <button type="button" onClick={() => handleSort("allocation")}>
                  Alloc {renderSortIndicator("allocation")}
                </button>
              </th>
              <th className="px-4 py-3">Units</th>
              <th className="px-4 py-3">Value</th>
              <th className="px-4 py-3">
                <button type="button" onClick={() => handleSort("volatility")}>
                  30d vol {renderSortIndicator("volatility")}
                </button>
              </th>
              <th className="px-4 py-3">Corr BTC</th>
              <th className="px-4 py-3">Corr ETH</th>
              {HORIZONS.map((horizon) => (
                <th key={horizon} className="px-4 py-3">
                  <button type="button" onClick={() => handleSort(horizon)}>
                    {horizon} {renderSortIndicator(horizon)}
                  </button>
                </th>
              ))}
            </tr>
          </thead>
          <tbody className="divide-y divide-black/5 text-sm">
            {rows.map((row) => (
              <tr key={row.id} className="transition hover:bg-black/5">
                <td className="px-4 py-3 font-semibold text-ink">{row.id}</td>
                <td className="px-4 py-3 text-black/70">
                  {formatPrice(row.price)}
                  {row.pricePinned ? <span className="ml-1 text-[10px] text-black/40">peg</span> : null}
                </td>
                <td className="px-4 py-3 text-black/70">{formatAllocation(row.allocation)}</td>
                <td className="px-4 py-3 text-black/70">{formatFixed(row.units, 4)}</td>
                <td className="px-4 py-3 text-black/70">{formatUsd(row.currentValue)}</td>
                <td className="px-4 py-3 text-black/70">{formatFixed(row.volatility, 4)}</td>
                <td className="px-4 py-3 text-black/70">{formatFixed(row.corrBtc, 2)}</td>
                <td className="px-4 py-3 text-black/70">{formatFixed(row.corrEth, 2)}</td>
                {HORIZONS.map((horizon) => (
                  <td key={horizon} className="px-4 py-3">
                    {row.composite ? (
                      <span className="rounded-full bg-ember/10 px-3 py-1 text-xs font-semibold text-ember">
                        {formatScore(row.composite[horizon])}
                      </span>
                    ) : (
                      <span className="text-black/40">n/a</span>
                    )}
                  </td>
                ))}
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </div>
  );
};

const ModelNotes = () => (
  <details className="rounded-2xl border border-black/10 bg-white/80 p-4 text-sm text-black/70">
    <summary className="cursor-pointer font-semibold text-ink">How to use this model</summary>
    <div className="mt-3 grid gap-4 md:grid-cols-2">
      <div>
        <p className="text-xs uppercase tracking-[0.3em] text-black/50">What it measures</p>
        <ul className="mt-2 list-disc space-y-1 pl-5 text-xs">
          <li>Market risk: volatility, market cap tier, BTC/ETH correlation.</li>
          <li>Liquidity risk: 24h volume relative to market cap.</li>
          <li>Protocol risk: DefiLlama TVL tiers where a protocol is tracked.</li>
          <li>Regulatory risk: stables 3, blue chips 2, others 4.</li>
          <li>Missing metrics score at maximum risk and flag the run as degraded.</li>
        </ul>
      </div>
      <div>
        <p className="text-xs uppercase tracking-[0.3em] text-black/50">When to act</p>
        <ul className="mt-2 list-disc space-y-1 pl-5 text-xs">
          <li>Short-term risk above 4: trim the highest-vol sleeve by about 20%.</li>
          <li>A token&apos;s TVL down 20% in 7 days: move it to the watchlist.</li>
          <li>Rebalance on 10-15% drift or triggered thresholds.</li>
          <li>Young tokens have short histories; protocol events can dominate any model.</li>
        </ul>
      </div>
    </div>
  </details>
);

const LoadingSkeleton = () => (
  <div className="rounded-2xl border border-black/10 bg-white/80 p-6">
    <div className="space-y-4">
      {Array.from({ length: 6 }).map((_, index) => (
        <div
          key={`skeleton-${index}`}
          className="h-6 w-full animate-pulse rounded-full bg-black/5"
        />
      ))}
    </div>
  </div>
);

export const RiskDashboard = () => {
  const [settings, setSettings] = useState<RiskRunSettings>(DEFAULT_SETTINGS);
  const [report, setReport] = useState<RiskReport | null>(null);
  const [isLoading, setIsLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [sortState, setSortState] = useState<SortState>({ key: "short", direction: "desc" });

  const requestRef = useRef<AbortController | null>(null);

  // Only the latest request may update state; starting one cancels the last.
  const loadReport = useCallback(async (next: RiskRunSettings) => {
    requestRef.current?.abort();
    const controller = new AbortController();
    requestRef.current = controller;

    setIsLoading(true);
    setError(null);
    try {
      const res = await fetch(`/api/risk?${buildRiskQuery(next).toString()}`, {
        cache: "no-store",
        signal: controller.signal
      });
      if (!res.ok) {
        throw new Error("Unable to evaluate portfolio risk.");
      }
      const data: RiskReport = await res.json();
      if (controller.signal.aborted) return;
      setReport(data);
    } catch (err) {
      if (controller.signal.aborted) return;
      setError(err instanceof Error ? err.message : "Risk evaluation failed.");
    } finally {
      if (requestRef.current === controller) {
        requestRef.current = null;
        setIsLoading(false);
      }
    }
  }, []);

  useEffect(() => {
    void loadReport(settings);
  }, [settings, loadReport]);

  useEffect(() => () => requestRef.current?.abort(), []);

  const rows = useMemo(() => (report ? buildRiskRows(report) : []), [report]);
  const sortedRows = useMemo(() => sortRows(rows, sortState), [rows, sortState]);

  const updateSettings = (patch: Partial<RiskRunSettings>) =>
    setSettings((prev) => ({ ...prev, ...patch }));

  return (
    <section className="grid gap-8">
      <div className="rounded-3xl border border-black/10 bg-white/90 p-6 shadow-sm">
        <div className="flex flex-col gap-6 md:flex-row md:items-start md:justify-between">
          <div>
            <p className="text-xs uppercase tracking-[0.35em] text-black/50">Risk dashboard</p>
            <h1 className="mt-3 text-3xl font-semibold text-ink md:text-4xl">
              DeFi risk model and $100k portfolio
            </h1>
            <p className="mt-3 max-w-2xl text-sm text-black/70">
              Live market data scored across market, liquidity, protocol and regulatory risk for
              short, medium and long horizons.
            </p>
          </div>
          <div className="rounded-2xl border border-black/10 bg-white px-4 py-3 text-xs text-black/60">
            <p className="text-xs uppercase tracking-[0.3em] text-black/50">Last run</p>
            <p className="mt-2 text-sm font-semibold text-ink">
              {formatDateTime(report?.generatedAt ?? null)}
            </p>
          </div>
        </div>

        <div className="mt-6 grid gap-6 md:grid-cols-4">
          <RangeControl
            label="History window (days)"
            value={settings.historyDays}
            min={45}
            max={180}
            step={15}
            onChange={(historyDays) => updateSettings({ historyDays })}
          />
          <RangeControl
            label="Volatility lookback (days)"
            value={settings.volatilityWindow}
            min={14}
            max={60}
            step={2}
            onChange={(volatilityWindow) => updateSettings({ volatilityWindow })}
          />
          <label className="block text-xs font-semibold uppercase tracking-[0.3em] text-black/50">
            Horizon emphasis
            <select
              className="mt-2 w-full rounded-xl border border-black/10 bg-white px-3 py-2 text-sm normal-case tracking-normal text-black/70"
              value={settings.emphasis}
              onChange={(event) => {
                const match = EMPHASIS_OPTIONS.find((option) => option.value === event.target.value);
                if (match) updateSettings({ emphasis: match.value });
              }}
            >
              {EMPHASIS_OPTIONS.map((option) => (
                <option key={option.value} value={option.value}>
                  {option.label}
                </option>
              ))}
            </select>
          </label>
          <div className="flex flex-col justify-between gap-3">
            <Toggle
              checked={settings.excludeStables}
              onChange={(excludeStables) => updateSettings({ excludeStables })}
              label="Exclude stables from vol/corr"
            />
            <button
              type="button"
              onClick={() => void loadReport(settings)}
              disabled={isLoading}
              className="w-full rounded-2xl bg-ember px-6 py-3 text-sm font-semibold text-white shadow-sm transition hover:bg-ember/90 disabled:cursor-not-allowed disabled:opacity-60"
            >
              {isLoading ? "Refreshing..." : "Refresh"}
            </button>
          </div>
        </div>
        {error ? <p className="mt-4 text-xs text-red-600">{error}</p> : null}
      </div>

      <ModelNotes />

      {isLoading && !report ? <LoadingSkeleton /> : null}

      {report ? (
        <>
          <PortfolioSummary report={report} />
          <DegradedNotice evaluation={report.evaluation} />
          <div className="flex items-center justify-between">
            <h2 className="text-sm font-semibold uppercase tracking-[0.3em] text-black/50">
              Risk-adjusted $100k portfolio
            </h2>
            <button
              type="button"
              className="rounded-full border border-black/10 bg-white px-4 py-2 text-xs font-semibold text-black/70"
              onClick={() => downloadCsv(buildRiskCsv(sortedRows), "risk_table.csv")}
            >
              Download CSV
            </button>
          </div>
          <RiskTable rows={sortedRows} sort={sortState} onSortChange={setSortState} />
        </>
      ) : null}
    </section>
  );
};
