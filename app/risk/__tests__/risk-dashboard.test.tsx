// @vitest-environment jsdom
import { act, fireEvent, render, screen } from "@testing-library/react";
import { DEFAULT_RISK_MODEL_CONFIG } from "@/src/lib/config/defaults";
import { buildValuation } from "@/src/lib/portfolio/valuation";
import { evaluate } from "@/src/lib/scoring/engine";
import type { FetchFailure, MarketSnapshot, Portfolio, RiskReport } from "@/src/lib/types";
import {
  DegradedNotice,
  PortfolioSummary,
  RiskDashboard,
  RiskTable,
  buildRiskCsv,
  buildRiskQuery,
  buildRiskRows,
  sortRows
} from "../risk-dashboard";
import type { RiskRow } from "../risk-dashboard";

const portfolio: Portfolio = {
  startingNav: 100_000,
  holdings: [
    {
      id: "AAA",
      name: "Alpha Protocol",
      coingeckoId: "aaa",
      defillamaSlug: "aaa-protocol",
      weight: 0.5,
      classification: "other",
      pegPrice: null
    },
    {
      id: "STB",
      name: "Stable Dollar",
      coingeckoId: "stb",
      defillamaSlug: null,
      weight: 0.5,
      classification: "stable",
      pegPrice: 1
    }
  ]
};

const SNAPSHOTS: Record<string, MarketSnapshot> = {
  AAA: {
    holdingId: "AAA",
    price: 10,
    marketCap: 2_000_000_000,
    volume24h: 100_000_000,
    volatility: 0.7,
    tvl: 500_000_000,
    correlation: { btc: 0.5, eth: 0.5 },
    asOf: "2026-03-01T00:00:00.000Z"
  },
  STB: {
    holdingId: "STB",
    price: null,
    marketCap: 30_000_000_000,
    volume24h: 5_000_000_000,
    volatility: null,
    tvl: null,
    correlation: { btc: null, eth: null },
    asOf: "2026-03-01T00:00:00.000Z"
  }
};

const makeReport = (
  snapshots: Record<string, MarketSnapshot> = SNAPSHOTS,
  failures: FetchFailure[] = [],
  startingNav = portfolio.startingNav
): RiskReport => ({
  generatedAt: "2026-03-01T00:00:00.000Z",
  settings: { emphasis: "balanced", historyDays: 90, volatilityWindow: 30, excludeStables: true },
  horizonWeights: DEFAULT_RISK_MODEL_CONFIG.horizonWeights,
  evaluation: evaluate(portfolio, snapshots, DEFAULT_RISK_MODEL_CONFIG, failures),
  snapshots,
  valuation: buildValuation({ ...portfolio, startingNav }, snapshots),
  failures
});

type PendingResponse = { ok: boolean; json: () => Promise<RiskReport> };

const createPendingRequest = () => {
  let resolve: (response: PendingResponse) => void = () => undefined;
  const promise = new Promise<PendingResponse>((settle) => {
    resolve = settle;
  });
  return {
    promise,
    respond: (report: RiskReport) => resolve({ ok: true, json: async () => report })
  };
};

const flushRequests = () =>
  act(async () => {
    await new Promise((settle) => setTimeout(settle, 0));
  });

describe("risk dashboard", () => {
  it("exports the table as CSV", () => {
    const csv = buildRiskCsv(buildRiskRows(makeReport()));

    expect(csv.split("\n")).toEqual([
      "Token,Price,Alloc %,Units,Current Value,30d Vol,Corr BTC,Corr ETH,Short,Medium,Long",
      "AAA,10.0000,50,5000.0000,50000,0.7000,0.50,0.50,3.10,3.20,3.30",
      "STB,1.0000,50,50000.0000,50000,,,,1.60,2.15,2.50"
    ]);
  });

  it("sorts by horizon score and sinks rows without a value", () => {
    const rows = buildRiskRows(makeReport());

    expect(sortRows(rows, { key: "short", direction: "asc" }).map((row) => row.id)).toEqual([
      "STB",
      "AAA"
    ]);
    expect(sortRows(rows, { key: "volatility", direction: "desc" }).map((row) => row.id)).toEqual([
      "AAA",
      "STB"
    ]);
    expect(sortRows(rows, { key: "volatility", direction: "asc" }).map((row) => row.id)).toEqual([
      "AAA",
      "STB"
    ]);
  });

  it("serialises run settings into the API query", () => {
    expect(
      buildRiskQuery({ emphasis: "short", historyDays: 90, volatilityWindow: 30, excludeStables: true }).toString()
    ).toBe("emphasis=short&historyDays=90&volatilityWindow=30&excludeStables=true");
  });

  it("renders holdings with pinned prices and unscored rows", () => {
    const rows = buildRiskRows(makeReport());
    const unscored: RiskRow = {
      id: "CCC",
      price: null,
      pricePinned: false,
      allocation: 0,
      units: null,
      currentValue: null,
      volatility: null,
      corrBtc: null,
      corrEth: null,
      composite: null
    };

    render(
      <RiskTable
        rows={[...rows, unscored]}
        sort={{ key: "short", direction: "desc" }}
        onSortChange={() => undefined}
      />
    );

    expect(screen.getByText("AAA")).toBeInTheDocument();
    expect(screen.getByText("$10.00")).toBeInTheDocument();
    expect(screen.getByText("peg")).toBeInTheDocument();
    expect(screen.getByText("3.10")).toBeInTheDocument();
    expect(screen.getAllByText("n/a")).toHaveLength(3);
  });

  it("shows portfolio NAV and horizon scores", () => {
    render(<PortfolioSummary report={makeReport()} />);

    expect(screen.getByText("$100,000")).toBeInTheDocument();
    expect(screen.getByText("2.35")).toBeInTheDocument();
    expect(screen.getByText("Market 2.25")).toBeInTheDocument();
  });

  it("warns when holdings were excluded from the scores", () => {
    const failure: FetchFailure = {
      code: "DATA_FETCH_FAILURE",
      holdingId: "STB",
      message: "STB: no market data returned."
    };
    const report = makeReport({ AAA: SNAPSHOTS.AAA }, [failure]);

    render(<DegradedNotice evaluation={report.evaluation} />);

    expect(screen.getByRole("alert")).toBeInTheDocument();
    expect(screen.getByText("Degraded data: scores cover 50% of the book.")).toBeInTheDocument();
    expect(screen.getByText("Excluded: STB")).toBeInTheDocument();
    expect(screen.getByText("STB: no market data returned.")).toBeInTheDocument();
  });

  it("renders nothing for a complete run", () => {
    const { container } = render(<DegradedNotice evaluation={makeReport().evaluation} />);
    expect(container).toBeEmptyDOMElement();
  });

  describe("refreshing", () => {
    afterEach(() => {
      vi.unstubAllGlobals();
    });

    it("keeps the latest run when an older response arrives last", async () => {
      const requests: Array<ReturnType<typeof createPendingRequest>> = [];
      const fetchMock = vi.fn((_url: string, _init?: RequestInit) => {
        const request = createPendingRequest();
        requests.push(request);
        return request.promise;
      });
      vi.stubGlobal("fetch", fetchMock);

      render(<RiskDashboard />);
      expect(fetchMock).toHaveBeenCalledTimes(1);

      fireEvent.change(screen.getAllByRole("slider")[0], { target: { value: "120" } });
      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(fetchMock.mock.calls[1][0]).toContain("historyDays=120");
      expect(fetchMock.mock.calls[0][1]?.signal?.aborted).toBe(true);

      requests[1].respond(makeReport(SNAPSHOTS, [], 200_000));
      await flushRequests();
      expect(screen.getByText("$200,000")).toBeInTheDocument();
      expect(screen.getByRole("button", { name: "Refresh" })).toBeInTheDocument();

      requests[0].respond(makeReport(SNAPSHOTS, [], 300_000));
      await flushRequests();
      expect(screen.getByText("$200,000")).toBeInTheDocument();
      expect(screen.queryByText("$300,000")).toBeNull();
    });

    it("stays busy until the latest request settles", async () => {
      const requests: Array<ReturnType<typeof createPendingRequest>> = [];
      vi.stubGlobal(
        "fetch",
        vi.fn(() => {
          const request = createPendingRequest();
          requests.push(request);
          return request.promise;
        })
      );

      render(<RiskDashboard />);
      fireEvent.change(screen.getAllByRole("slider")[0], { target: { value: "120" } });

      requests[0].respond(makeReport(SNAPSHOTS, [], 300_000));
      await flushRequests();
      expect(screen.getByRole("button", { name: "Refreshing..." })).toBeDisabled();
      expect(screen.queryByText("$300,000")).toBeNull();

      requests[1].respond(makeReport(SNAPSHOTS, [], 200_000));
      await flushRequests();
      expect(screen.getByRole("button", { name: "Refresh" })).toBeEnabled();
      expect(screen.getByText("$200,000")).toBeInTheDocument();
    });
  });
});
