import Link from "next/link";

export default function HomePage() {
  return (
    <section className="grid gap-8">
      <div className="rounded-3xl border border-black/10 bg-white/90 p-8 shadow-sm">
        <p className="text-xs uppercase tracking-[0.35em] text-black/50">
          DeFi portfolio risk
        </p>
        <h1 className="mt-4 text-4xl font-semibold text-ink md:text-5xl">
          Score a $100k token book before the market does.
        </h1>
        <p className="mt-4 max-w-2xl text-base leading-relaxed text-black/70">
          Live volatility, market cap, volume, TVL and BTC/ETH correlation are mapped onto four
          risk categories and weighted for short, medium and long horizons.
        </p>
        <div className="mt-6 flex flex-wrap gap-3 text-sm">
          <Link href="/risk" className="rounded-full bg-ember px-4 py-2 text-white">
            Open dashboard
          </Link>
          <span className="rounded-full bg-black/5 px-4 py-2 text-black/70">
            Fails closed on missing data
          </span>
          <span className="rounded-full bg-black/5 px-4 py-2 text-black/70">
            Recomputed every refresh
          </span>
        </div>
      </div>

      <div className="grid gap-4 md:grid-cols-3">
        {[
          {
            title: "Short (0-3m)",
            body: "Overweights market and liquidity risk."
          },
          {
            title: "Medium (3-18m)",
            body: "Balances market and protocol risk."
          },
          {
            title: "Long (18m+)",
            body: "Overweights protocol and regulatory risk."
          }
        ].map((item) => (
          <div
            key={item.title}
            className="rounded-2xl border border-black/10 bg-white/80 p-6"
          >
            <h2 className="text-lg font-semibold text-ink">{item.title}</h2>
            <p className="mt-2 text-sm text-black/70">{item.body}</p>
          </div>
        ))}
      </div>
    </section>
  );
}
