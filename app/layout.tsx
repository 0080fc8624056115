import type { Metadata } from "next";
import Link from "next/link";
import type { ReactNode } from "react";
import "./globals.css";

export const metadata: Metadata = {
  title: "DeFi Risk Model",
  description: "Heuristic risk scores for a $100k DeFi model portfolio"
};

export default function RootLayout({
  children
}: {
  children: ReactNode;
}) {
  return (
    <html lang="en">
      <body className="min-h-screen">
        <div className="flex min-h-screen flex-col">
          <header className="border-b border-black/10 bg-white/70 backdrop-blur">
            <div className="mx-auto flex w-full max-w-[1200px] items-center justify-between px-4 py-4">
              <div className="flex items-center gap-3">
                <div className="h-8 w-8 rounded-full border border-black/10 bg-ember" />
                <span className="text-sm font-semibold tracking-[0.2em] text-ink">
                  DEFI RISK MODEL
                </span>
              </div>
              <nav className="flex items-center gap-6 text-sm text-black/70">
                <Link href="/">Overview</Link>
                <Link href="/risk">Dashboard</Link>
              </nav>
            </div>
          </header>
          <main className="mx-auto flex w-full max-w-[1200px] flex-1 flex-col gap-10 px-4 py-10">
            {children}
          </main>
          <footer className="border-t border-black/10 bg-white/80">
            <div className="mx-auto flex w-full max-w-[1200px] items-center justify-between px-4 py-6 text-xs text-black/60">
              <span>Heuristic scores only. Not risk-management advice.</span>
              <span>Data: CoinGecko, DefiLlama</span>
            </div>
          </footer>
        </div>
      </body>
    </html>
  );
}
