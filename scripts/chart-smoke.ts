#!/usr/bin/env tsx
/*
 Runs the reference chart questions against a running server and saves the PNGs.
 Usage:
   npm run chart-smoke -- [--url http://localhost:8000] [--out test_charts]
*/
import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
dotenv.config({ path: ".env.local" });
dotenv.config();
import { askQuestion } from "../src/lib/client";
import { toErrorMessage } from "../src/lib/errors";
import { CHART_CASES, judgeCase, safeFilename } from "./chart-cases";
import type { CaseOutcome, ChartCase } from "./chart-cases";

function parseArgs() {
  const args = process.argv.slice(2);
  const out: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a.startsWith("--")) {
      out[a.slice(2)] = args[i + 1] ?? "";
      i++;
    }
  }
  return out;
}

function truncate(s: string, n = 500) {
  return s.length > n ? s.slice(0, n) + "…" : s;
}

async function main() {
  const args = parseArgs();
  const baseUrl = args.url || `http://localhost:${process.env.PORT || 8000}`;
  const outDir = path.resolve(process.cwd(), args.out || "test_charts");
  const results: Record<CaseOutcome, ChartCase[]> = { passed: [], error_handled: [], failed: [] };

  for (const [i, c] of CHART_CASES.entries()) {
    console.log(`\n[${i + 1}/${CHART_CASES.length}] ${c.category}: ${c.question}`);
    console.log(`  Expected: ${c.expected}`);
    let outcome: CaseOutcome = "failed";
    try {
      const res = await askQuestion(baseUrl, { question: c.question, chart: true });
      console.log(`  Answer: ${truncate(res.answer)}`);
      if (res.chart) {
        const d = res.chart.descriptor;
        console.log(`  Chart: ${d.chart_type} "${d.title}" labels=${JSON.stringify(d.labels)} values=${JSON.stringify(d.values)}`);
        const image = Buffer.from(res.chart.image, "base64");
        fs.mkdirSync(outDir, { recursive: true });
        const file = path.join(outDir, `${safeFilename(c.question)}.png`);
        fs.writeFileSync(file, image);
        console.log(`  Saved ${image.length} bytes to ${path.relative(process.cwd(), file)}`);
      }
      if (res.error) console.log(`  No chart (${res.error}): ${res.detail ?? ""}`);
      outcome = judgeCase(c, res);
    } catch (e) {
      console.warn("  Request failed:", toErrorMessage(e));
    }
    results[outcome].push(c);
    console.log(`  => ${outcome.toUpperCase()}`);
  }

  console.log("\n== Summary ==");
  console.log(`Passed: ${results.passed.length}/${CHART_CASES.length}`);
  console.log(`Error handling (expected): ${results.error_handled.length}/${CHART_CASES.length}`);
  console.log(`Failed: ${results.failed.length}/${CHART_CASES.length}`);
  for (const c of results.failed) console.log(`  - ${c.category}: ${c.question}`);
  if (results.failed.length > 0) process.exitCode = 1;
}

main().catch((e) => {
  console.error("chart-smoke error:", toErrorMessage(e));
  process.exit(1);
});
