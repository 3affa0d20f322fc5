/**
 * ─────────────────────────────────────────────────────────
 * Quick terminal benchmarks against a running records-api.
 * Seed first (seed.ts) so the GET runs hit real rows.
 *
 * Run:
 *   npm run bench --workspace @daystore/load-testing
 *   ENDPOINT=post CONNECTIONS=100 npm run bench --workspace @daystore/load-testing
 *
 * ENDPOINT: all | get | empty | post | mixed
 * ─────────────────────────────────────────────────────────
 */

import autocannon from "autocannon";

// ─── Config ───────────────────────────────────────────────
const BASE_URL    = process.env.BASE_URL    || "http://localhost:8080";
const CONNECTIONS = parseInt(process.env.CONNECTIONS || "50", 10);
const DURATION    = parseInt(process.env.DURATION    || "30", 10); // seconds
const ENDPOINT    = process.env.ENDPOINT    || "all";
const SEEDED_DATE = process.env.SEEDED_DATE || "2024-01-01";

// ─── Sample POST body ─────────────────────────────────────
function makeRecordBody(): string {
  const day = String(1 + Math.floor(Math.random() * 28)).padStart(2, "0");
  return JSON.stringify({
    date: `2024-02-${day}`,
    data: { temp: Math.round(Math.random() * 400) / 10, source: "autocannon", tags: ["bench"] },
  });
}

function runBenchmark(config: autocannon.Options): Promise<autocannon.Result> {
  return new Promise((resolve, reject) => {
    const instance = autocannon(config, (err, result) => {
      if (err) reject(err);
      else resolve(result);
    });

    autocannon.track(instance, { renderProgressBar: true });
  });
}

function printResults(label: string, result: autocannon.Result) {
  console.log(`\n${"─".repeat(60)}`);
  console.log(`  📊 ${label}`);
  console.log(`${"─".repeat(60)}`);
  console.log(`  Total requests: ${result.requests.total.toLocaleString()}`);
  console.log(`  Req/sec:        ${result.requests.mean.toFixed(0)} avg`);
  console.log(`\n  Latency:`);
  console.log(`    p50  = ${result.latency.p50}ms`);
  console.log(`    p90  = ${result.latency.p90}ms`);
  console.log(`    p99  = ${result.latency.p99}ms`);
  console.log(`    max  = ${result.latency.max}ms`);
  console.log(`\n  Non-2xx: ${result.non2xx}   Errors: ${result.errors}   Timeouts: ${result.timeouts}`);

  const p99ok    = result.latency.p99 < 500;
  const errorsOk = result.errors === 0 && result.non2xx === 0;

  console.log(`\n  ${p99ok    ? "✅" : "❌"} p99 < 500ms   (actual: ${result.latency.p99}ms)`);
  console.log(`  ${errorsOk ? "✅" : "❌"} Zero failures  (actual: ${result.errors + result.non2xx})`);
}

// ─── Benchmarks ───────────────────────────────────────────
async function main() {
  console.log(`\n🔥 Autocannon Benchmark`);
  console.log(`   Target:      ${BASE_URL}`);
  console.log(`   Connections: ${CONNECTIONS} concurrent`);
  console.log(`   Duration:    ${DURATION}s per test\n`);

  const common = {
    url: BASE_URL,
    connections: CONNECTIONS,
    duration: DURATION,
    pipelining: 1,
    timeout: 10,
  };

  // ── 1. GET a seeded date ──────────────────────────────
  if (ENDPOINT === "all" || ENDPOINT === "get") {
    const url = `${BASE_URL}/records?date=${SEEDED_DATE}`;
    printResults(`GET /records?date=${SEEDED_DATE}`, await runBenchmark({ ...common, url }));
  }

  // ── 2. GET a date with no rows (index-only miss) ──────
  if (ENDPOINT === "all" || ENDPOINT === "empty") {
    const url = `${BASE_URL}/records?date=1999-01-01`;
    printResults("GET /records?date=1999-01-01", await runBenchmark({ ...common, url }));
  }

  // ── 3. POST /records ──────────────────────────────────
  if (ENDPOINT === "all" || ENDPOINT === "post") {
    const requests = Array.from({ length: 1000 }, (): autocannon.Request => ({
      method: "POST",
      path: "/records",
      headers: { "content-type": "application/json" },
      body: makeRecordBody(),
    }));
    printResults("POST /records", await runBenchmark({ ...common, requests }));
  }

  // ── 4. Mixed workload (80% GET, 20% POST) ─────────────
  if (ENDPOINT === "all" || ENDPOINT === "mixed") {
    const requests: autocannon.Request[] = [];

    for (let i = 0; i < 800; i++) {
      const day = String(1 + (i % 31)).padStart(2, "0");
      requests.push({ method: "GET", path: `/records?date=2024-01-${day}` });
    }
    for (let i = 0; i < 200; i++) {
      requests.push({
        method: "POST",
        path: "/records",
        headers: { "content-type": "application/json" },
        body: makeRecordBody(),
      });
    }

    for (let i = requests.length - 1; i > 0; i--) {
      const j = Math.floor(Math.random() * (i + 1));
      [requests[i], requests[j]] = [requests[j], requests[i]];
    }

    printResults("Mixed workload (80/20 GET/POST)", await runBenchmark({ ...common, requests }));
  }

  console.log("\n✅ Benchmarks complete!\n");
}

main().catch((err) => {
  console.error("❌ Benchmark failed:", err);
  process.exit(1);
});
