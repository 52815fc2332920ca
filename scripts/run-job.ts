import "dotenv/config";
import { loadRuntimeConfig } from "../src/infra/config.js";
import { buildRuntime, type SettlementRuntime } from "../src/runtime.js";

const JOBS = ["renewals", "dunning", "expiry", "reconciliation"] as const;
type JobName = (typeof JOBS)[number];

async function runJob(runtime: SettlementRuntime, job: JobName, argument: string | undefined): Promise<Record<string, number>> {
  switch (job) {
    case "renewals":
      return { ...(await runtime.subscriptions.processDueRenewals(argument)) };
    case "dunning":
      return { ...(await runtime.subscriptions.processDunning(argument)) };
    case "expiry":
      return { ...(await runtime.payments.expireStaleIntents(argument)) };
    case "reconciliation": {
      const result = await runtime.reconciliation.runForDate(argument);
      const pending = result.records.filter((record) => record.resolution === "pending").length;
      return { records: result.records.length, pending, errors: result.errors };
    }
  }
}

async function main(): Promise<void> {
  const [jobArgument, timeArgument] = process.argv.slice(2);
  const job = JOBS.find((name) => name === jobArgument);
  const config = loadRuntimeConfig();
  const runtime = buildRuntime(config);
  if (!job) {
    runtime.logger.error({ job: jobArgument, allowed: JOBS }, "usage: run-job <renewals|dunning|expiry|reconciliation> [time|date]");
    process.exitCode = 2;
    await runtime.close();
    return;
  }

  try {
    const counts = await runJob(runtime, job, timeArgument);
    runtime.metrics.recordJobItems(job, counts);
    runtime.logger.info({ job, ...counts }, "job finished");
    if ((counts.errors ?? 0) > 0) {
      process.exitCode = 1;
    }
  } finally {
    await runtime.close();
  }
}

await main();
