import { loadConfigFromDotenv } from "../config.js";
import { loadInvoices } from "../adapters/loadInvoices.js";
import { loadVendorHistory } from "../adapters/loadVendorHistory.js";
import { LearningDatabase } from "../db/learningDatabase.js";
import { requestAdvisory, type AdvisoryProvider } from "../engine/advisory.js";
import { learnIfApproved } from "../engine/learnFromApproval.js";
import { createEngine, runPipeline } from "../engine/runPipeline.js";
import { getArg, hasFlag } from "../utils/args.js";

const file = getArg("file") ?? "data/invoices.json";
const invoiceId = getArg("invoiceId");
const approve = hasFlag("approve");

// No analysis service ships with the demo; plug one in here.
const advisoryProvider: AdvisoryProvider | null = null;

async function main() {
  const config = loadConfigFromDotenv();

  // Throws VendorHistoryLoadError: nothing can be compared without the seed.
  const history = loadVendorHistory(config.vendorHistoryPath);
  console.log(`[runInvoice] vendor history v${history.version}`, history.stats());

  const learning = LearningDatabase.open(config.dbPath);

  try {
    const inputs = loadInvoices(file).filter(
      (x) => !invoiceId || x.extracted.invoice.invoiceId === invoiceId
    );

    if (inputs.length === 0) {
      throw new Error(invoiceId ? `Invoice not found: ${invoiceId}` : `No invoices in ${file}`);
    }

    const engine = createEngine({ history, learned: learning, config: config.engine });

    for (const input of inputs) {
      const result = runPipeline(engine, input);
      console.log(JSON.stringify(result, null, 2));

      const advisory = await requestAdvisory(
        advisoryProvider,
        {
          invoiceId: result.invoiceId,
          vendorId: result.vendorId,
          verdicts: result.verdicts,
          decision: result.decision,
        },
        { timeoutMs: config.advisoryTimeoutMs }
      );
      console.log(`[runInvoice] ${result.invoiceId}: advisory ${advisory.status}`);

      if (!approve) continue;

      // --approve signs off clean invoices only; flagged ones still need a reviewer.
      const learned = learnIfApproved(
        learning,
        result,
        input.extracted.invoice,
        input.extracted.invoice.invoiceDate ?? new Date().toISOString()
      );

      if (learned === null) {
        console.log(`[runInvoice] ${result.invoiceId}: FLAGGED, not learned without a reviewer.`);
      } else if (!learned.ok) {
        console.error(`[runInvoice] ${result.invoiceId}: learning failed: ${learned.error}`);
        process.exitCode = 1;
      } else if (learned.skipped) {
        console.log(`[runInvoice] ${result.invoiceId}: already learned, skipped.`);
      } else {
        console.log(
          `[runInvoice] ${result.invoiceId}: recorded ${learned.observations.length} observation(s).`
        );
      }
    }

    console.log("\n[runInvoice] learning database:", learning.stats());
  } finally {
    learning.close();
  }
}

main().catch((e) => {
  console.error(`[runInvoice] ${e instanceof Error ? e.message : String(e)}`);
  process.exit(1);
});
