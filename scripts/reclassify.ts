import { pool } from "../server/db";
import { storage } from "../server/storage";
import { createServices } from "../server/services";
import { USAGE, parseReclassifyArgs } from "./reclassify-args";

async function reclassify() {
  const parsed = parseReclassifyArgs(process.argv.slice(2));
  if (!parsed.success) {
    console.error(parsed.message);
    console.error(USAGE);
    process.exit(2);
  }

  const { classification } = createServices(storage);
  let failed = false;

  try {
    const summary = await classification.runClassification(parsed.args);
    console.log(
      `Run #${summary.run.id} (threshold ${summary.threshold}, summer ${summary.summerMode ? "on" : "off"}): ` +
        `${summary.stats.itemsScanned} scanned, ${summary.stats.itemsUpdated} updated, ` +
        `${summary.stats.itemsNeedingReview} need review, ${summary.stats.itemsFailed} failed`,
    );
    for (const failure of summary.failures) {
      console.log(`  ${failure.itemCode}: ${failure.error}`);
    }
  } catch (error) {
    failed = true;
    console.error("Reclassification failed:", error);
  } finally {
    await pool.end();
  }

  process.exit(failed ? 1 : 0);
}

reclassify().catch((error) => {
  console.error("Reclassification failed:", error);
  process.exit(1);
});
