import { createWorkerContext } from "../apps/worker/src/context.js";
import { processMissingSummaries } from "../apps/worker/src/jobs/enrich-summaries.js";

async function main() {
  const context = await createWorkerContext();
  const result = await processMissingSummaries(context);
  await context.repositories.close();
  // eslint-disable-next-line no-console
  console.log("Summary back-fill executed once.", result);
  process.exit(0);
}

void main();
