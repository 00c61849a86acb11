import "dotenv/config";
import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { join } from "node:path";
import {
  ConfigError,
  createConsoleLogger,
  createHttpAutomationClient,
  createNullAutomationClient,
  createSkillContext,
  describeError,
  extractPreferencesSkill,
  loadConfig,
  normalizeLocation,
  runSkill,
  type AppConfig,
  type AutomationClient,
  type Logger,
} from "@core/index";
import {
  createComparisonOrchestrator,
  FareHistory,
  saveBookingSnapshot,
  saveComparisonSnapshot,
  type ComparisonOrchestrator,
} from "@core/rides";
import { DEFAULT_DESTINATION_TEXT } from "@core/skills";
import {
  BANNER,
  renderBudgetWarning,
  renderComparisonTable,
  renderFailure,
  renderFastestNote,
  renderHelp,
  renderPreferences,
  renderProviderErrors,
} from "./render";

// ── Startup ─────────────────────────────────────────────────────────

function createAutomation(config: AppConfig, logger: Logger): AutomationClient {
  if (!config.automation.url) {
    logger.warn("AUTOMATION_URL not set; comparisons will find no quotes");
    return createNullAutomationClient("AUTOMATION_URL not set");
  }
  return createHttpAutomationClient({
    baseUrl: config.automation.url,
    apiKey: config.automation.apiKey,
    deviceSerial: config.deviceSerial,
    platform: config.platform,
    logger,
  });
}

function snapshotPath(config: AppConfig, kind: "comparison" | "booking"): string | null {
  if (!config.snapshotDir) return null;
  const stamp = new Date().toISOString().replace(/[:.]/g, "-");
  return join(config.snapshotDir, `${kind}-${stamp}.json`);
}

// ── One request ─────────────────────────────────────────────────────

async function handleRequest(
  text: string,
  ask: (question: string) => Promise<string>,
  orchestrator: ComparisonOrchestrator,
  config: AppConfig,
  logger: Logger
): Promise<void> {
  const extraction = await runSkill(extractPreferencesSkill, createSkillContext(logger, config.debug), { text });
  const preferences = extraction.output.preferences;
  console.log(renderPreferences(preferences));

  const pickupAnswer = (await ask(`Pickup (enter for ${DEFAULT_DESTINATION_TEXT}): `)).trim();
  const pickup = normalizeLocation(pickupAnswer || DEFAULT_DESTINATION_TEXT);
  const destination = normalizeLocation(preferences.destination);

  console.log(`\nComparing fares from ${pickup} to ${destination}...`);
  const outcome = await orchestrator.comparePrices(pickup, destination, preferences);
  if (!outcome.success) {
    console.log(renderFailure(outcome.failure));
    return;
  }

  const { comparison } = outcome;
  console.log(`\n${renderComparisonTable(comparison)}`);
  const fastest = renderFastestNote(comparison);
  if (fastest) console.log(fastest);
  const errors = renderProviderErrors(comparison.errors);
  if (errors) console.log(errors);
  const budgetWarning = renderBudgetWarning(comparison, preferences.budget);
  if (budgetWarning) console.log(budgetWarning);
  console.log(`\n${comparison.summary}`);

  const comparisonFile = snapshotPath(config, "comparison");
  if (comparisonFile) {
    await saveComparisonSnapshot(comparison, comparisonFile);
    logger.info(`Comparison saved to ${comparisonFile}`);
  }

  const confirm = (await ask(`\nBook ${comparison.cheapest.toUpperCase()}? (y/N) `)).trim().toLowerCase();
  if (confirm !== "y" && confirm !== "yes") return;

  const booking = await orchestrator.bookCheapest(pickup, destination, preferences, comparison);
  if (!booking.success) {
    console.log(renderFailure(booking.failure));
    return;
  }

  console.log(`\n${orchestrator.getLastBookingSummary() ?? booking.booking.bookingId}`);
  const bookingFile = snapshotPath(config, "booking");
  if (bookingFile) {
    await saveBookingSnapshot(booking.booking, bookingFile);
    logger.info(`Booking saved to ${bookingFile}`);
  }
}

// ── Main loop ───────────────────────────────────────────────────────

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`\n❌  ${error.message}\n\nCopy .env.example to .env and fix the values.\n`);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const logger = createConsoleLogger({ debug: config.debug, scope: "ride-compare" });
  const orchestrator = createComparisonOrchestrator({
    automation: createAutomation(config, logger),
    logger,
    timeouts: config.timeouts,
    defaultProviders: config.defaultProviders,
    history: new FareHistory(),
  });

  const rl = createInterface({ input, output });
  let closed = false;
  rl.on("close", () => {
    closed = true;
  });
  rl.on("SIGINT", () => rl.close());

  const help = renderHelp(config.defaultProviders);
  console.log(`${BANNER}\n\n${help}`);

  while (!closed) {
    let line: string;
    try {
      line = (await rl.question("\nWhere to? ")).trim();
    } catch (error) {
      if (closed) break;
      throw error;
    }

    if (!line) continue;
    const command = line.toLowerCase();
    if (command === "quit" || command === "exit") break;
    if (command === "help") {
      console.log(help);
      continue;
    }
    if (command === "last") {
      console.log(orchestrator.getLastComparisonSummary() ?? "No comparison yet");
      continue;
    }

    try {
      await handleRequest(line, (question) => rl.question(question), orchestrator, config, logger);
    } catch (error) {
      if (closed) break;
      logger.error(`Request failed: ${describeError(error)}`);
    }
  }

  rl.close();
  console.log("Bye!");
}

main().catch((error: unknown) => {
  console.error(`Fatal: ${describeError(error)}`);
  process.exitCode = 1;
});
