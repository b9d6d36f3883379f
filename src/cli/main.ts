import { Command, Option } from "commander";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import { HORIZONS, isHorizon } from "../core/entities/market";
import { cacheTtls, env, marketDataProvider } from "../shared/config/env";
import { logger } from "../shared/logger/logger";
import { formatReport } from "./reportFormatter";

/**
 * Splits the comma-separated asset list; blank entries stay so the resolver can skip them.
 */
export const parseAssetNames = (value: string): string[] => value.split(",");

/**
 * Defines a single command surface so every command shares the same runtime wiring.
 */
export const buildCli = () => {
  const cli = new Command();
  cli
    .name("portfolio-insights")
    .description("Compare assets against a benchmark from public market data");

  cli
    .command("report")
    .description("Resolve assets and print aligned performance and metrics")
    .requiredOption(
      "--assets <names>",
      "Comma-separated company names or ticker symbols",
    )
    .addOption(
      new Option("--horizon <horizon>", "Look-back window")
        .choices(HORIZONS)
        .default("1y"),
    )
    .option("--prettify", "Render a human-friendly report")
    .action(
      async (opts: { assets: string; horizon: string; prettify?: boolean }) => {
        if (!isHorizon(opts.horizon)) {
          throw new Error(`Unsupported horizon: ${opts.horizon}`);
        }

        const { analyticsFacade } = createRuntime();
        const report = await analyticsFacade.buildReport({
          names: parseAssetNames(opts.assets),
          horizon: opts.horizon,
        });

        if (opts.prettify) {
          console.log(formatReport(report));
        } else {
          logger.info({ report }, "Analytics report");
        }
      },
    );

  cli
    .command("status")
    .description("Report market-data configuration")
    .action(() => {
      logger.info(
        {
          provider: marketDataProvider(),
          benchmark: env.BENCHMARK_SYMBOL,
          maxAssets: env.MAX_ASSETS,
          headlinesPerSymbol: env.HEADLINES_PER_SYMBOL,
          cacheTtlsMs: cacheTtls(),
          cacheMaxEntries: env.CACHE_MAX_ENTRIES,
          dividendYieldCorrectionThreshold:
            env.DIVIDEND_YIELD_CORRECTION_THRESHOLD,
          insiderEstimateRatio: env.INSIDER_ESTIMATE_RATIO,
          highLookbackObservations: env.HIGH_LOOKBACK_OBSERVATIONS,
          usage: [
            'tsx src/index.ts report --assets "Apple,MSFT" --horizon 1y --prettify',
            "MARKET_DATA_PROVIDER=mock tsx src/index.ts report --assets AAPL --prettify",
          ],
        },
        "Runtime status",
      );
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
