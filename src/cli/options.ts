import { loadConfig, type ScreenerConfig } from "../config/config.js";

export type CliOptions = {
  rowsFile?: string;
  dryRun?: boolean;
  funds?: string;
  minNotional?: string;
  quote?: string;
};

function buildEnv(opts: CliOptions, base: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...base };
  if (opts.dryRun) {
    env.DRY_RUN = "true";
  }
  if (opts.funds !== undefined) {
    env.DRY_RUN_FUNDS = opts.funds;
  }
  if (opts.minNotional !== undefined) {
    env.MIN_ORDER_NOTIONAL = opts.minNotional;
  }
  if (opts.quote !== undefined) {
    env.KRAKEN_BASE_CURRENCY = opts.quote;
  }
  return env;
}

/** Command-line flags win over the environment; dry-run may come from either. */
export function loadCliConfig(
  opts: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): ScreenerConfig {
  const cfg = loadConfig(buildEnv(opts, env));
  if (opts.funds !== undefined && !cfg.kraken.dryRun) {
    throw new Error("--funds only applies to dry runs (--dry-run or DRY_RUN=true)");
  }
  return cfg;
}
