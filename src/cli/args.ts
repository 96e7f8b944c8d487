import { ConfigError } from "../errors";

export type CliMode = "configGen" | "delta" | "full";

export type CliArgs = {
  /** undefined: use the mode from the config file */
  mode?: CliMode;
  configPath?: string;
  reportPath?: string;
  dryrun: boolean;
};

function valueAfter(argv: string[], flag: string): string | undefined {
  const i = argv.indexOf(flag);
  if (i === -1) return undefined;
  const v = argv[i + 1];
  if (v === undefined || v.startsWith("--")) {
    throw new ConfigError(`${flag} requires a value`);
  }
  return v;
}

export function parseArgs(argv: string[]): CliArgs {
  const flags = new Set(argv);

  const modes: CliMode[] = [];
  if (flags.has("--configGen")) modes.push("configGen");
  if (flags.has("--delta")) modes.push("delta");
  if (flags.has("--full")) modes.push("full");

  if (modes.length > 1) {
    throw new ConfigError(
      "Multiple modes specified. Use only one of: --configGen | --delta | --full"
    );
  }

  return {
    mode: modes[0],
    configPath: valueAfter(argv, "--config"),
    reportPath: valueAfter(argv, "--report"),
    dryrun: flags.has("--dryrun"),
  };
}
