export interface CliArgs {
  help: boolean;
  debug: boolean;
  interval?: string;
  log?: string;
  steamRoot?: string;
  timeout?: string;
}

function readArg(args: ReadonlyArray<string>, names: ReadonlyArray<string>): string | undefined {
  const index = args.findIndex((arg) =>
    names.some((name) => arg === name || arg.startsWith(`${name}=`))
  );
  if (index === -1) return undefined;
  const arg = args[index];
  if (arg.includes("=")) {
    return arg.split("=").slice(1).join("=");
  }
  return args[index + 1];
}

function hasFlag(args: ReadonlyArray<string>, name: string): boolean {
  return args.includes(name);
}

export function parseCliArgs(args: ReadonlyArray<string>): CliArgs {
  return {
    help: hasFlag(args, "--help") || hasFlag(args, "-h"),
    debug: hasFlag(args, "--debug"),
    interval: readArg(args, ["--interval", "-i"]),
    log: readArg(args, ["--log"]),
    steamRoot: readArg(args, ["--steam-root"]),
    timeout: readArg(args, ["--timeout"]),
  };
}

/** Overlay command-line options onto STEAMWATCH_* variables */
export function applyCliArgs(parsed: CliArgs, env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const next: NodeJS.ProcessEnv = { ...env };
  if (parsed.interval) next.STEAMWATCH_INTERVAL_SEC = parsed.interval;
  if (parsed.log) next.STEAMWATCH_LOG = parsed.log;
  if (parsed.steamRoot) next.STEAMWATCH_STEAM_ROOT = parsed.steamRoot;
  if (parsed.timeout) next.STEAMWATCH_TIMEOUT_SEC = parsed.timeout;
  if (parsed.debug) next.STEAMWATCH_DEBUG = "1";
  return next;
}

export function helpText(): string {
  return [
    "steamwatch",
    "",
    "Usage:",
    "  steamwatch [options]",
    "",
    "Options:",
    "  -i, --interval <sec>   Status line interval in seconds (default 60)",
    "  --log <path>           Path to content_log.txt",
    "  --steam-root <path>    Steam installation folder",
    "  --timeout <sec>        Stop after this many seconds, 0 to run until stopped (default 300)",
    "  --debug                Verbose diagnostics on stderr",
    "  -h, --help             Show help",
    "",
  ].join("\n");
}
