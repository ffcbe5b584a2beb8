export type CliEnv = Record<string, string | undefined>;

export interface CliArgs {
  help: boolean;
  /** Base environment with every flag given on the command line applied */
  env: CliEnv;
}

export function readArg(args: ReadonlyArray<string>, name: string): string | undefined {
  const index = args.findIndex((arg) => arg === name || arg.startsWith(`${name}=`));
  if (index === -1) return undefined;
  const arg = args[index];
  if (arg.includes("=")) {
    return arg.split("=").slice(1).join("=");
  }
  return args[index + 1];
}

export function hasFlag(args: ReadonlyArray<string>, name: string): boolean {
  return args.includes(name);
}

const VALUE_FLAGS: ReadonlyArray<readonly [flag: string, variable: string]> = [
  ["--host", "PRESENCE_HOST"],
  ["--port", "PRESENCE_PORT"],
  ["--welcome", "PRESENCE_WELCOME"],
  ["--poll", "PRESENCE_POLL_MS"],
  ["--detectables", "PRESENCE_DETECTABLES"],
  ["--log-level", "PRESENCE_LOG_LEVEL"],
  ["--log-format", "PRESENCE_LOG_FORMAT"],
];

const OFF_SWITCHES: ReadonlyArray<readonly [flag: string, variable: string]> = [
  ["--no-ipc", "PRESENCE_IPC"],
  ["--no-rpc", "PRESENCE_RPC"],
  ["--no-scan", "PRESENCE_SCAN"],
];

/** Flags win over variables already present in `baseEnv`. */
export function parseCliArgs(args: ReadonlyArray<string>, baseEnv: CliEnv): CliArgs {
  const env: CliEnv = { ...baseEnv };
  for (const [flag, variable] of VALUE_FLAGS) {
    const value = readArg(args, flag);
    if (value) env[variable] = value;
  }
  for (const [flag, variable] of OFF_SWITCHES) {
    if (hasFlag(args, flag)) env[variable] = "0";
  }
  if (hasFlag(args, "--fail-fast")) env.PRESENCE_FAIL_FAST = "1";
  return { help: hasFlag(args, "--help") || hasFlag(args, "-h"), env };
}

export function helpText(): string {
  return [
    "presence-bridge",
    "",
    "Usage:",
    "  presence-bridge [options]",
    "",
    "Options:",
    "  --host <host>          Bind address (default 127.0.0.1)",
    "  --port <port>          Client WebSocket port (default 1337)",
    "  --welcome <json>       Payload sent to each client on connect",
    "  --poll <ms>            Process scan interval in ms (default 5000)",
    "  --detectables <path>   Detectable list JSON",
    "  --no-ipc               Disable the local IPC socket",
    "  --no-rpc               Disable the WebSocket command server",
    "  --no-scan              Disable process detection",
    "  --fail-fast            Exit on messages from unregistered clients",
    "  --log-level <level>    trace | debug | info | warn | error | none",
    "  --log-format <format>  pretty | logfmt | json",
    "  -h, --help             Show help",
    "",
  ].join("\n");
}
